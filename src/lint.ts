import type { KeySpec, LintDiagnostic, PagerConfig } from "./types.js";

export function lintPagerConfig(config: PagerConfig): LintDiagnostic[] {
  const diagnostics: LintDiagnostic[] = [];

  if (Object.keys(config.operations).length === 0) {
    diagnostics.push({
      level: "warning",
      code: "OPERATIONS_EMPTY",
      message: "Config declares no operations; nothing can be paginated.",
      location: "operations"
    });
  }

  for (const [name, operation] of Object.entries(config.operations)) {
    const location = `operations.${name}`;
    const { inputToken, outputToken, limitKey, resultKey, moreResults } = operation.pagination;

    if (inputToken !== undefined && outputToken !== undefined && arity(inputToken) !== arity(outputToken)) {
      diagnostics.push({
        level: "error",
        code: "TOKEN_ARITY_MISMATCH",
        message: `inputToken has ${arity(inputToken)} part(s) but outputToken has ${arity(outputToken)}.`,
        location: `${location}.pagination`
      });
    }

    if (inputToken !== undefined && outputToken !== undefined && Array.isArray(inputToken) !== Array.isArray(outputToken)) {
      diagnostics.push({
        level: "error",
        code: "TOKEN_KIND_MISMATCH",
        message: Array.isArray(outputToken)
          ? "A composite outputToken needs a composite inputToken."
          : "A composite inputToken needs a composite outputToken.",
        location: `${location}.pagination.inputToken`
      });
    }

    if (inputToken === undefined && outputToken !== undefined) {
      diagnostics.push({
        level: "error",
        code: "INPUT_TOKEN_MISSING",
        message: "outputToken is set but no inputToken; every request would fetch the first page again.",
        location: `${location}.pagination`
      });
    }

    if (!resultKey) {
      diagnostics.push({
        level: "warning",
        code: "RESULT_KEY_MISSING",
        message: "No resultKey; every page will be treated as empty.",
        location: `${location}.pagination`
      });
    }

    if (inputToken !== undefined && outputToken === undefined) {
      diagnostics.push({
        level: "warning",
        code: "OUTPUT_TOKEN_MISSING",
        message: "inputToken is set but no outputToken; iteration stops after the first page.",
        location: `${location}.pagination`
      });
    }

    if (moreResults && outputToken === undefined) {
      diagnostics.push({
        level: "warning",
        code: "OUTPUT_TOKEN_MISSING",
        message: "moreResults has no effect without an outputToken.",
        location: `${location}.pagination.moreResults`
      });
    }

    if (limitKey && operation.params[limitKey] === undefined) {
      diagnostics.push({
        level: "warning",
        code: "LIMIT_KEY_UNSET",
        message: `limitKey "${limitKey}" has no default in params; pageSize only applies when callers set it.`,
        location: `${location}.params`
      });
    }

    for (const match of operation.path.matchAll(/\{([^}]+)\}/g)) {
      const param = match[1];
      if (operation.params[param] === undefined) {
        diagnostics.push({
          level: "warning",
          code: "PATH_PARAM_UNSET",
          message: `Path parameter "${param}" has no default; callers must provide it.`,
          location: `${location}.path`
        });
      }
    }
  }

  return diagnostics;
}

function arity(key: KeySpec): number {
  return typeof key === "string" ? 1 : key.length;
}
