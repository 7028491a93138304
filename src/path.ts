import type { ResponseDocument } from "./types.js";

export function readPath(value: unknown, path: string): unknown {
  if (!path) {
    return undefined;
  }

  const parts = path.split(/[./]/).filter(Boolean);
  let current: unknown = value;
  for (const part of parts) {
    if (Array.isArray(current)) {
      const index = Number(part);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) {
        return undefined;
      }
      current = current[index];
      continue;
    }

    if (!isRecord(current) || !Object.hasOwn(current, part)) {
      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Decoded response body addressed by dotted paths, e.g. `Contents.0.Key`
 * or `Contents/0/Key`.
 */
export class JsonDocument implements ResponseDocument {
  constructor(readonly body: unknown) {}

  getPath(path: string): unknown {
    return readPath(this.body, path);
  }

  toJSON(): unknown {
    return this.body;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
