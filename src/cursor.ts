import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

export interface CursorPage<T> {
  items: T[];
  nextCursor?: string;
}

/**
 * Offset pagination for `tools/list`. The cursor also carries the list size it
 * was issued for, so a cursor from before a config reload is rejected instead
 * of silently skipping tools.
 */
export function paginateWithCursor<T>(items: T[], cursor: string | undefined, pageSize: number): CursorPage<T> {
  const offset = decodeCursor(cursor, items.length);
  const sliced = items.slice(offset, offset + pageSize);
  const nextOffset = offset + sliced.length;

  return {
    items: sliced,
    ...(nextOffset < items.length ? { nextCursor: encodeCursor(nextOffset, items.length) } : {})
  };
}

export function decodeCursor(cursor: string | undefined, total: number): number {
  if (!cursor) {
    return 0;
  }

  const [rawOffset, rawTotal] = Buffer.from(cursor, "base64url").toString("utf8").split(":");
  const offset = Number(rawOffset);
  if (!Number.isInteger(offset) || offset < 0 || offset > total || Number(rawTotal) !== total) {
    throw new McpError(ErrorCode.InvalidParams, "Invalid tools/list cursor");
  }
  return offset;
}

export function encodeCursor(offset: number, total: number): string {
  return Buffer.from(`${offset}:${total}`, "utf8").toString("base64url");
}
