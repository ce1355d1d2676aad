/**
 * One promo code entry as stored in the document. Records are loosely shaped
 * JSON: only `code`, `expires`, `expired` and `archived` mean anything here and
 * every other key is carried through untouched.
 */
export type CodeRecord = Record<string, unknown>;

export function recordCode(record: CodeRecord): string {
  return typeof record.code === "string" ? record.code.trim() : "";
}

/** Matching form of a code: trimmed, upper-cased. */
export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export function isExpired(record: CodeRecord): boolean {
  return record.expired === true;
}
