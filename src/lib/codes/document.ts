import { z } from "zod";
import { InputError } from "../errors.js";
import type { CodeRecord } from "./record.js";

// z.record keeps the source key order, so a saved document diffs cleanly.
const jsonObjectSchema = z.record(z.string(), z.unknown());
const documentSchema = z.array(jsonObjectSchema).nonempty();
const codesSchema = z.array(jsonObjectSchema);

/**
 * The whole stored document: `[{ ..., "codes": [ ...records ] }, ...]`.
 * `codes` is the same array object as `root[0].codes`, so mutating a record
 * through it mutates what gets saved.
 */
export type CodesDocument = {
  root: Record<string, unknown>[];
  codes: CodeRecord[];
};

export function parseCodesDocument(raw: unknown): CodesDocument {
  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError("Unexpected codes document format");
  }
  const [head] = parsed.data;
  const codes = codesSchema.safeParse(head.codes);
  if (!codes.success) {
    throw new InputError("Unexpected codes document format: first entry has no codes array");
  }
  head.codes = codes.data;
  return { root: parsed.data, codes: codes.data };
}

export function serializeCodesDocument(document: CodesDocument): string {
  return JSON.stringify(document.root, null, 2);
}
