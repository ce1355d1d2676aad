import { randomUUID } from "node:crypto";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseCodesDocument, serializeCodesDocument, type CodesDocument } from "../lib/codes/document.js";
import { InputError } from "../lib/errors.js";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadCodesFile(filePath: string): Promise<CodesDocument> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new InputError(
        `File not found: ${filePath}\n` +
          "Hint: generate the codes document first, or pass the correct file path with --file <PATH>."
      );
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new InputError(`Invalid JSON in ${filePath}`);
  }
  return parseCodesDocument(raw);
}

/**
 * Write the whole document to a sibling temp file, then rename it over the
 * target. Readers see either the old or the new document.
 */
export async function saveCodesFile(filePath: string, document: CodesDocument): Promise<void> {
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${randomUUID()}.tmp`
  );
  try {
    await writeFile(tmpPath, serializeCodesDocument(document), "utf-8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
