import { InputError } from "../errors.js";

/**
 * Split command-line code tokens into codes. Several codes must be separated
 * by commas ("CODE1, CODE2"); bare space-separated tokens are rejected since a
 * code never contains whitespace.
 */
export function parseTargetCodes(tokens: readonly string[]): string[] {
  if (tokens.length === 0) return [];

  const raw = tokens.join(" ");
  if (tokens.length > 1 && !raw.includes(",")) {
    throw new InputError(
      "When passing multiple codes, separate them with commas, e.g. CODE1, CODE2, CODE3"
    );
  }

  const codes: string[] = [];
  for (const part of raw.split(",").map((p) => p.trim())) {
    if (!part) continue;
    if (/\s/.test(part)) {
      throw new InputError(
        "Invalid code token with spaces. Separate multiple codes with commas, e.g. CODE1, CODE2"
      );
    }
    codes.push(part);
  }
  return codes;
}
