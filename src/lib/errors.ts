/**
 * Fatal input problem: bad source document, empty or ambiguous target codes,
 * an invalid reference timestamp. Raised before any record is mutated.
 */
export class InputError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class PublishError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "PublishError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
