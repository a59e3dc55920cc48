/** Malformed filter input; raised before any upstream request is made. */
export class InvalidFilterError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidFilterError";
    this.field = field;
  }
}

/** Non-success response or network fault from an upstream API. */
export class UpstreamUnavailableError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "UpstreamUnavailableError";
    this.status = status;
  }
}

export type Result<T, E = UpstreamUnavailableError> =
  | { ok: true; data: T }
  | { ok: false; error: E };

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
