export type StatusSourceErrorCode = "TIMEOUT" | "UNREACHABLE" | "BAD_RESPONSE";

/** A status poll that did not produce a usable status */
export class StatusSourceError extends Error {
  readonly code: StatusSourceErrorCode;

  constructor(code: StatusSourceErrorCode, message: string) {
    super(message);
    this.name = "StatusSourceError";
    this.code = code;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
