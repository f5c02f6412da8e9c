/**
 * Raised when no complete reading can be obtained. No partial report is ever
 * produced, since every field of the report is mandatory.
 */
export class DataUnavailableError extends Error {
  constructor(
    message: string,
    public readonly reason: DataUnavailableReason = "unavailable",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DataUnavailableError";
  }
}

export type DataUnavailableReason =
  | "unavailable"
  | "malformed"
  | "no-user"
  | "no-installations"
  | "site-not-found";
