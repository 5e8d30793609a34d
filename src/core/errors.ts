export type InputErrorCode = "invalid_level_format" | "unknown_level";

/**
 * Request-level problem reported back to the caller.
 * Never thrown; the transport layer maps it to a client-error status.
 */
export interface InputError {
  code: InputErrorCode;
  message: string;
}

/** Thrown at startup when a challenge table is malformed. */
export class ChallengeConfigError extends Error {
  /** Where the bad definition came from (file path or "inline"). */
  source: string;

  constructor(message: string, source: string) {
    super(`${message} (${source})`);
    this.name = "ChallengeConfigError";
    this.source = source;
  }
}
