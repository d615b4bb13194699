export type CoachErrorCode =
  | "validation_failed"
  | "incomplete_profile"
  | "store_unavailable"
  | "unrecognized_intent";

export abstract class CoachError extends Error {
  abstract readonly code: CoachErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range input; answered with a re-prompt. */
export class ValidationError extends CoachError {
  readonly code = "validation_failed";
}

export class IncompleteProfileError extends CoachError {
  readonly code = "incomplete_profile";

  constructor(readonly missing: string[]) {
    super(`missing fields: ${missing.join(", ")}`);
  }
}

export class StoreUnavailableError extends CoachError {
  readonly code = "store_unavailable";

  constructor(readonly operation: string, readonly failure?: unknown) {
    super(`store unavailable during ${operation}`);
  }
}

export class UnrecognizedIntentError extends CoachError {
  readonly code = "unrecognized_intent";

  constructor(readonly text: string) {
    super("unrecognized command");
  }
}
