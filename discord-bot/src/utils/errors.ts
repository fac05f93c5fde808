/**
 * Error taxonomy for card commands.
 *
 * AdjustError subclasses are user-facing: the card service turns them into
 * a formatted reply. Anything else is a bug or an infrastructure failure.
 */

export class AdjustError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AdjustError";
  }
}

/**
 * No card exists for the session in either store tier.
 */
export class MissingStateError extends AdjustError {
  constructor(message = "No card found. Create one first with /card draw.") {
    super(message);
    this.name = "MissingStateError";
  }
}

/**
 * User input could not be applied.
 * `input` holds the offending raw text when there is one.
 */
export class ValidationError extends AdjustError {
  readonly input?: string;

  constructor(message: string, input?: string) {
    super(message);
    this.name = "ValidationError";
    this.input = input;
  }
}

/**
 * The external renderer failed after state was committed.
 */
export class RenderError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "RenderError";
  }
}

/**
 * The same alias was registered under two canonical names.
 */
export class AliasConflictError extends Error {
  readonly alias: string;

  constructor(alias: string, existing: string, incoming: string) {
    super(`Alias "${alias}" is registered for both "${existing}" and "${incoming}"`);
    this.name = "AliasConflictError";
    this.alias = alias;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
