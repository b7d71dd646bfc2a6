/**
 * Error taxonomy. `statusCode` is what a route replies with when the error
 * reaches the HTTP layer; `message` is safe to show to callers.
 */
export abstract class ClassifierError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or empty caller input */
export class ValidationError extends ClassifierError {
  readonly statusCode = 400;
}

/** Blank prompt submitted for saving */
export class InvalidPromptError extends ClassifierError {
  readonly statusCode = 400;

  constructor() {
    super('prompt must be a non-empty string');
  }
}

/** Prompt file could not be written */
export class PersistenceError extends ClassifierError {
  readonly statusCode = 500;
}

/**
 * LLM stage failed. The classifier always recovers from it, so the status is
 * never sent; it only applies if the error is raised outside that stage.
 */
export class AIServiceError extends ClassifierError {
  readonly statusCode = 502;
}
