/**
 * Error kinds surfaced by the chatbot service
 */
export abstract class ChatbotError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The user sent nothing. Converted to a prompt-for-input reply, never thrown to callers.
 */
export class EmptyInputError extends ChatbotError {
  readonly code = 'EMPTY_INPUT';

  constructor() {
    super('Please provide input for the chatbot.');
  }
}

/**
 * A model or search call failed
 */
export class BackendInvocationError extends ChatbotError {
  readonly code = 'BACKEND_INVOCATION';

  constructor(
    message: string,
    readonly backend: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  static from(error: unknown, backend: string): BackendInvocationError {
    if (error instanceof BackendInvocationError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new BackendInvocationError(message, backend, { cause: error });
  }
}

/**
 * Missing or invalid settings. Fatal at startup.
 */
export class ConfigurationError extends ChatbotError {
  readonly code = 'CONFIGURATION';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}
