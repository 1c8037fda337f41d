const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;
const EXIT_CODE_INTERRUPTED = 130;

interface FlowErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
  /** The failure has already been shown to the user, so the top level only sets the exit code. */
  reported?: boolean;
}

export class FlowError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;
  readonly reported: boolean;

  constructor(message: string, code: string, exitCode: number, options: FlowErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    this.reported = options.reported ?? false;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends FlowError {
  constructor(message: string, options: FlowErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class UnknownTemplateError extends FlowError {
  readonly templateId: string;

  constructor(templateId: string, knownIds: readonly string[]) {
    super(`Unknown template "${templateId}". Available templates: ${knownIds.join(", ")}.`, "UNKNOWN_TEMPLATE", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, {
      details: { templateId }
    });
    this.templateId = templateId;
  }
}

export class ConfigError extends FlowError {
  constructor(message: string, options: FlowErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class GenerationError extends FlowError {
  readonly path: string;

  constructor(message: string, path: string, options: Omit<FlowErrorOptions, "details"> = {}) {
    super(message, "GENERATION", EXIT_CODE_OPERATIONAL_FAILURE, { ...options, details: { path } });
    this.path = path;
  }
}

export class ExecutionError extends FlowError {
  constructor(message: string, options: FlowErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class OperationCancelledError extends FlowError {
  constructor(message = "Operation canceled.", options: FlowErrorOptions = {}) {
    super(message, "CANCELLED", EXIT_CODE_INTERRUPTED, options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code: string; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): FlowError {
  if (error instanceof FlowError) return error;
  if (isCommanderErrorLike(error) && error.code.startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: error.code
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}
