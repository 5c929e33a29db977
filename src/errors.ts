export type ErrorCode =
  | "INVALID_INPUT"
  | "CLASSIFICATION_PARSE"
  | "PROVIDER"
  | "PROVIDER_TIMEOUT"
  | "DUPLICATE_ID"
  | "STORAGE"
  | "CONFIG"
  | "TOOL_REGISTRATION"
  | "UNKNOWN_TOOL"
  | "TOOL_ARGUMENTS"
  | "TOOL_EXECUTION";

/**
 * Base class for every failure the classifier surfaces to callers.
 */
export class ClassifierError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends ClassifierError {
  constructor(message: string) {
    super(message, "INVALID_INPUT");
  }
}

export class ClassificationParseError extends ClassifierError {
  constructor(
    message: string,
    readonly rawResponse: string,
    options?: ErrorOptions
  ) {
    super(message, "CLASSIFICATION_PARSE", options);
  }
}

export class ProviderError extends ClassifierError {
  constructor(
    message: string,
    readonly provider: string,
    options?: ErrorOptions,
    code: ErrorCode = "PROVIDER"
  ) {
    super(message, code, options);
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(provider: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      `${provider} request timed out after ${timeoutMs}ms`,
      provider,
      options,
      "PROVIDER_TIMEOUT"
    );
  }
}

export class DuplicateIdError extends ClassifierError {
  constructor(
    readonly kind: string,
    readonly id: string
  ) {
    super(`Knowledge entry already exists: ${kind}/${id}`, "DUPLICATE_ID");
  }
}

export class StorageError extends ClassifierError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "STORAGE", options);
  }
}

export class ConfigError extends ClassifierError {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`, "CONFIG");
  }
}

export class ToolRegistrationError extends ClassifierError {
  constructor(message: string) {
    super(message, "TOOL_REGISTRATION");
  }
}

export class UnknownToolError extends ClassifierError {
  constructor(
    readonly toolName: string,
    available: readonly string[]
  ) {
    super(
      `Tool "${toolName}" is not registered (available: ${available.length > 0 ? available.join(", ") : "none"})`,
      "UNKNOWN_TOOL"
    );
  }
}

export class ToolArgumentError extends ClassifierError {
  constructor(
    readonly toolName: string,
    readonly issues: string[]
  ) {
    super(
      `Invalid arguments for tool "${toolName}": ${issues.join("; ")}`,
      "TOOL_ARGUMENTS"
    );
  }
}

export class ToolExecutionError extends ClassifierError {
  constructor(readonly toolName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Tool "${toolName}" failed: ${detail}`, "TOOL_EXECUTION", { cause });
  }
}

/**
 * Wrap an unexpected failure from the database layer, leaving our own
 * errors untouched.
 */
export function toStorageError(operation: string, error: unknown): ClassifierError {
  if (error instanceof ClassifierError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StorageError(`${operation} failed: ${detail}`, { cause: error });
}
