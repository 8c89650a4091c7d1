export class AppError extends Error {
  constructor(message: string, readonly code: string = "APP_ERROR") {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class ConfigLoadError extends AppError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Could not load config file ${filePath}: ${describeCause(cause)}`, "CONFIG_LOAD_ERROR");
    this.name = "ConfigLoadError";
    this.cause = cause;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
