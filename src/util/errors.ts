export type ErrorCode =
  | "configuration"
  | "provider_state"
  | "provider_api"
  | "unhandled_state";

export class CcBackupError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CcBackupError";
    this.code = code;
  }
}

// Bad or missing input, raised before the provider is contacted
export class ConfigurationError extends CcBackupError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export class ProviderStateError extends CcBackupError {
  readonly target: string;

  constructor(target: string, message: string, options?: { cause?: unknown }) {
    super("provider_state", message, options);
    this.name = "ProviderStateError";
    this.target = target;
  }
}

export type ProviderOperation = "read" | "add" | "remove" | "modify";

export class ProviderApiError extends CcBackupError {
  readonly target: string;
  readonly operation: ProviderOperation;

  constructor(target: string, operation: ProviderOperation, message: string, options?: { cause?: unknown }) {
    super("provider_api", message, options);
    this.name = "ProviderApiError";
    this.target = target;
    this.operation = operation;
  }
}

export class UnhandledStateError extends CcBackupError {
  readonly state: string;

  constructor(state: string) {
    super("unhandled_state", "Unhandled state");
    this.name = "UnhandledStateError";
    this.state = state;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") return error.message;
  return String(error);
}

export function getStatusCode(error: unknown): number | undefined {
  if (error && typeof error === "object") {
    if ("status" in error && typeof error.status === "number") return error.status;
    if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  }
  return undefined;
}

export function isNotProvisionedError(error: unknown): boolean {
  return getErrorMessage(error).trim().endsWith("has not been provisioned for backup");
}

export function isAuthError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status === 401 || status === 403) return true;
  const msg = getErrorMessage(error).toLowerCase();
  return (
    msg.includes("unauthorized") ||
    msg.includes("authentication") ||
    msg.includes("permission denied")
  );
}

export function isTimeoutError(error: unknown): boolean {
  const msg = getErrorMessage(error).toLowerCase();
  return (
    msg.includes("timeout") ||
    msg.includes("etimedout") ||
    msg.includes("econnreset") ||
    msg.includes("socket hang up")
  );
}

export function describeError(error: unknown): string {
  if (error instanceof CcBackupError) return error.message;
  if (isAuthError(error)) return `Authentication failed: ${getErrorMessage(error)}`;
  if (isTimeoutError(error)) return `Request timed out: ${getErrorMessage(error)}`;
  return getErrorMessage(error);
}
