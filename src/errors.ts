const MAX_ERROR_SNIPPET = 220;

export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, MAX_ERROR_SNIPPET);
}

export class ComplianceError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(code: string, message: string, details: Record<string, unknown> = {}) {
    super(`${code}: ${message}`);
    this.name = "ComplianceError";
    this.code = code;
    this.details = details;
  }
}

export class ConfigurationNotFoundError extends ComplianceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("E_CONFIG_NOT_FOUND", message, details);
    this.name = "ConfigurationNotFoundError";
  }
}

export class InvalidConfigurationError extends ComplianceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("E_CONFIG_INVALID", message, details);
    this.name = "InvalidConfigurationError";
  }
}

export class InvalidAppOptionsError extends ComplianceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("E_APP_OPTIONS_INVALID", message, details);
    this.name = "InvalidAppOptionsError";
  }
}

export class CredentialExchangeError extends ComplianceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("E_CREDENTIAL_EXCHANGE", message, details);
    this.name = "CredentialExchangeError";
  }
}

export type GitHubApiErrorKind =
  | "unauthorized"
  | "forbidden"
  | "rate_limited"
  | "not_found"
  | "http_error"
  | "malformed_response"
  | "aborted"
  | "fetch_error";

export class GitHubApiError extends ComplianceError {
  readonly kind: GitHubApiErrorKind;
  readonly status: number | null;

  constructor(kind: GitHubApiErrorKind, message: string, details: Record<string, unknown> = {}) {
    super("E_GITHUB_API", message, details);
    this.name = "GitHubApiError";
    this.kind = kind;
    this.status = typeof details.status === "number" ? details.status : null;
  }
}

export function isGitHubApiError(error: unknown, kind?: GitHubApiErrorKind): error is GitHubApiError {
  if (!(error instanceof GitHubApiError)) {
    return false;
  }

  return kind === undefined || error.kind === kind;
}
