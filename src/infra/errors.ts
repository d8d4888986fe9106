export class AssistantError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = "AssistantError";
  }
}

export class ConfigurationError extends AssistantError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

export class StateError extends AssistantError {
  constructor(message: string, cause?: Error) {
    super(message, "STATE_ERROR", cause);
    this.name = "StateError";
  }
}

export class SessionNotFoundError extends AssistantError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND");
    this.name = "SessionNotFoundError";
  }
}

export class ProjectNotFoundError extends AssistantError {
  constructor(public readonly projectKey: string) {
    super("GitLab project not found", "PROJECT_NOT_FOUND");
    this.name = "ProjectNotFoundError";
  }
}

export class MaxFixAttemptsError extends AssistantError {
  constructor(
    public readonly sessionId: string,
    public readonly limit: number
  ) {
    super(`Maximum fix attempts (${limit}) exceeded`, "MAX_FIX_ATTEMPTS");
    this.name = "MaxFixAttemptsError";
  }
}

export class WebhookValidationError extends AssistantError {
  constructor(message: string, cause?: Error) {
    super(message, "WEBHOOK_VALIDATION_ERROR", cause);
    this.name = "WebhookValidationError";
  }
}

export class GitLabApiError extends AssistantError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error
  ) {
    // 5xx and transport failures are worth another delivery; 4xx are not
    super(message, "GITLAB_API_ERROR", cause, status === undefined || status >= 500);
    this.name = "GitLabApiError";
  }
}

export class SonarQubeApiError extends AssistantError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error
  ) {
    super(message, "SONARQUBE_API_ERROR", cause, status === undefined || status >= 500);
    this.name = "SonarQubeApiError";
  }
}

export class AIProviderError extends AssistantError {
  constructor(message: string, cause?: Error) {
    super(message, "AI_PROVIDER_ERROR", cause);
    this.name = "AIProviderError";
  }
}

export class TimeoutError extends AssistantError {
  constructor(
    message: string,
    public readonly operationType: string,
    public readonly timeoutMs: number
  ) {
    super(message, "TIMEOUT_ERROR", undefined, true); // Retryable by default
    this.name = "TimeoutError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
