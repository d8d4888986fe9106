import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import {
  AssistantError,
  ConfigurationError,
  GitLabApiError,
  SonarQubeApiError,
  TimeoutError,
} from "../../infra/errors.js";

/**
 * Maps the assistant's error hierarchy to MCP errors
 */
export function mapToMCPError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof ConfigurationError) {
    return new McpError(ErrorCode.InvalidRequest, error.message, { code: error.code });
  }

  if (error instanceof TimeoutError) {
    return new McpError(ErrorCode.InternalError, error.message, {
      code: error.code,
      operationType: error.operationType,
      timeoutMs: error.timeoutMs,
      isRetryable: error.isRetryable,
    });
  }

  if (error instanceof GitLabApiError || error instanceof SonarQubeApiError) {
    return new McpError(ErrorCode.InternalError, error.message, {
      code: error.code,
      status: error.status,
      isRetryable: error.isRetryable,
    });
  }

  if (error instanceof AssistantError) {
    return new McpError(ErrorCode.InternalError, error.message, {
      code: error.code,
      isRetryable: error.isRetryable,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new McpError(ErrorCode.InternalError, message);
}

/**
 * Tools report failures as `{ error }` values rather than throwing
 */
export function isToolErrorResult(result: unknown): boolean {
  return (
    typeof result === "object" &&
    result !== null &&
    !Array.isArray(result) &&
    "error" in result &&
    typeof result.error === "string"
  );
}
