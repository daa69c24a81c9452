/**
 * Error Types
 *
 * NotFound and SecurityViolation are raised only for top-level loads; nested
 * references turn them into inline markers. Upstream and validation failures
 * are caught by the router and retrievers and degraded to safe defaults.
 */

export class SwitchboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SwitchboardError";
  }
}

// ============================================
// NOT FOUND
// ============================================

export class PromptNotFoundError extends SwitchboardError {
  public path: string;

  constructor(path: string) {
    super(`Prompt file not found: ${path}`);
    this.name = "PromptNotFoundError";
    this.path = path;
  }
}

export class AgentNotFoundError extends SwitchboardError {
  public agentName: string;
  public path: string;

  constructor(agentName: string, path: string) {
    super(`Agent prompt not found for '${agentName}' at ${path}`);
    this.name = "AgentNotFoundError";
    this.agentName = agentName;
    this.path = path;
  }
}

// ============================================
// SECURITY
// ============================================

export class SecurityViolationError extends SwitchboardError {
  public reference: string;

  constructor(reference: string) {
    super(`Access denied for path '${reference}'. Cannot access outside the prompt root.`);
    this.name = "SecurityViolationError";
    this.reference = reference;
  }
}

// ============================================
// UPSTREAM
// ============================================

export class UpstreamError extends SwitchboardError {
  public service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service}: ${message}`, options);
    this.name = "UpstreamError";
    this.service = service;
  }
}

export class ClassifierTimeoutError extends UpstreamError {
  public timeoutMs: number;

  constructor(timeoutMs: number) {
    super("classifier", `no response within ${timeoutMs}ms`);
    this.name = "ClassifierTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// ============================================
// VALIDATION
// ============================================

export class ClassifierResponseError extends UpstreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("classifier", message, options);
    this.name = "ClassifierResponseError";
  }
}

export class FrontMatterError extends SwitchboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FrontMatterError";
  }
}

export class ConfigError extends SwitchboardError {
  public issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
