export class SiteQaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DimensionMismatchError extends SiteQaError {
  readonly expected: number;
  readonly actual: number;

  constructor(params: { expected: number; actual: number; context?: string }) {
    const where = params.context ? ` (${params.context})` : "";
    super(
      `Embedding dimension mismatch${where}: expected=${params.expected} actual=${params.actual}`
    );
    this.expected = params.expected;
    this.actual = params.actual;
  }
}

export type ServiceKind = "embedding" | "completion";

export class ServiceError extends SiteQaError {
  readonly service: ServiceKind;
  readonly operation: string;

  constructor(params: {
    service: ServiceKind;
    operation: string;
    message: string;
    cause?: unknown;
  }) {
    super(`${params.service} service failed during ${params.operation}: ${params.message}`, {
      cause: params.cause
    });
    this.service = params.service;
    this.operation = params.operation;
  }
}

export class ConfigError extends SiteQaError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.issues = issues;
  }
}

export class IndexFormatError extends SiteQaError {}

export class InvalidPassageError extends SiteQaError {}

export function toServiceError(
  service: ServiceKind,
  operation: string,
  err: unknown
): ServiceError {
  if (err instanceof ServiceError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ServiceError({ service, operation, message, cause: err });
}
