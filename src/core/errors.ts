import type { ZodIssue } from 'zod';

/**
 * Thrown when the language-model call itself fails (network, provider, auth).
 */
export class GatewayError extends Error {
  readonly retryable: boolean;

  constructor(message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'GatewayError';
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Thrown when a schema-constrained reply does not match the requested shape.
 */
export class MalformedModelOutputError extends Error {
  readonly issues: ZodIssue[];
  readonly raw: string;

  constructor(message: string, raw: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'MalformedModelOutputError';
    this.raw = raw;
    this.issues = issues;
  }
}

export class ToolNotFoundError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool ${toolName} not found`);
    this.name = 'ToolNotFoundError';
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends Error {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

/**
 * Raised by the graph runner itself, never by a node.
 */
export class GraphExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphExecutionError';
  }
}

export class AssetApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'AssetApiError';
    this.status = status;
  }
}

export class ConfigError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Single-line detail for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
