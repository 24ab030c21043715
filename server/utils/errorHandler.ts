import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import type { AnalysisErrorKind } from "@shared/schema";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class TemplateNotFoundError extends NotFoundError {
  templateName: string;
  constructor(templateName: string, available: string[] = []) {
    super(`Template "${templateName}"`);
    this.name = "TemplateNotFoundError";
    this.templateName = templateName;
    if (available.length > 0) {
      this.message += ` (available: ${available.join(", ")})`;
    }
  }
}

/**
 * Raised when an explicit version is requested and absent.
 * Never recovered by falling back to the latest version.
 */
export class VersionNotFoundError extends NotFoundError {
  templateName: string;
  version: string;
  constructor(templateName: string, version: string, available: string[] = []) {
    super(`Version "${version}" of template "${templateName}"`);
    this.name = "VersionNotFoundError";
    this.templateName = templateName;
    this.version = version;
    if (available.length > 0) {
      this.message += ` (available: ${available.join(", ")})`;
    }
  }
}

// Broken template or alias configuration; raised at load time
export class ConfigurationError extends Error implements AppError {
  statusCode = 500;
  isOperational = false;
  source: string;
  constructor(source: string, message: string) {
    super(`Invalid configuration in ${source}: ${message}`);
    this.name = "ConfigurationError";
    this.source = source;
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

export class ModelCallError extends ExternalServiceError {
  model: string;
  constructor(model: string, message: string) {
    super(`Model ${model}`, message);
    this.name = "ModelCallError";
    this.model = model;
  }
}

export class ModelTimeoutError extends ExternalServiceError {
  model: string;
  timeoutMs: number;
  constructor(model: string, timeoutMs: number) {
    super(`Model ${model}`, `no response within ${timeoutMs}ms`);
    this.name = "ModelTimeoutError";
    this.statusCode = 504;
    this.model = model;
    this.timeoutMs = timeoutMs;
  }
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

// The slice of express's Response that error handling writes to
export type ErrorResponse = {
  status(code: number): { json(body: unknown): unknown };
};

export function handleRouteError(
  res: ErrorResponse,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

export interface ClassifiedError {
  kind: AnalysisErrorKind;
  errorMessage: string;
  stack: string | undefined;
}

/**
 * Maps a failure inside a single meeting's analysis to the error kind
 * recorded on its result.
 */
export function classifyAnalysisError(err: unknown): ClassifiedError {
  const errorMessage = getErrorMessage(err);
  const stack = err instanceof Error ? err.stack : undefined;

  if (err instanceof ModelTimeoutError) {
    return { kind: "model_timeout", errorMessage, stack };
  }
  if (err instanceof ExternalServiceError) {
    return { kind: "model_call_failed", errorMessage, stack };
  }
  return { kind: "internal", errorMessage, stack };
}
