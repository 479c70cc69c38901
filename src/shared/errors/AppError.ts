/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Every app encounters two kinds of errors:
 *
 *   1. Operational errors — expected problems like "unknown collection",
 *      "upstream returned 503" or "collection name contains a slash". These
 *      are part of normal operation; they carry a proper HTTP status.
 *
 *   2. Programmer/system errors — a corrupt manifest, an unwritable data
 *      directory. These get a generic 500 and are logged for debugging.
 *
 * The `isOperational` flag distinguishes the two. The global error handler
 * (errorHandler.ts) checks this flag to decide how to respond.
 *
 * Why `Object.setPrototypeOf(this, new.target.prototype)`?
 *   When you `extends Error`, the prototype chain can break in some
 *   compilation targets, making `instanceof AppError` return false. This line
 *   fixes the chain so `err instanceof InvalidNameError` always works.
 *
 * The data-lake specific errors:
 *   - TransportError  — fetch failed (timeout, non-2xx, connection refused).
 *   - ParseError      — an upstream payload is unusable as a whole.
 *   - InvalidNameError — a collection/kind name failed sanitization.
 *   - StorageIOError  — a segment or manifest could not be read or written.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class InvalidNameError extends AppError {
  public readonly rawName: string;

  constructor(rawName: string, reason: string) {
    super(`Invalid name "${rawName}": ${reason}`, 400);
    this.rawName = rawName;
  }
}

export class TransportError extends AppError {
  public readonly url?: string;
  public readonly upstreamStatus?: number;

  constructor(message: string, details: { url?: string; status?: number; cause?: unknown } = {}) {
    super(message, 502);
    this.url = details.url;
    this.upstreamStatus = details.status;
    if (details.cause !== undefined) this.cause = details.cause;
  }
}

export class ParseError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

export class StorageIOError extends AppError {
  public readonly path?: string;

  constructor(message: string, details: { path?: string; cause?: unknown } = {}) {
    super(message, 500, false);
    this.path = details.path;
    if (details.cause !== undefined) this.cause = details.cause;
  }
}

/** Type + message of any thrown value, kept on run results for observability. */
export function errorDetail(err: unknown): { type: string; message: string } {
  if (err instanceof Error) {
    return { type: err.name, message: err.message };
  }
  return { type: 'UnknownError', message: String(err) };
}
