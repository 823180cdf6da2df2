/**
 * Error Handling Utilities
 *
 * Error taxonomy for the grid data viewer plus pure helpers that turn any
 * thrown value into a printable message.
 */

export type GridErrorKind = 'authentication' | 'validation' | 'network' | 'data-processing';

/**
 * Base class for every error the viewer raises on purpose.
 */
export class GridDataError extends Error {
  readonly kind: GridErrorKind;

  constructor(kind: GridErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Missing or rejected API key */
export class AuthenticationError extends GridDataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication', message, options);
  }
}

/** Malformed or missing input, unknown variable id */
export class ValidationError extends GridDataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('validation', message, options);
  }
}

/** Timeout, connection failure or non-OK HTTP status */
export class NetworkError extends GridDataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('network', message, options);
  }
}

/** Malformed data shape, unparseable timestamp or value, rendering failure */
export class DataProcessingError extends GridDataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('data-processing', message, options);
  }
}

export interface ErrorDescription {
  message: string;
  details?: string;
}

/**
 * Extract error message from error object or value
 * @param error - Error object, string, or any value
 * @returns Error message as string
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Type guard for the viewer's own errors
 */
export function isGridDataError(error: unknown): error is GridDataError {
  return error instanceof GridDataError;
}

/**
 * Human-readable headline for an error kind
 */
export function messageForKind(kind: GridErrorKind): string {
  switch (kind) {
    case 'authentication':
      return 'Authentication failed. Please check your API key.';
    case 'network':
      return 'Network error. Please check your internet connection.';
    case 'validation':
      return 'Invalid input. Please check the provided parameters.';
    case 'data-processing':
      return 'Error processing data. Please try again.';
  }
}

/**
 * Map an error to the message shown to the user.
 * Unknown errors fall back to their raw message; `details` carries the raw
 * message whenever it adds something to the headline.
 * @param error - Any thrown value
 * @returns Headline and optional detail line
 */
export function describeError(error: unknown): ErrorDescription {
  const raw = extractErrorMessage(error);
  const message = isGridDataError(error) ? messageForKind(error.kind) : raw;

  if (raw && raw !== message) {
    return { message, details: raw };
  }
  return { message };
}

/**
 * Format an error as the lines printed to the console
 */
export function formatErrorLines(error: unknown): string[] {
  const { message, details } = describeError(error);
  const lines = [`❌ Error: ${message}`];
  if (details) {
    lines.push(`   Details: ${details}`);
  }
  return lines;
}
