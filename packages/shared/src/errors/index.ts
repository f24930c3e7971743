// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { sanitizeProviderErrorMessage } from '../utils/index.js';

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class CoachError extends Error {
  abstract readonly code: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Authentication Errors
// ============================================================================

export class AuthenticationError extends CoachError {
  readonly code = 'AUTH_ERROR';

  static notAuthenticated(): AuthenticationError {
    return new AuthenticationError('Not authenticated. Provide a bearer token.');
  }

  static invalidToken(): AuthenticationError {
    return new AuthenticationError('Invalid bearer token.');
  }
}

// ============================================================================
// Permission Errors
// ============================================================================

export class PermissionError extends CoachError {
  readonly code = 'PERMISSION_ERROR';
  readonly permissionType: string;
  readonly resource: string;

  constructor(permissionType: string, resource: string, message?: string) {
    super(message || `Permission denied: ${permissionType} for ${resource}`);
    this.permissionType = permissionType;
    this.resource = resource;
  }

  static notOwner(entity: string, id: string): PermissionError {
    return new PermissionError('ownership', `${entity}:${id}`, `Access denied to ${entity} "${id}"`);
  }

  static invalidExecutionToken(toolRunId: string): PermissionError {
    return new PermissionError('execution_token', toolRunId, 'Invalid execution token');
  }

  static missingEntitlement(entitlement: string, toolId: string): PermissionError {
    return new PermissionError(
      'entitlement',
      toolId,
      `Insufficient entitlements: "${toolId}" requires "${entitlement}"`,
    );
  }
}

// ============================================================================
// Lookup and State Errors
// ============================================================================

export class NotFoundError extends CoachError {
  readonly code = 'NOT_FOUND';
  readonly entity: string;

  constructor(entity: string, id: string) {
    super(`${entity} "${id}" not found.`, { entity, id });
    this.entity = entity;
  }
}

export class ConflictError extends CoachError {
  readonly code = 'CONFLICT';

  static alreadyTerminal(toolRunId: string, status: string): ConflictError {
    return new ConflictError(`Tool run "${toolRunId}" is already ${status}`, { toolRunId, status });
  }
}

export class RateLimitError extends CoachError {
  readonly code = 'RATE_LIMITED';
  readonly retryAfterSec: number;

  constructor(message: string, retryAfterSec: number, context?: Record<string, unknown>) {
    super(message, context);
    this.retryAfterSec = retryAfterSec;
  }

  static exceeded(scope: string, retryAfterSec: number): RateLimitError {
    return new RateLimitError(`Rate limit exceeded for ${scope}`, retryAfterSec, { scope });
  }
}

// ============================================================================
// Provider Errors
// ============================================================================

export class ProviderError extends CoachError {
  readonly code = 'PROVIDER_ERROR';
  readonly provider: string;
  readonly statusCode?: number;
  readonly retryable: boolean;

  constructor(
    provider: string,
    message: string,
    statusCode?: number,
    context?: Record<string, unknown>,
    retryable = false,
  ) {
    super(message, context);
    this.provider = provider;
    this.statusCode = statusCode;
    this.retryable = retryable;
  }

  static rateLimit(provider: string): ProviderError {
    return new ProviderError(provider, 'Rate limit exceeded. Please try again later.', 429, undefined, true);
  }

  static modelNotFound(provider: string, model: string): ProviderError {
    return new ProviderError(provider, `Model "${model}" not found or not available.`, 404, { model });
  }

  static requestFailed(provider: string, statusCode: number, message?: string): ProviderError {
    const normalized = message ? sanitizeProviderErrorMessage(message) : undefined;
    return new ProviderError(
      provider,
      normalized || `Request failed with status ${statusCode}`,
      statusCode,
      undefined,
      statusCode >= 500,
    );
  }

  static streamError(provider: string, reason?: string): ProviderError {
    return new ProviderError(provider, `Stream error${reason ? `: ${reason}` : ''}`);
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

/**
 * Failure classes shared with the retry policy. Only the transient ones
 * (`unavailable`, `deadline_exceeded`, `resource_exhausted`, `aborted`,
 * `internal`) are ever retried.
 */
export type StorageErrorKind =
  | 'unavailable'
  | 'deadline_exceeded'
  | 'resource_exhausted'
  | 'aborted'
  | 'internal'
  | 'not_found'
  | 'already_exists'
  | 'permission_denied'
  | 'invalid_argument';

export class StorageError extends CoachError {
  readonly code = 'STORAGE_ERROR';
  readonly kind: StorageErrorKind;

  constructor(message: string, kind: StorageErrorKind = 'internal', context?: Record<string, unknown>) {
    super(message, context);
    this.kind = kind;
  }

  static notFound(entity: string, id: string): StorageError {
    return new StorageError(`${entity} with id "${id}" not found.`, 'not_found', { entity, id });
  }

  static saveFailed(entity: string, reason?: string, kind: StorageErrorKind = 'internal'): StorageError {
    return new StorageError(`Failed to save ${entity}${reason ? `: ${reason}` : ''}`, kind, { entity });
  }

  static busy(reason?: string): StorageError {
    return new StorageError(`Database busy${reason ? `: ${reason}` : ''}`, 'unavailable');
  }

  static connectionFailed(reason?: string): StorageError {
    return new StorageError(`Database connection failed${reason ? `: ${reason}` : ''}`, 'unavailable');
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends CoachError {
  readonly code = 'VALIDATION_ERROR';
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, context);
    this.field = field;
  }

  static invalid(field: string, reason?: string): ValidationError {
    return new ValidationError(`Invalid ${field}${reason ? `: ${reason}` : ''}`, field);
  }
}

// ============================================================================
// Network Errors
// ============================================================================

export class NetworkError extends CoachError {
  readonly code = 'NETWORK_ERROR';
  readonly url?: string;
  readonly statusCode?: number;

  constructor(message: string, url?: string, statusCode?: number) {
    super(message, { url, statusCode });
    this.url = url;
    this.statusCode = statusCode;
  }

  static connectionFailed(url?: string, reason?: string): NetworkError {
    return new NetworkError(`Network connection failed${reason ? `: ${reason}` : ''}`, url);
  }

  static requestFailed(url: string, statusCode: number, message?: string): NetworkError {
    return new NetworkError(message || `Request failed (${statusCode})`, url, statusCode);
  }
}

// ============================================================================
// Error Type Guards
// ============================================================================

export function isCoachError(error: unknown): error is CoachError {
  return error instanceof CoachError;
}

// ============================================================================
// HTTP Mapping
// ============================================================================

export function httpStatusForError(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof AuthenticationError) return 401;
  if (error instanceof PermissionError) return 403;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof StorageError && error.kind === 'not_found') return 404;
  if (error instanceof ConflictError) return 409;
  if (error instanceof RateLimitError) return 429;
  if (error instanceof ProviderError && error.statusCode === 429) return 503;
  return 500;
}

// ============================================================================
// Error Wrapping
// ============================================================================

class UnknownError extends CoachError {
  readonly code = 'UNKNOWN_ERROR';
}

export function wrapError(error: unknown, fallbackMessage = 'An unexpected error occurred'): CoachError {
  if (isCoachError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new UnknownError(error.message || fallbackMessage, { originalError: error.name });
  }

  return new UnknownError(String(error) || fallbackMessage);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
