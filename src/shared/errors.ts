/**
 * Service Errors
 * Typed failures returned inside Result values by the engine and the generation facade
 */

import type { ZodError } from 'zod';

export type ServiceErrorType =
  | 'STORE_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'INVALID_TRANSITION'
  | 'NO_MODEL_AVAILABLE'
  | 'GENERATION_FAILED';

export interface ServiceError {
  type: ServiceErrorType;
  message: string;
  details: Record<string, unknown>;
  recoverable: boolean;
}

function causeMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function storeError(operation: string, table: string, cause: unknown): ServiceError {
  return {
    type: 'STORE_ERROR',
    message: `Store operation ${operation} on ${table} failed: ${causeMessage(cause)}`,
    details: { operation, table },
    recoverable: true,
  };
}

export function notFoundError(entity: string, id: string): ServiceError {
  return {
    type: 'NOT_FOUND',
    message: `${entity} ${id} was not found`,
    details: { entity, id },
    recoverable: false,
  };
}

export function validationError(error: ZodError | string): ServiceError {
  if (typeof error === 'string') {
    return { type: 'VALIDATION_ERROR', message: error, details: {}, recoverable: false };
  }
  const flattened = error.flatten();
  return {
    type: 'VALIDATION_ERROR',
    message: 'Invalid input',
    details: { formErrors: flattened.formErrors, fieldErrors: flattened.fieldErrors },
    recoverable: false,
  };
}

export function invalidTransitionError(entity: string, from: string, to: string): ServiceError {
  return {
    type: 'INVALID_TRANSITION',
    message: `${entity} cannot move from ${from} to ${to}`,
    details: { entity, from, to },
    recoverable: false,
  };
}

export function noModelAvailableError(requestedModel: string): ServiceError {
  return {
    type: 'NO_MODEL_AVAILABLE',
    message: 'No AI models available: configure at least one text generation provider',
    details: { requestedModel },
    recoverable: false,
  };
}

export function generationFailedError(model: string, cause: unknown): ServiceError {
  return {
    type: 'GENERATION_FAILED',
    message: `Content generation failed: ${causeMessage(cause)}`,
    details: { model },
    recoverable: true,
  };
}
