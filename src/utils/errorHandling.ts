/**
 * Error utilities for log metadata
 */

export interface ErrorDetails {
  message: string;
  stack?: string;
  name?: string;
  code?: string;
  status?: number;
  details?: Record<string, unknown>;
}

/**
 * Serialize an unknown thrown value to a plain object winston can render.
 * Provider SDK errors carry `status` and `code`; Postgres errors carry `code`.
 */
export function serializeError(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    const details: ErrorDetails = {
      message: error.message,
      name: error.name,
    };

    if (error.stack) {
      details.stack = error.stack;
    }

    const code: unknown = Reflect.get(error, 'code');
    if (code !== undefined && code !== null) {
      details.code = String(code);
    }

    const status: unknown = Reflect.get(error, 'status');
    if (typeof status === 'number') {
      details.status = status;
    }

    const additionalProps: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(error)) {
      if (['message', 'name', 'stack', 'code', 'status'].includes(key)) continue;
      const value: unknown = Reflect.get(error, key);
      if (typeof value !== 'function' && typeof value !== 'symbol') {
        additionalProps[key] = value;
      }
    }

    if (Object.keys(additionalProps).length > 0) {
      details.details = additionalProps;
    }

    return details;
  }

  return {
    message: String(error),
    name: 'UnknownError',
    details: { originalType: typeof error },
  };
}
