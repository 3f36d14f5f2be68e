/**
 * Error utilities for better error handling and debugging
 */

export interface ErrorDetails {
  message: string;
  stack?: string;
  name?: string;
  code?: string;
  status?: number;
  details?: Record<string, unknown>;
  timestamp: string;
}

/**
 * Serialize an error object to a plain object with all relevant details
 */
export function serializeError(error: unknown): ErrorDetails {
  const timestamp = new Date().toISOString();
  if (error instanceof Error) {
    const details: ErrorDetails = {
      message: error.message,
      name: error.name,
      timestamp,
    };

    if (error.stack) {
      details.stack = error.stack;
    }

    if ('code' in error && error.code !== undefined) {
      details.code = String(error.code);
    }

    if ('status' in error && typeof error.status === 'number') {
      details.status = error.status;
    }

    if (error.cause !== undefined) {
      details.details = {
        cause: error.cause instanceof Error ? error.cause.message : String(error.cause),
      };
    }

    return details;
  }

  return {
    message: String(error),
    name: 'UnknownError',
    timestamp,
    details: {
      originalType: typeof error,
    },
  };
}

/**
 * Create a Google Cloud Storage specific error handler
 */
export function handleGCSError(error: unknown, context: Record<string, unknown> = {}): ErrorDetails {
  const errorDetails = serializeError(error);

  const hints: string[] = [];
  if (errorDetails.code === '403' || errorDetails.status === 403) {
    hints.push('Check that the service account can write to the bucket');
  }
  if (errorDetails.code === '404' || errorDetails.status === 404) {
    hints.push('Check that STORAGE_BUCKET_NAME names an existing bucket');
  }

  return {
    ...errorDetails,
    details: {
      ...errorDetails.details,
      ...context,
      ...(hints.length && { hints }),
    },
  };
}
