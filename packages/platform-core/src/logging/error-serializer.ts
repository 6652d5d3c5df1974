export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function serializeError(error: unknown, depth = 0): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const extra: Record<string, unknown> = { ...error };
    if (typeof extra.code === 'string') {
      serialized.code = extra.code;
    }
    if (isRecord(extra.details)) {
      serialized.details = extra.details;
    }
    if (error.cause !== undefined && depth < 5) {
      serialized.cause = serializeError(error.cause, depth + 1);
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (isRecord(error)) {
    return {
      message: String(error.message || error.error || JSON.stringify(error)),
      name: typeof error.name === 'string' ? error.name : undefined,
      code: typeof error.code === 'string' ? error.code : undefined,
    };
  }

  return { message: String(error) };
}
