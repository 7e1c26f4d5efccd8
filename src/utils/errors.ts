import axios from 'axios';
import { z } from 'zod';

export class SchemaMismatchError extends Error {
  constructor(readonly source: string, readonly issues: z.ZodIssue[]) {
    super(`${source} schema mismatch`);
    this.name = 'SchemaMismatchError';
  }
}

/**
 * Validates an external payload, throwing SchemaMismatchError with the zod issues attached.
 */
export function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  source: string
): z.output<T> {
  const parsed = schema.safeParse(data);

  if (!parsed.success) {
    throw new SchemaMismatchError(source, parsed.error.issues);
  }

  return parsed.data;
}

export interface ErrorSummary {
  message: string;
  code?: string;
  status?: number;
}

// Flattens axios/zod/node errors into a small object for structured logs
export function describeError(err: unknown): ErrorSummary {
  if (axios.isAxiosError(err)) {
    return {
      message: err.message,
      code: err.code,
      status: err.response?.status,
    };
  }

  if (err instanceof Error) {
    return { message: err.message };
  }

  return { message: String(err) };
}
