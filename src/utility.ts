import { type Tracer } from '@opentelemetry/api';
import VError from 'verror';

function toVError (error: unknown, errorMessage: string, name?: string): VError {
  const cause = error instanceof Error ? error : null;
  return new VError({ cause, ...(name !== undefined ? { name } : {}) }, errorMessage);
}

export async function wrapError<T> (fn: () => Promise<T>, errorMessage: string, name?: string): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toVError(error, errorMessage, name);
  }
}

export function wrapErrorSync<T> (fn: () => T, errorMessage: string, name?: string): T {
  try {
    return fn();
  } catch (error) {
    throw toVError(error, errorMessage, name);
  }
}

export async function wrapSpan<T> (fn: () => Promise<T>, tracer: Tracer, spanName: string): Promise<T> {
  const span = tracer.startSpan(spanName);
  try {
    return await fn();
  } finally {
    span.end();
  }
}
