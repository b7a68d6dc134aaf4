/**
 * Utility functions for the sync engine
 */

import { v4 as uuidv4 } from 'uuid';
import type { Timestamp } from './types';
import { TransportError, errorMessage } from './errors';

/**
 * Current time in epoch milliseconds
 */
export function now(): Timestamp {
  return Date.now();
}

/**
 * Generate a unique, non-colliding identifier
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Split items into consecutive groups of at most `size`, keeping order
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new RangeError(`Chunk size must be positive, got ${size}`);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Debounce function for collapsing bursts of calls; `cancel` drops a pending call
 */
export function debounce<A extends unknown[]>(
  func: (...args: A) => void,
  delay: number
): ((...args: A) => void) & { cancel(): void } {
  let timeoutId: NodeJS.Timeout | null = null;

  const debounced = (...args: A): void => {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }

    timeoutId = setTimeout(() => {
      timeoutId = null;
      func(...args);
    }, delay);
  };

  return Object.assign(debounced, {
    cancel(): void {
      if (timeoutId) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
    },
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run an operation with a deadline. The signal handed to the operation is
 * aborted when the deadline passes; the returned promise rejects with a
 * timed-out TransportError.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TransportError(`${label} timed out after ${timeoutMs}ms`, undefined, true));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Serializes async critical sections in call order
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

const SENSITIVE_KEY = /password|token|secret|key|authorization|credential|auth/i;
export const MASKED_VALUE = '***MASKED***';

/**
 * Deep copy with sensitive-looking keys masked, for logs and error reports
 */
export function sanitizeForLogging(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => sanitizeForLogging(item));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? MASKED_VALUE : sanitizeForLogging(entry);
    }
    return result;
  }
  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON without letting SyntaxError escape
 */
export function safeJsonParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  if (minutes < 60) return rest === 0 ? `${minutes}m` : `${minutes}m ${rest}s`;
  const hours = Math.floor(minutes / 60);
  const restMinutes = minutes % 60;
  return restMinutes === 0 ? `${hours}h` : `${hours}h ${restMinutes}m`;
}
