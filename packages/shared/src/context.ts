/**
 * AsyncLocalStorage Context Management
 *
 * Carries the batch correlation ID and the document currently being
 * processed, so every log line can be traced back to its source file.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface BatchContext {
  correlationId: string;
  sourceFile?: string;
  section?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<BatchContext>();

/**
 * Get the current context
 */
export function getContext(): BatchContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: BatchContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run a function within a child of the current context, overriding some fields
 */
export function runWithChildContext<T>(overrides: Partial<BatchContext>, fn: () => T): T {
  const parent = getContext();
  return asyncLocalStorage.run(
    { correlationId: parent?.correlationId || ulid(), ...parent, ...overrides },
    fn
  );
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: BatchContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

export { asyncLocalStorage };
