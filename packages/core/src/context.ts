/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and run metadata through every stage of a
 * pipeline run, including tasks scheduled on the worker pools.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RunContext {
  correlationId: string;
  runId?: string;
  documentName?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context
 */
export function getContext(): RunContext | undefined {
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
 * Build a fresh context for a pipeline run
 */
export function createRunContext(documentName?: string): RunContext {
  const id = ulid();
  return { correlationId: id, runId: `run_${id}`, documentName };
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}
