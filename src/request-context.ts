/**
 * Per-request state carried across awaits, read by the logger so every line
 * written while a JSON-RPC request is in flight names its session and id.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export interface RequestContext {
  sessionId?: string;
  /** JSON-RPC id of the request being handled. */
  requestId?: string | number;
  method?: string;
  /** `performance.now()` when the request entered the router. */
  startedAt?: number;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Runs `fn` with `context` layered over the enclosing one; fields left
 * undefined keep the outer value.
 */
export function runWithRequestContext<T>(
  context: RequestContext,
  fn: () => Promise<T>,
): Promise<T> {
  const outer = storage.getStore() ?? {};
  return storage.run(
    {
      sessionId: context.sessionId ?? outer.sessionId,
      requestId: context.requestId ?? outer.requestId,
      method: context.method ?? outer.method,
      startedAt: context.startedAt ?? outer.startedAt ?? performance.now(),
    },
    fn,
  );
}

export function getRequestContext(): RequestContext {
  return storage.getStore() ?? {};
}

/** Milliseconds since the current request started, or undefined outside one. */
export function requestElapsedMs(): number | undefined {
  const { startedAt } = getRequestContext();
  return startedAt === undefined ? undefined : Math.round(performance.now() - startedAt);
}
