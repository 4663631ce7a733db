// src/lib/billing/utils/request-context.ts
import { v4 as uuidv4 } from 'uuid';

/**
 * Per-request bookkeeping, created at the edge and passed along explicitly.
 * Nothing here is shared between requests.
 */
export interface RequestContext {
  requestId: string;
  startedAt: number;
  marks: Map<string, number>;
}

export function createRequestContext(requestId?: string, now: () => number = Date.now): RequestContext {
  return {
    requestId: requestId || uuidv4(),
    startedAt: now(),
    marks: new Map()
  };
}

/** Records the time elapsed since the request started under `name`. */
export function mark(context: RequestContext, name: string, now: () => number = Date.now): number {
  const elapsed = now() - context.startedAt;
  context.marks.set(name, elapsed);
  return elapsed;
}

export function elapsedMs(context: RequestContext, now: () => number = Date.now): number {
  return now() - context.startedAt;
}
