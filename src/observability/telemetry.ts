import { AsyncLocalStorage } from 'node:async_hooks';
import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

type TraceContext = {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
};

const traceStore = new AsyncLocalStorage<TraceContext>();

function randomHex(size: number) {
  return crypto.randomBytes(size).toString('hex');
}

export function getTraceContext() {
  return traceStore.getStore();
}

const TRACEPARENT = /^([\da-f]{2})-([\da-f]{32})-([\da-f]{16})-[\da-f]{2}$/;
const ZERO_TRACE_ID = '0'.repeat(32);
const ZERO_SPAN_ID = '0'.repeat(16);

/** W3C trace context header; malformed or all-zero ids yield undefined. */
export function parseTraceparent(header: string | undefined): { traceId: string; parentSpanId: string } | undefined {
  const match = header ? TRACEPARENT.exec(header.trim().toLowerCase()) : null;
  if (!match) return undefined;
  const [, version, traceId, parentSpanId] = match;
  if (version === 'ff' || !traceId || !parentSpanId || traceId === ZERO_TRACE_ID || parentSpanId === ZERO_SPAN_ID) {
    return undefined;
  }
  return { traceId, parentSpanId };
}

export function createTraceMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = parseTraceparent(req.header('traceparent'));
    const traceId = incoming?.traceId ?? randomHex(16);
    const spanId = randomHex(8);
    const ctx: TraceContext = { traceId, spanId, parentSpanId: incoming?.parentSpanId };
    req.traceId = traceId;
    res.setHeader('traceparent', `00-${traceId}-${spanId}-01`);
    traceStore.run(ctx, next);
  };
}

/** Runs background work under a new span, child of the active one if any. */
export function runInSpan<T>(fn: () => Promise<T>): Promise<T> {
  const parent = traceStore.getStore();
  const context: TraceContext = {
    traceId: parent?.traceId ?? randomHex(16),
    spanId: randomHex(8),
    parentSpanId: parent?.spanId
  };
  return traceStore.run(context, fn);
}
