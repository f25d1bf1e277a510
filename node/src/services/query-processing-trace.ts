// src/services/query-processing-trace.ts
// Per-request stage timings (database, web, rank, generation) for logs.
import crypto from 'crypto';

export type StageName = 'database' | 'web' | 'rank' | 'generation';

export interface Span {
  name: StageName;
  durationMs: number;
  metadata?: Record<string, unknown>;
  error?: string;
}

export interface QueryProcessingTrace {
  traceId: string;
  startTime: number;
  endTime?: number;
  spans: Span[];
}

function generateTraceId(): string {
  return 'rq_' + crypto.randomBytes(8).toString('hex');
}

export function createTrace(): QueryProcessingTrace {
  return {
    traceId: generateTraceId(),
    startTime: Date.now(),
    spans: [],
  };
}

export function addSpan(
  trace: QueryProcessingTrace,
  name: StageName,
  startTime: number,
  options?: { metadata?: Record<string, unknown>; error?: string },
): void {
  trace.spans.push({
    name,
    durationMs: Date.now() - startTime,
    metadata: options?.metadata,
    error: options?.error,
  });
}

export function finishTrace(trace: QueryProcessingTrace): number {
  trace.endTime = Date.now();
  return trace.endTime - trace.startTime;
}
