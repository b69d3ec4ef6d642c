import { v4 as uuidv4 } from 'uuid';

type SpanAttributes = Record<string, string | number | boolean>;

/** Per-turn correlation data carried from the channel edge to the commit */
export interface TraceContext {
  requestId: string;
  conversationKey?: string;
  channel?: string;
  tenantId?: string;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: SpanAttributes;
  status: 'ok' | 'error';
}

export function createTraceContext(fields: Omit<Partial<TraceContext>, 'spans'> = {}): TraceContext {
  const { requestId = uuidv4(), conversationKey, channel, tenantId } = fields;
  return { requestId, conversationKey, channel, tenantId, spans: [] };
}

/** Time `fn` as a named span on the trace; the span is marked failed if it throws */
export async function withSpan<T>(
  ctx: TraceContext,
  name: string,
  fn: (span: SpanRecord) => Promise<T>,
  attributes: SpanAttributes = {},
): Promise<T> {
  const span: SpanRecord = { name, startTime: Date.now(), attributes, status: 'ok' };
  ctx.spans.push(span);
  try {
    return await fn(span);
  } catch (err) {
    span.status = 'error';
    throw err;
  } finally {
    span.endTime = Date.now();
  }
}

/**
 * Milliseconds spent per span name, summed over repeats (a regenerated
 * attempt classifies twice). Open spans are left out.
 */
export function spanTimings(ctx: TraceContext): Record<string, number> {
  const timings: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.endTime === undefined) continue;
    timings[span.name] = (timings[span.name] ?? 0) + (span.endTime - span.startTime);
  }
  return timings;
}
