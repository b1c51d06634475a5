import { Span, Trace, TraceEvent } from '../../src/trace/model.js';
import type { EventType, Payload } from '../../src/trace/types.js';

export type EventSpec = [EventType, Payload?, number?];

export interface SpanSpec {
  name: string;
  spanId?: string;
  parentId?: string;
  events: EventSpec[];
}

/**
 * Build a trace with explicit timestamps. Events without a timestamp get
 * 1000, 1001, ... in declaration order across all spans.
 */
export function makeTrace(name: string, spans: SpanSpec[], traceId = `trace-${name}`): Trace {
  let clock = 1000;
  const built = spans.map(
    (spec) =>
      new Span({
        name: spec.name,
        spanId: spec.spanId,
        parentId: spec.parentId,
        startTime: 1000,
        endTime: 2000,
        events: spec.events.map(([eventType, data, timestamp]) => {
          const event = new TraceEvent({ eventType, data: data ?? {}, timestamp: timestamp ?? clock });
          clock++;
          return event;
        }),
      }),
  );
  return new Trace({ traceId, name, startTime: 1000, endTime: 2000, spans: built });
}
