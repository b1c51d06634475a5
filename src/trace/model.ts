/**
 * Trace data model: events, spans and traces.
 *
 * A trace keeps its spans in one flat list; nesting is a `parentId`
 * reference resolved by lookup, never a pointer graph. Events are stored
 * in recording order inside their span and only sorted when a timeline is
 * requested.
 */

import { shortId, traceId as newTraceId } from '../utils/crypto.js';
import { epochSeconds } from '../utils/timer.js';
import { FormatError } from '../core/errors.js';
import {
  EventRecordSchema,
  SpanRecordSchema,
  TraceRecordSchema,
  describeIssues,
  type EventRecord,
  type ParsedSpanRecord,
} from './schema.js';
import type { EventDict, EventType, Payload, SpanDict, TraceDict } from './types.js';

// ═══════════════════════════════════════════════════════════════
// EVENT
// ═══════════════════════════════════════════════════════════════

export interface TraceEventInit {
  eventType: EventType;
  timestamp?: number;
  data?: Payload;
  eventId?: string;
}

export class TraceEvent {
  readonly eventType: EventType;
  readonly timestamp: number;
  readonly data: Payload;
  readonly eventId: string;

  constructor(init: TraceEventInit) {
    this.eventType = init.eventType;
    this.timestamp = init.timestamp ?? epochSeconds();
    this.data = init.data ?? {};
    this.eventId = init.eventId ?? shortId();
  }

  toDict(): EventDict {
    return {
      event_type: this.eventType,
      timestamp: this.timestamp,
      data: this.data,
      event_id: this.eventId,
    };
  }

  static fromDict(raw: unknown): TraceEvent {
    const parsed = EventRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FormatError(`Malformed event record: ${describeIssues(parsed.error)}`);
    }
    return TraceEvent.fromRecord(parsed.data);
  }

  /** @internal Build from an already validated record. */
  static fromRecord(record: EventRecord): TraceEvent {
    return new TraceEvent({
      eventType: record.event_type,
      timestamp: record.timestamp,
      data: record.data,
      eventId: record.event_id,
    });
  }
}

// ═══════════════════════════════════════════════════════════════
// SPAN
// ═══════════════════════════════════════════════════════════════

export interface SpanInit {
  name: string;
  spanId?: string;
  parentId?: string;
  startTime?: number;
  endTime?: number;
  events?: TraceEvent[];
  metadata?: Payload;
}

export class Span {
  readonly name: string;
  readonly spanId: string;
  readonly parentId?: string;
  readonly startTime: number;
  endTime?: number;
  readonly events: TraceEvent[];
  readonly metadata: Payload;

  constructor(init: SpanInit) {
    this.name = init.name;
    this.spanId = init.spanId ?? shortId();
    this.parentId = init.parentId;
    this.startTime = init.startTime ?? epochSeconds();
    this.endTime = init.endTime;
    this.events = init.events ?? [];
    this.metadata = init.metadata ?? {};
  }

  get duration(): number | undefined {
    if (this.endTime === undefined) return undefined;
    return this.endTime - this.startTime;
  }

  get isOpen(): boolean {
    return this.endTime === undefined;
  }

  addEvent(eventType: EventType, data?: Payload): TraceEvent {
    const event = new TraceEvent({ eventType, data });
    this.events.push(event);
    return event;
  }

  /** Stamps `endTime` with the current time. Closing again overwrites it. */
  close(): void {
    this.endTime = epochSeconds();
  }

  toDict(): SpanDict {
    return {
      name: this.name,
      span_id: this.spanId,
      parent_id: this.parentId ?? null,
      start_time: this.startTime,
      end_time: this.endTime ?? null,
      events: this.events.map((e) => e.toDict()),
      metadata: this.metadata,
    };
  }

  static fromDict(raw: unknown): Span {
    const parsed = SpanRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FormatError(`Malformed span record: ${describeIssues(parsed.error)}`);
    }
    return Span.fromRecord(parsed.data);
  }

  /** @internal Build from an already validated record. */
  static fromRecord(record: ParsedSpanRecord): Span {
    return new Span({
      name: record.name,
      spanId: record.span_id,
      parentId: record.parent_id,
      startTime: record.start_time,
      endTime: record.end_time,
      events: record.events.map((e) => TraceEvent.fromRecord(e)),
      metadata: record.metadata,
    });
  }
}

// ═══════════════════════════════════════════════════════════════
// TRACE
// ═══════════════════════════════════════════════════════════════

/** One entry of the canonical timeline: an event with the span that owns it. */
export interface TimelineEntry {
  span: Span;
  event: TraceEvent;
}

export interface TraceInit {
  traceId?: string;
  name?: string;
  startTime?: number;
  endTime?: number;
  spans?: Span[];
  metadata?: Payload;
}

export class Trace {
  readonly traceId: string;
  readonly name: string;
  readonly startTime: number;
  endTime?: number;
  readonly spans: Span[];
  readonly metadata: Payload;

  constructor(init: TraceInit = {}) {
    this.traceId = init.traceId ?? newTraceId();
    this.name = init.name ?? 'unnamed';
    this.startTime = init.startTime ?? epochSeconds();
    this.endTime = init.endTime;
    this.spans = init.spans ?? [];
    this.metadata = init.metadata ?? {};
  }

  get duration(): number | undefined {
    if (this.endTime === undefined) return undefined;
    return this.endTime - this.startTime;
  }

  get eventCount(): number {
    return this.spans.reduce((sum, span) => sum + span.events.length, 0);
  }

  /** Append a new open span. Names are not required to be unique. */
  addSpan(name: string, parentId?: string, metadata?: Payload): Span {
    const span = new Span({ name, parentId, metadata });
    this.spans.push(span);
    return span;
  }

  /**
   * Stamp `endTime` on the trace and close every span that is still open.
   * Already closed spans keep their end time; the trace's own end time is
   * overwritten on a repeat call.
   */
  close(): void {
    this.endTime = epochSeconds();
    for (const span of this.spans) {
      if (span.isOpen) span.close();
    }
  }

  getSpan(spanId: string): Span | undefined {
    return this.spans.find((s) => s.spanId === spanId);
  }

  /** Containment search: the first span holding an event with this id. */
  findSpanForEvent(eventId: string): Span | undefined {
    return this.spans.find((s) => s.events.some((e) => e.eventId === eventId));
  }

  /**
   * Every event paired with its span, sorted by timestamp. Ties keep the
   * flattening order (spans in storage order, then events in span order);
   * `Array.prototype.sort` is stable, which this relies on.
   */
  timeline(): TimelineEntry[] {
    const entries: TimelineEntry[] = [];
    for (const span of this.spans) {
      for (const event of span.events) {
        entries.push({ span, event });
      }
    }
    return entries.sort((a, b) => a.event.timestamp - b.event.timestamp);
  }

  allEvents(): TraceEvent[] {
    return this.timeline().map((entry) => entry.event);
  }

  /** Map of span id to the spans whose `parentId` points at it. Top-level spans sit under `null`. */
  childIndex(): Map<string | null, Span[]> {
    const known = new Set(this.spans.map((s) => s.spanId));
    const index = new Map<string | null, Span[]>();
    for (const span of this.spans) {
      const key = span.parentId !== undefined && known.has(span.parentId) ? span.parentId : null;
      const siblings = index.get(key);
      if (siblings) {
        siblings.push(span);
      } else {
        index.set(key, [span]);
      }
    }
    return index;
  }

  toDict(): TraceDict {
    return {
      trace_id: this.traceId,
      name: this.name,
      start_time: this.startTime,
      end_time: this.endTime ?? null,
      spans: this.spans.map((s) => s.toDict()),
      metadata: this.metadata,
    };
  }

  static fromDict(raw: unknown): Trace {
    const parsed = TraceRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FormatError(`Malformed trace record: ${describeIssues(parsed.error)}`);
    }
    const record = parsed.data;
    return new Trace({
      traceId: record.trace_id,
      name: record.name,
      startTime: record.start_time,
      endTime: record.end_time,
      spans: record.spans.map((s) => Span.fromRecord(s)),
      metadata: record.metadata,
    });
  }
}
