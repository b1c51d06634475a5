/**
 * Trace Types
 *
 * Event kinds and the snake_case wire shapes written to trace files.
 * Field names and nesting here are a file-format contract: existing trace
 * files must keep loading, so rename nothing.
 */

// ---------------------------------------------------------------------------
// Event kinds
// ---------------------------------------------------------------------------

export const EVENT_TYPES = [
  'llm_request',
  'llm_response',
  'tool_call',
  'tool_result',
  'decision',
  'state_change',
  'error',
  'log',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type Payload = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

export interface EventDict {
  event_type: EventType;
  timestamp: number;
  data: Payload;
  event_id: string;
}

export interface SpanDict {
  name: string;
  span_id: string;
  parent_id: string | null;
  start_time: number;
  end_time: number | null;
  events: EventDict[];
  metadata: Payload;
}

export interface TraceDict {
  trace_id: string;
  name: string;
  start_time: number;
  end_time: number | null;
  spans: SpanDict[];
  metadata: Payload;
}

/** First line of a `.jsonl` trace file */
export interface TraceHeaderRecord {
  type: 'trace_header';
  trace_id: string;
  name: string;
  start_time: number;
  end_time: number | null;
  metadata: Payload;
}

/** One line per span after the header */
export type SpanRecord = { type: 'span' } & SpanDict;
