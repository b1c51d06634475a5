/**
 * Time-Travel Types
 *
 * Replay tape entries and the divergence records produced when two traces
 * of the same task are compared.
 */

import type { Span, TraceEvent } from '../trace/model.js';

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

export interface ReplayStep {
  span: Span;
  event: TraceEvent;
}

// ---------------------------------------------------------------------------
// Divergences
// ---------------------------------------------------------------------------

/**
 * - `critical`: behaviour changed (different event kind, tool or decision)
 * - `warning`: one trace has events the other lacks
 * - `info`: expected variance, such as different LLM wording
 */
export type Severity = 'critical' | 'warning' | 'info';

export interface Divergence {
  /** Index into both canonical timelines */
  position: number;
  description: string;
  severity: Severity;
  traceASpan: string;
  traceBSpan: string;
  traceAEvent: TraceEvent | null;
  traceBEvent: TraceEvent | null;
}

export type SeveritySummary = Record<Severity, number>;

/**
 * The parts of an event payload that the diff engine compares. Every other
 * kind is opaque and only compared by kind.
 */
export type ComparablePayload =
  | { kind: 'tool_call'; tool: unknown }
  | { kind: 'llm_response'; content: unknown }
  | { kind: 'decision'; choice: unknown }
  | { kind: 'opaque' };
