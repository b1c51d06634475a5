/**
 * DivergenceAnalyzer — trace-to-trace comparison
 *
 * Walks the canonical timelines of two traces in lockstep and classifies
 * each difference by severity. Alignment is purely positional: an event
 * inserted or dropped mid-run makes every later index diverge as well,
 * since there is no resynchronisation step.
 */

import { getLogger } from '../core/logger.js';
import type { Trace, TraceEvent } from '../trace/model.js';
import type { EventDict } from '../trace/types.js';
import type { ComparablePayload, Divergence, Severity, SeveritySummary } from './types.js';

// ═══════════════════════════════════════════════════════════════
// DIFF RESULT
// ═══════════════════════════════════════════════════════════════

export interface DivergenceDict {
  position: number;
  description: string;
  severity: Severity;
  trace_a_span: string;
  trace_b_span: string;
  trace_a_event: EventDict | null;
  trace_b_event: EventDict | null;
}

export interface DiffResultDict {
  trace_a_id: string;
  trace_b_id: string;
  identical: boolean;
  divergence_count: number;
  critical_count: number;
  summary: string;
  divergences: DivergenceDict[];
}

export class DiffResult {
  constructor(
    readonly traceAId: string,
    readonly traceBId: string,
    readonly divergences: Divergence[],
    readonly summary: string,
  ) {}

  get identical(): boolean {
    return this.divergences.length === 0;
  }

  get criticalCount(): number {
    return this.divergences.filter((d) => d.severity === 'critical').length;
  }

  toDict(): DiffResultDict {
    return {
      trace_a_id: this.traceAId,
      trace_b_id: this.traceBId,
      identical: this.identical,
      divergence_count: this.divergences.length,
      critical_count: this.criticalCount,
      summary: this.summary,
      divergences: this.divergences.map((d) => ({
        position: d.position,
        description: d.description,
        severity: d.severity,
        trace_a_span: d.traceASpan,
        trace_b_span: d.traceBSpan,
        trace_a_event: d.traceAEvent ? d.traceAEvent.toDict() : null,
        trace_b_event: d.traceBEvent ? d.traceBEvent.toDict() : null,
      })),
    };
  }
}

// ═══════════════════════════════════════════════════════════════
// PAYLOAD NARROWING
// ═══════════════════════════════════════════════════════════════

export function comparablePayload(event: TraceEvent): ComparablePayload {
  const { data } = event;
  switch (event.eventType) {
    case 'tool_call':
      return { kind: 'tool_call', tool: data.tool ?? null };
    case 'llm_response':
      // An explicit null is a value of its own, only a missing field reads as ''
      return { kind: 'llm_response', content: Object.hasOwn(data, 'content') ? data.content : '' };
    case 'decision':
      return { kind: 'decision', choice: data.choice ?? null };
    default:
      return { kind: 'opaque' };
  }
}

// ═══════════════════════════════════════════════════════════════
// DIVERGENCE ANALYZER
// ═══════════════════════════════════════════════════════════════

export class DivergenceAnalyzer {
  // ---------------------------------------------------------------------------
  // Analysis
  // ---------------------------------------------------------------------------

  diff(traceA: Trace, traceB: Trace): DiffResult {
    const eventsA = traceA.allEvents();
    const eventsB = traceB.allEvents();
    const divergences: Divergence[] = [];
    const maxLen = Math.max(eventsA.length, eventsB.length);

    for (let i = 0; i < maxLen; i++) {
      const a = i < eventsA.length ? eventsA[i] : null;
      const b = i < eventsB.length ? eventsB[i] : null;

      if (!a && b) {
        divergences.push({
          position: i,
          description: `Trace B has extra event: ${b.eventType}`,
          severity: 'warning',
          traceASpan: '',
          traceBSpan: spanNameFor(traceB, b),
          traceAEvent: null,
          traceBEvent: b,
        });
        continue;
      }

      if (a && !b) {
        divergences.push({
          position: i,
          description: `Trace A has extra event: ${a.eventType}`,
          severity: 'warning',
          traceASpan: spanNameFor(traceA, a),
          traceBSpan: '',
          traceAEvent: a,
          traceBEvent: null,
        });
        continue;
      }

      if (!a || !b) continue;

      const found = this.compareEvents(a, b);
      if (found) {
        divergences.push({
          position: i,
          description: found.description,
          severity: found.severity,
          traceASpan: spanNameFor(traceA, a),
          traceBSpan: spanNameFor(traceB, b),
          traceAEvent: a,
          traceBEvent: b,
        });
      }
    }

    const result = new DiffResult(traceA.traceId, traceB.traceId, divergences, summarize(divergences));
    getLogger().debug(
      {
        traceA: traceA.traceId,
        traceB: traceB.traceId,
        divergences: divergences.length,
        critical: result.criticalCount,
      },
      'Trace diff complete',
    );
    return result;
  }

  /**
   * Compare two events found at the same position. A kind mismatch is
   * reported on its own; payloads are only compared for matching kinds.
   */
  compareEvents(a: TraceEvent, b: TraceEvent): { description: string; severity: Severity } | null {
    if (a.eventType !== b.eventType) {
      return {
        description: `Event type divergence: ${a.eventType} vs ${b.eventType}`,
        severity: 'critical',
      };
    }

    const pa = comparablePayload(a);
    const pb = comparablePayload(b);

    switch (pa.kind) {
      case 'tool_call':
        if (pb.kind === 'tool_call' && !sameValue(pa.tool, pb.tool)) {
          return {
            description: `Different tool called: ${formatValue(pa.tool)} vs ${formatValue(pb.tool)}`,
            severity: 'critical',
          };
        }
        return null;
      case 'llm_response':
        if (pb.kind === 'llm_response' && !sameValue(pa.content, pb.content)) {
          return { description: 'LLM response content differs', severity: 'info' };
        }
        return null;
      case 'decision':
        if (pb.kind === 'decision' && !sameValue(pa.choice, pb.choice)) {
          return {
            description: `Decision divergence: '${formatValue(pa.choice)}' vs '${formatValue(pb.choice)}'`,
            severity: 'critical',
          };
        }
        return null;
      case 'opaque':
        return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Root cause
  // ---------------------------------------------------------------------------

  /** The earliest divergence: where the two runs first split. */
  findFirstDivergence(result: DiffResult): Divergence | null {
    return result.divergences[0] ?? null;
  }

  // ---------------------------------------------------------------------------
  // Severity summary
  // ---------------------------------------------------------------------------

  getSeveritySummary(divergences: Divergence[]): SeveritySummary {
    const summary: SeveritySummary = { critical: 0, warning: 0, info: 0 };
    for (const d of divergences) {
      summary[d.severity]++;
    }
    return summary;
  }

  // ---------------------------------------------------------------------------
  // Reporting
  // ---------------------------------------------------------------------------

  /**
   * Generate a human-readable markdown report for a diff result.
   */
  generateReport(result: DiffResult): string {
    const lines: string[] = [
      '# Trace Diff Report',
      '',
      `- **Trace A:** \`${result.traceAId}\``,
      `- **Trace B:** \`${result.traceBId}\``,
      '',
      result.summary,
      '',
    ];

    if (result.identical) {
      return lines.join('\n');
    }

    const summary = this.getSeveritySummary(result.divergences);
    lines.push('## Severity Summary');
    lines.push('');
    lines.push('| Severity | Count |');
    lines.push('|----------|-------|');
    lines.push(`| Critical | ${summary.critical} |`);
    lines.push(`| Warning  | ${summary.warning} |`);
    lines.push(`| Info     | ${summary.info} |`);
    lines.push('');

    const first = this.findFirstDivergence(result);
    if (first) {
      lines.push('## First Divergence');
      lines.push('');
      lines.push(`Position ${first.position}: ${first.description}`);
      lines.push('');
      lines.push(`- **Span A:** ${first.traceASpan || '(none)'}`);
      lines.push(`- **Span B:** ${first.traceBSpan || '(none)'}`);
      lines.push(`- **Severity:** ${first.severity}`);
      lines.push('');
    }

    lines.push('## Divergences');
    lines.push('');
    result.divergences.forEach((d, i) => {
      lines.push(`${i + 1}. **${d.severity.toUpperCase()}** at position ${d.position}: ${d.description}`);
    });
    lines.push('');

    return lines.join('\n');
  }
}

/** Convenience wrapper around `DivergenceAnalyzer.diff`. */
export function diffTraces(traceA: Trace, traceB: Trace): DiffResult {
  return new DivergenceAnalyzer().diff(traceA, traceB);
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function spanNameFor(trace: Trace, event: TraceEvent): string {
  return trace.findSpanForEvent(event.eventId)?.name ?? 'unknown';
}

function summarize(divergences: Divergence[]): string {
  const n = divergences.length;
  if (n === 0) {
    return 'Traces are identical in structure and content.';
  }
  const critical = divergences.filter((d) => d.severity === 'critical').length;
  return `Found ${n} divergence(s): ${critical} critical, ${n - critical} informational.`;
}

/** Structural equality over JSON values. Object key order does not matter. */
export function sameValue(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => sameValue(item, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => Object.hasOwn(b, key) && sameValue(a[key], b[key]));
  }
  return false;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '(none)';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}
