/**
 * ReplayEngine — step-through replay of a recorded trace
 *
 * Builds the tape once (the trace's canonical timeline) and moves a cursor
 * over it. Reaching either end is an expected condition and yields `null`
 * rather than an error.
 *
 * @example
 * ```typescript
 * const engine = ReplayEngine.fromFile('trace.jsonl');
 * while (engine.hasNext()) {
 *   const step = engine.step();
 *   if (step) console.log(`[${step.span.name}] ${step.event.eventType}`);
 * }
 * ```
 */

import { getLogger } from '../core/logger.js';
import { ReplayRangeError } from '../core/errors.js';
import { loadTrace } from '../trace/store.js';
import type { Trace } from '../trace/model.js';
import type { ReplayStep } from './types.js';

// ═══════════════════════════════════════════════════════════════
// REPLAY ENGINE
// ═══════════════════════════════════════════════════════════════

export class ReplayEngine {
  readonly trace: Trace;
  private steps: ReplayStep[];
  private cursor = 0;

  constructor(trace: Trace) {
    this.trace = trace;
    this.steps = trace.timeline();
    getLogger().debug({ traceId: trace.traceId, steps: this.steps.length }, 'Replay tape built');
  }

  static fromFile(path: string): ReplayEngine {
    return new ReplayEngine(loadTrace(path));
  }

  get totalSteps(): number {
    return this.steps.length;
  }

  /** Cursor position, in `[0, totalSteps]` */
  get position(): number {
    return this.cursor;
  }

  get tape(): readonly ReplayStep[] {
    return this.steps;
  }

  hasNext(): boolean {
    return this.cursor < this.steps.length;
  }

  hasPrev(): boolean {
    return this.cursor > 0;
  }

  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------

  /** Return the step at the cursor and advance, or `null` at the end. */
  step(): ReplayStep | null {
    if (!this.hasNext()) return null;
    const result = this.steps[this.cursor];
    this.cursor++;
    return result;
  }

  /** Move back one and return the step now under the cursor, or `null` at the start. */
  stepBack(): ReplayStep | null {
    if (!this.hasPrev()) return null;
    this.cursor--;
    return this.steps[this.cursor];
  }

  peek(): ReplayStep | null {
    if (!this.hasNext()) return null;
    return this.steps[this.cursor];
  }

  /**
   * Move the cursor to `target` when `0 <= target < totalSteps`. Out-of-range
   * targets return `null` and leave the cursor where it was.
   */
  jump(target: number): ReplayStep | null {
    if (!Number.isInteger(target) || target < 0 || target >= this.steps.length) {
      return null;
    }
    this.cursor = target;
    return this.steps[this.cursor];
  }

  /** Like `jump`, but an out-of-range target throws `ReplayRangeError`. */
  seek(target: number): ReplayStep {
    const result = this.jump(target);
    if (!result) {
      throw new ReplayRangeError(target, this.steps.length);
    }
    return result;
  }

  reset(): void {
    this.cursor = 0;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * All steps belonging to the span under the cursor. Past the end, the span
   * of the last step is used.
   */
  currentSpanEvents(): ReplayStep[] {
    if (this.steps.length === 0) return [];
    const anchor = this.steps[Math.min(this.cursor, this.steps.length - 1)];
    const spanId = anchor.span.spanId;
    return this.steps.filter((s) => s.span.spanId === spanId);
  }

  /**
   * Tape indexes whose span name, event kind or JSON payload contains `query`,
   * compared case-insensitively.
   */
  search(query: string): number[] {
    const needle = query.toLowerCase();
    const results: number[] = [];
    this.steps.forEach(({ span, event }, i) => {
      const searchable = `${span.name} ${event.eventType} ${JSON.stringify(event.data)}`;
      if (searchable.toLowerCase().includes(needle)) {
        results.push(i);
      }
    });
    return results;
  }
}
