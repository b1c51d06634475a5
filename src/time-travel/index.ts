/**
 * Time-travel debugging over recorded traces: step through one run, or
 * compare two runs of the same task and find where they first split.
 *
 * @example
 * ```typescript
 * import { ReplayEngine, diffTraces, loadTrace } from 'agent-replay';
 *
 * const engine = ReplayEngine.fromFile('run-a.jsonl');
 * engine.jump(3);
 * console.log(engine.peek()?.event.eventType);
 *
 * const result = diffTraces(loadTrace('run-a.jsonl'), loadTrace('run-b.jsonl'));
 * console.log(result.summary);
 * ```
 */

export { ReplayEngine } from './replayer.js';
export { DivergenceAnalyzer, DiffResult, diffTraces, comparablePayload } from './diff-analyzer.js';
export type { DivergenceDict, DiffResultDict } from './diff-analyzer.js';
export type {
  ReplayStep,
  Severity,
  Divergence,
  SeveritySummary,
  ComparablePayload,
} from './types.js';
