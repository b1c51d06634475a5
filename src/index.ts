/**
 * agent-replay — record, replay and diff AI agent execution traces
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { Recorder, ReplayEngine, diffTraces } from 'agent-replay';
 *
 * const rec = new Recorder('research-agent');
 * rec.span('tool-use', () => rec.toolCall('search', { query: 'capital of France' }));
 * const trace = rec.finish();
 *
 * const engine = new ReplayEngine(trace);
 * console.log(engine.step()?.event.eventType); // 'tool_call'
 * console.log(diffTraces(trace, trace).identical); // true
 * ```
 */

// Core
export { ConfigManager } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  AgentReplayError,
  ConfigError,
  FormatError,
  ReplayRangeError,
  NotFoundError,
} from './core/errors.js';
export {
  AgentReplayConfigSchema,
  type AgentReplayConfig,
  type AgentReplayConfigInput,
  type ExportFormat,
} from './core/types.js';

// Trace model, persistence and recording
export * from './trace/index.js';

// Replay and diff
export * from './time-travel/index.js';

// Presentation
export { TraceViewer, EVENT_ICONS, type ViewerOptions } from './cli/viewer.js';
export { createCLI, main } from './cli/index.js';

export { VERSION, NAME } from './version.js';
