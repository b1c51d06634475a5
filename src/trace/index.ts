export { TraceEvent, Span, Trace } from './model.js';
export type { TraceEventInit, SpanInit, TraceInit, TimelineEntry } from './model.js';
export { serializeTrace, parseTrace, saveTrace, loadTrace } from './store.js';
export { Recorder, withRecorder, type RecorderOptions } from './recorder.js';
export { EVENT_TYPES } from './types.js';
export type {
  EventType,
  Payload,
  EventDict,
  SpanDict,
  TraceDict,
  TraceHeaderRecord,
  SpanRecord,
} from './types.js';
export {
  EVENT_COLORS_HTML,
  eventLabel,
  escapeHtml,
  renderJson,
  renderHtml,
  exportJson,
  exportHtml,
} from './trace-exporter.js';
