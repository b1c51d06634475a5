/**
 * Trace Exporter — single-file JSON and self-contained HTML timeline output.
 */

import { writeFileSafe } from '../utils/fs.js';
import { resolve } from 'path';
import { getLogger } from '../core/logger.js';
import { formatClockTime } from '../utils/timer.js';
import type { Trace } from './model.js';
import type { EventType } from './types.js';

export const EVENT_COLORS_HTML: Record<EventType, string> = {
  llm_request: '#06b6d4',
  llm_response: '#22c55e',
  tool_call: '#eab308',
  tool_result: '#3b82f6',
  decision: '#a855f7',
  state_change: '#6b7280',
  error: '#ef4444',
  log: '#9ca3af',
};

/** `tool_call` -> `TOOL CALL` */
export function eventLabel(eventType: EventType): string {
  return eventType.replace(/_/g, ' ').toUpperCase();
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderJson(trace: Trace): string {
  return JSON.stringify(trace.toDict(), null, 2);
}

export function exportJson(trace: Trace, path: string): string {
  const target = resolve(path);
  writeFileSafe(target, renderJson(trace));
  getLogger().debug({ path: target, traceId: trace.traceId }, 'Trace exported as JSON');
  return target;
}

export function renderHtml(trace: Trace): string {
  const blocks: string[] = [];
  for (const span of trace.spans) {
    for (const event of span.events) {
      const color = EVENT_COLORS_HTML[event.eventType];
      const preview = JSON.stringify(event.data, null, 2);
      blocks.push(`
    <div class="event" style="border-left: 4px solid ${color};">
      <div class="event-header">
        <span class="event-type" style="color: ${color};">${eventLabel(event.eventType)}</span>
        <span class="event-span">${escapeHtml(span.name)}</span>
        <span class="event-time">${formatClockTime(event.timestamp)}</span>
      </div>
      <pre class="event-data">${escapeHtml(preview)}</pre>
    </div>`);
    }
  }

  const duration = trace.duration !== undefined ? `${trace.duration.toFixed(3)}s` : 'running';
  const name = escapeHtml(trace.name);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Agent Trace: ${name}</title>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: 'SF Mono', 'Fira Code', monospace; background: #0d1117; color: #c9d1d9; padding: 2rem; }
  h1 { color: #58a6ff; margin-bottom: 0.5rem; }
  .meta { color: #8b949e; margin-bottom: 2rem; font-size: 0.9rem; }
  .event { background: #161b22; border-radius: 6px; padding: 1rem; margin-bottom: 0.75rem; }
  .event-header { display: flex; gap: 1rem; align-items: center; margin-bottom: 0.5rem; }
  .event-type { font-weight: bold; font-size: 0.85rem; }
  .event-span { color: #e3b341; font-size: 0.8rem; }
  .event-time { color: #8b949e; font-size: 0.8rem; margin-left: auto; }
  .event-data { color: #8b949e; font-size: 0.8rem; white-space: pre-wrap; max-height: 200px; overflow-y: auto; }
</style>
</head>
<body>
  <h1>${name}</h1>
  <div class="meta">
    ID: ${escapeHtml(trace.traceId)} | Spans: ${trace.spans.length} | Events: ${trace.eventCount} | Duration: ${duration}
  </div>
${blocks.join('')}
</body>
</html>
`;
}

export function exportHtml(trace: Trace, path: string): string {
  const target = resolve(path);
  writeFileSafe(target, renderHtml(trace));
  getLogger().debug({ path: target, traceId: trace.traceId }, 'Trace exported as HTML');
  return target;
}
