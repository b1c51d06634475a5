/**
 * Plain-text rendering of traces, replay steps and diffs for the terminal.
 * Every method returns lines; the commands decide where they go.
 */

import { formatDuration } from '../utils/timer.js';
import { eventLabel } from '../trace/trace-exporter.js';
import { Span, type Trace, type TraceEvent } from '../trace/model.js';
import type { EventType } from '../trace/types.js';
import type { ReplayEngine } from '../time-travel/replayer.js';
import type { DiffResult } from '../time-travel/diff-analyzer.js';

export const EVENT_ICONS: Record<EventType, string> = {
  llm_request: '🧠',
  llm_response: '💬',
  tool_call: '🔧',
  tool_result: '📦',
  decision: '🔀',
  state_change: '📝',
  error: '❌',
  log: '📋',
};

export interface ViewerOptions {
  previewLength?: number;
  showData?: boolean;
}

export class TraceViewer {
  private previewLength: number;
  private showData: boolean;

  constructor(options: ViewerOptions = {}) {
    this.previewLength = options.previewLength ?? 80;
    this.showData = options.showData ?? true;
  }

  renderTrace(trace: Trace): string[] {
    const lines = [
      '',
      `  ${trace.name}`,
      '  ' + '─'.repeat(40),
      `  ID:       ${trace.traceId}`,
      `  Spans:    ${trace.spans.length} | Events: ${trace.eventCount}`,
      `  Duration: ${formatSeconds(trace.duration) ?? 'running'}`,
    ];

    const depths = spanDepths(trace);
    for (const span of trace.spans) {
      const indent = '  '.repeat(depths.get(span.spanId) ?? 0);
      const duration = formatSeconds(span.duration);
      lines.push('');
      lines.push(`${indent}>>> ${span.name}${duration ? ` (${duration})` : ''}`);
      for (const event of span.events) {
        lines.push(`${indent}  ${this.describeEvent(event)}`);
      }
    }
    return lines;
  }

  renderTree(trace: Trace): string[] {
    const lines = [`${trace.name} (${trace.traceId})`];
    const children = trace.childIndex();

    const walk = (span: Span, prefix: string, last: boolean): void => {
      const duration = formatSeconds(span.duration);
      lines.push(`${prefix}${last ? '└── ' : '├── '}${span.name}${duration ? ` [${duration}]` : ''}`);
      const childPrefix = prefix + (last ? '    ' : '│   ');
      const kids = children.get(span.spanId) ?? [];
      const items: Array<TraceEvent | Span> = [...span.events, ...kids];
      items.forEach((item, i) => {
        const isLast = i === items.length - 1;
        if (item instanceof Span) {
          walk(item, childPrefix, isLast);
        } else {
          lines.push(`${childPrefix}${isLast ? '└── ' : '├── '}${EVENT_ICONS[item.eventType]} ${item.eventType}`);
        }
      });
    };

    const roots = children.get(null) ?? [];
    roots.forEach((span, i) => walk(span, '', i === roots.length - 1));
    return lines;
  }

  renderDiff(result: DiffResult): string[] {
    const lines = [
      '',
      '  Trace Diff',
      '  ' + '─'.repeat(40),
      `  Trace A: ${result.traceAId}`,
      `  Trace B: ${result.traceBId}`,
      `  ${result.identical ? '✅' : '⚠️ '} ${result.summary}`,
    ];

    if (result.divergences.length > 0) {
      lines.push('');
      lines.push(`  ${'#'.padEnd(4)}${'Severity'.padEnd(10)}${'Position'.padEnd(10)}Description`);
      result.divergences.forEach((d, i) => {
        lines.push(
          `  ${String(i + 1).padEnd(4)}${d.severity.toUpperCase().padEnd(10)}${String(d.position).padEnd(10)}${d.description}`,
        );
      });
    }
    return lines;
  }

  /** `[3/10] span-name 🔧 tool_call`, or an end marker past the last step. */
  renderStep(engine: ReplayEngine): string[] {
    const current = engine.peek();
    if (!current) {
      return ['End of trace'];
    }
    const { span, event } = current;
    const lines = [
      `[${engine.position + 1}/${engine.totalSteps}] ${span.name} ${EVENT_ICONS[event.eventType]} ${event.eventType}`,
    ];
    if (this.showData) {
      lines.push(`    ${this.truncate(JSON.stringify(event.data))}`);
    }
    return lines;
  }

  renderInfo(trace: Trace): string[] {
    return [
      `${trace.name} (${trace.traceId})`,
      `  Spans:    ${trace.spans.length}`,
      `  Events:   ${trace.eventCount}`,
      `  Duration: ${formatSeconds(trace.duration) ?? 'N/A'}`,
      `  Metadata: ${JSON.stringify(trace.metadata)}`,
    ];
  }

  describeEvent(event: TraceEvent): string {
    const head = `${EVENT_ICONS[event.eventType]} ${eventLabel(event.eventType)}`;
    const data = event.data;

    switch (event.eventType) {
      case 'llm_request': {
        const messages = Array.isArray(data.messages) ? data.messages.length : 0;
        return `${head} model=${asText(data.model)} messages=${messages}`;
      }
      case 'llm_response': {
        const tokens = typeof data.tokens === 'number' ? ` (${data.tokens} tokens)` : '';
        return `${head} "${this.truncate(asText(data.content))}"${tokens}`;
      }
      case 'tool_call':
        return `${head} ${asText(data.tool)}(${JSON.stringify(data.args ?? {})})`;
      case 'tool_result':
        return `${head} ${asText(data.tool)} -> ${this.truncate(asText(data.result))}`;
      case 'decision':
        return `${head} ${asText(data.description)} -> ${asText(data.choice)}`;
      case 'error':
        return `${head} ${asText(data.message)}`;
      default:
        return `${head} ${this.truncate(data.message !== undefined ? asText(data.message) : JSON.stringify(data))}`;
    }
  }

  private truncate(text: string): string {
    return text.length > this.previewLength ? `${text.slice(0, this.previewLength)}...` : text;
  }
}

function asText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function formatSeconds(seconds: number | undefined): string | undefined {
  return seconds === undefined ? undefined : formatDuration(seconds * 1000);
}

function spanDepths(trace: Trace): Map<string, number> {
  const depths = new Map<string, number>();
  const depthOf = (span: Span, seen: Set<string>): number => {
    const cached = depths.get(span.spanId);
    if (cached !== undefined) return cached;
    const parent = span.parentId !== undefined ? trace.getSpan(span.parentId) : undefined;
    // A parent cycle in a hand-edited file must not recurse forever
    const depth = parent && !seen.has(parent.spanId) ? depthOf(parent, seen.add(span.spanId)) + 1 : 0;
    depths.set(span.spanId, depth);
    return depth;
  };
  for (const span of trace.spans) depthOf(span, new Set());
  return depths;
}
