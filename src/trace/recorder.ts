/**
 * Recorder — captures an agent run into a Trace.
 *
 * Spans are scoped: `span()` opens a child of the current span, runs the
 * callback and closes the span on every exit path, restoring the previous
 * current span afterwards. Events recorded outside any span land in an
 * implicit `default` span.
 *
 * @example
 * ```typescript
 * const rec = new Recorder('research-agent', { outputPath: 'run.jsonl' });
 * rec.span('plan', () => {
 *   rec.llmRequest('gpt-4', [{ role: 'user', content: 'hi' }]);
 *   rec.llmResponse('hello', 5);
 *   rec.decision('next action', 'use_tool:search');
 * });
 * rec.finish();
 * ```
 */

import { EventEmitter } from 'node:events';
import { getLogger } from '../core/logger.js';
import { Trace, type Span, type TraceEvent } from './model.js';
import { saveTrace } from './store.js';
import type { EventType, Payload } from './types.js';

export interface RecorderOptions {
  metadata?: Payload;
  /** When set, `finish()` saves the trace here */
  outputPath?: string;
}

export class Recorder extends EventEmitter {
  readonly trace: Trace;
  private outputPath?: string;
  private currentSpan: Span | null = null;
  private finished = false;

  constructor(name: string = 'agent-run', options: RecorderOptions = {}) {
    super();
    this.trace = new Trace({ name, metadata: options.metadata ?? {} });
    this.outputPath = options.outputPath;
  }

  get activeSpan(): Span | null {
    return this.currentSpan;
  }

  // ---------------------------------------------------------------------------
  // Span scoping
  // ---------------------------------------------------------------------------

  span<T>(name: string, fn: (span: Span) => T, metadata?: Payload): T {
    const { span, previous } = this.openSpan(name, metadata);
    try {
      return fn(span);
    } finally {
      this.closeSpan(span, previous);
    }
  }

  async spanAsync<T>(name: string, fn: (span: Span) => Promise<T>, metadata?: Payload): Promise<T> {
    const { span, previous } = this.openSpan(name, metadata);
    try {
      return await fn(span);
    } finally {
      this.closeSpan(span, previous);
    }
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  event(eventType: EventType, data?: Payload): TraceEvent {
    const span = this.ensureSpan();
    const event = span.addEvent(eventType, data);
    this.emit('trace:event', { span, event });
    return event;
  }

  llmRequest(model: string = '', messages: unknown[] = [], extra: Payload = {}): TraceEvent {
    return this.event('llm_request', { model, messages, ...extra });
  }

  llmResponse(content: string = '', tokens: number | null = null, extra: Payload = {}): TraceEvent {
    return this.event('llm_response', { content, tokens, ...extra });
  }

  toolCall(tool: string, args: Payload = {}, extra: Payload = {}): TraceEvent {
    return this.event('tool_call', { tool, args, ...extra });
  }

  toolResult(tool: string, result: unknown = null, extra: Payload = {}): TraceEvent {
    return this.event('tool_result', { tool, result, ...extra });
  }

  decision(description: string, choice: string = '', extra: Payload = {}): TraceEvent {
    return this.event('decision', { description, choice, ...extra });
  }

  stateChange(key: string, oldValue: unknown = null, newValue: unknown = null, extra: Payload = {}): TraceEvent {
    return this.event('state_change', { key, old: oldValue, new: newValue, ...extra });
  }

  log(message: string, level: string = 'info', extra: Payload = {}): TraceEvent {
    return this.event('log', { message, level, ...extra });
  }

  error(message: string, exception: string | null = null, extra: Payload = {}): TraceEvent {
    return this.event('error', { message, exception, ...extra });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Close the trace (and any open span) and save it when an output path was given. */
  finish(): Trace {
    this.trace.close();
    this.currentSpan = null;
    this.finished = true;
    if (this.outputPath) {
      saveTrace(this.trace, this.outputPath);
    }
    this.emit('trace:finished', this.trace);
    return this.trace;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private openSpan(name: string, metadata?: Payload): { span: Span; previous: Span | null } {
    const previous = this.currentSpan;
    const span = this.trace.addSpan(name, previous?.spanId, metadata ?? {});
    this.currentSpan = span;
    getLogger().debug({ traceId: this.trace.traceId, span: name, parentId: span.parentId }, 'Span opened');
    this.emit('trace:span:opened', span);
    return { span, previous };
  }

  private closeSpan(span: Span, previous: Span | null): void {
    span.close();
    this.currentSpan = previous;
    this.emit('trace:span:closed', span);
  }

  private ensureSpan(): Span {
    if (!this.currentSpan) {
      this.currentSpan = this.trace.addSpan('default');
      this.emit('trace:span:opened', this.currentSpan);
    }
    return this.currentSpan;
  }
}

/**
 * Run `fn` with a fresh Recorder and finish it on every exit path, including
 * a thrown error or a rejected promise.
 */
export async function withRecorder<T>(
  name: string,
  options: RecorderOptions,
  fn: (recorder: Recorder) => T | Promise<T>,
): Promise<T> {
  const recorder = new Recorder(name, options);
  try {
    return await fn(recorder);
  } finally {
    recorder.finish();
  }
}
