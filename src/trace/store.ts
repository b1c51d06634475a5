/**
 * JSONL persistence for traces.
 *
 * Line 1 is a `trace_header` record, then one `span` record per line with
 * the span's events embedded. Loading skips blank lines and ignores record
 * types it does not know; anything that is not a JSON object fails the
 * whole load.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { getLogger } from '../core/logger.js';
import { writeFileSafe } from '../utils/fs.js';
import { FormatError, NotFoundError, toError } from '../core/errors.js';
import { Span, Trace } from './model.js';
import { SpanRecordSchema, TraceHeaderSchema, describeIssues, type ParsedTraceHeader } from './schema.js';
import type { SpanRecord, TraceHeaderRecord } from './types.js';

export function serializeTrace(trace: Trace): string {
  const header: TraceHeaderRecord = {
    type: 'trace_header',
    trace_id: trace.traceId,
    name: trace.name,
    start_time: trace.startTime,
    end_time: trace.endTime ?? null,
    metadata: trace.metadata,
  };

  const lines = [JSON.stringify(header)];
  for (const span of trace.spans) {
    const record: SpanRecord = { type: 'span', ...span.toDict() };
    lines.push(JSON.stringify(record));
  }
  return lines.join('\n') + '\n';
}

export function parseTrace(text: string, source = '<memory>'): Trace {
  const logger = getLogger();
  let header: ParsedTraceHeader | undefined;
  const spans: Span[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i].trim();
    if (!line) continue;

    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch (err) {
      throw new FormatError(`Invalid JSON in ${source}`, lineNo, toError(err));
    }
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      throw new FormatError(`Expected a JSON object in ${source}`, lineNo);
    }

    const type: unknown = 'type' in record ? record.type : undefined;
    if (type === 'trace_header') {
      const parsed = TraceHeaderSchema.safeParse(record);
      if (!parsed.success) {
        throw new FormatError(`Malformed trace header in ${source}: ${describeIssues(parsed.error)}`, lineNo);
      }
      header = parsed.data;
    } else if (type === 'span') {
      const parsed = SpanRecordSchema.safeParse(record);
      if (!parsed.success) {
        throw new FormatError(`Malformed span record in ${source}: ${describeIssues(parsed.error)}`, lineNo);
      }
      spans.push(Span.fromRecord(parsed.data));
    } else {
      logger.debug({ source, line: lineNo, type }, 'Skipping unrecognized trace record');
    }
  }

  if (!header) {
    logger.debug({ source }, 'Trace file has no header, using defaults');
  }

  return new Trace({
    traceId: header?.trace_id,
    name: header?.name,
    startTime: header?.start_time ?? 0,
    endTime: header?.end_time,
    spans,
    metadata: header?.metadata ?? {},
  });
}

/** Write the trace as JSONL, overwriting `path`. Returns the absolute path. */
export function saveTrace(trace: Trace, path: string): string {
  const target = resolve(path);
  writeFileSafe(target, serializeTrace(trace));
  getLogger().debug(
    { path: target, traceId: trace.traceId, spans: trace.spans.length, events: trace.eventCount },
    'Trace saved',
  );
  return target;
}

export function loadTrace(path: string): Trace {
  const target = resolve(path);
  if (!existsSync(target)) {
    throw new NotFoundError('trace', path);
  }

  let text: string;
  try {
    text = readFileSync(target, 'utf-8');
  } catch (err) {
    throw new FormatError(`Unable to read trace file ${path}`, undefined, toError(err));
  }

  const trace = parseTrace(text, path);
  getLogger().debug(
    { path: target, traceId: trace.traceId, spans: trace.spans.length, events: trace.eventCount },
    'Trace loaded',
  );
  return trace;
}
