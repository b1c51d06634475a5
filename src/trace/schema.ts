import { z } from 'zod';
import { EVENT_TYPES, type Payload } from './types.js';

// Unknown keys are stripped by zod, which is what keeps newer files loadable.

export const EventTypeSchema = z.enum(EVENT_TYPES);

// Payload bags are checked but passed through untouched: z.record would rebuild
// the object and drop keys such as `__proto__`.
const bag = z
  .custom<Payload>(
    (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
    { message: 'Expected an object' },
  )
  .nullish()
  .transform((value) => value ?? {});

const optionalTime = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalId = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const EventRecordSchema = z.object({
  event_type: EventTypeSchema,
  timestamp: z.number(),
  data: bag,
  event_id: optionalId,
});

export const SpanRecordSchema = z.object({
  name: z.string(),
  span_id: optionalId,
  parent_id: optionalId,
  start_time: optionalTime.transform((value) => value ?? 0),
  end_time: optionalTime,
  events: z
    .array(EventRecordSchema)
    .nullish()
    .transform((value) => value ?? []),
  metadata: bag,
});

/** Whole-trace object as produced by `Trace.toDict()` and the JSON exporter */
export const TraceRecordSchema = z.object({
  trace_id: z.string(),
  name: z.string(),
  start_time: optionalTime.transform((value) => value ?? 0),
  end_time: optionalTime,
  spans: z
    .array(SpanRecordSchema)
    .nullish()
    .transform((value) => value ?? []),
  metadata: bag,
});

/** The header line is lenient: every field falls back to a default. */
export const TraceHeaderSchema = z.object({
  trace_id: optionalId,
  name: optionalId,
  start_time: optionalTime.transform((value) => value ?? 0),
  end_time: optionalTime,
  metadata: bag,
});

export type EventRecord = z.infer<typeof EventRecordSchema>;
export type ParsedSpanRecord = z.infer<typeof SpanRecordSchema>;
export type ParsedTraceRecord = z.infer<typeof TraceRecordSchema>;
export type ParsedTraceHeader = z.infer<typeof TraceHeaderSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(record)'}: ${issue.message}`)
    .join('; ');
}
