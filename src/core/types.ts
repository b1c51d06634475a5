import { z } from 'zod';

// ===== Configuration =====

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const AgentReplayConfigSchema = z.object({
  traces: z.object({
    /** Fallback directory for trace paths that do not resolve from the working directory */
    dir: z.string().default('.'),
  }).default({}),
  display: z.object({
    previewLength: z.number().int().min(10).max(2000).default(80),
    showData: z.boolean().default(true),
  }).default({}),
  export: z.object({
    defaultFormat: z.enum(['json', 'html']).default('json'),
  }).default({}),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type AgentReplayConfig = z.infer<typeof AgentReplayConfigSchema>;
export type AgentReplayConfigInput = z.input<typeof AgentReplayConfigSchema>;
export type ExportFormat = AgentReplayConfig['export']['defaultFormat'];
