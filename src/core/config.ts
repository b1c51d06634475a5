import { readFileSync, existsSync, writeFileSync } from 'fs';
import { join, resolve, isAbsolute } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { AgentReplayConfigSchema, LogLevelSchema, type AgentReplayConfig, type AgentReplayConfigInput } from './types.js';
import { ConfigError, NotFoundError, toError } from './errors.js';
import { ensureDirSync } from '../utils/fs.js';

export class ConfigManager {
  private config: AgentReplayConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir ?? (process.env.AGENT_REPLAY_CONFIG_DIR || join(homedir(), '.agent-replay'));
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: AgentReplayConfigInput): AgentReplayConfig {
    let raw: Record<string, unknown> = {};

    const globalConfigPath = join(this.globalDir, 'config.yaml');
    raw = this.deepMerge(raw, this.readYaml(globalConfigPath, 'global'));

    const projectConfigPath = join(this.projectDir, '.agent-replay.yaml');
    raw = this.deepMerge(raw, this.readYaml(projectConfigPath, 'project'));

    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = AgentReplayConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): AgentReplayConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Resolve a trace path given on the command line. Relative paths are tried
   * against the project directory first, then against `traces.dir`.
   */
  resolveTracePath(path: string): string {
    const candidates = isAbsolute(path)
      ? [path]
      : [resolve(this.projectDir, path), resolve(this.projectDir, this.get().traces.dir, path)];

    for (const candidate of candidates) {
      if (existsSync(candidate)) return candidate;
    }
    throw new NotFoundError('trace', path);
  }

  /**
   * Create default global config if it doesn't exist
   */
  createDefaultConfig(): string {
    ensureDirSync(this.globalDir);
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# agent-replay global configuration
traces:
  dir: .

display:
  previewLength: 80
  showData: true

export:
  defaultFormat: json

logging:
  level: info
  verbose: false
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };

    if (process.env.AGENT_REPLAY_TRACE_DIR) {
      const traces = isPlainObject(result.traces) ? result.traces : {};
      result.traces = { ...traces, dir: process.env.AGENT_REPLAY_TRACE_DIR };
    }
    if (process.env.AGENT_REPLAY_LOG_LEVEL) {
      const level = LogLevelSchema.safeParse(process.env.AGENT_REPLAY_LOG_LEVEL.toLowerCase());
      if (!level.success) {
        throw new ConfigError(`Unknown log level in AGENT_REPLAY_LOG_LEVEL: ${process.env.AGENT_REPLAY_LOG_LEVEL}`);
      }
      const logging = isPlainObject(result.logging) ? result.logging : {};
      result.logging = { ...logging, level: level.data };
    }

    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isPlainObject(incoming) && isPlainObject(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else if (incoming !== undefined) {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
