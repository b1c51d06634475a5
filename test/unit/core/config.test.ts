import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigManager } from '../../../src/core/config.js';
import { ConfigError, NotFoundError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let projectDir: string;
  let globalDir: string;

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'agent-replay-project-'));
    globalDir = await fs.mkdtemp(path.join(os.tmpdir(), 'agent-replay-global-'));
    vi.stubEnv('AGENT_REPLAY_CONFIG_DIR', '');
    vi.stubEnv('AGENT_REPLAY_TRACE_DIR', '');
    vi.stubEnv('AGENT_REPLAY_LOG_LEVEL', '');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(projectDir, { recursive: true, force: true });
    await fs.rm(globalDir, { recursive: true, force: true });
  });

  // ─── Loading ──────────────────────────────────────────────────

  describe('load', () => {
    it('should return defaults when no config files exist', () => {
      const config = new ConfigManager(projectDir, globalDir).load();
      expect(config).toEqual({
        traces: { dir: '.' },
        display: { previewLength: 80, showData: true },
        export: { defaultFormat: 'json' },
        logging: { level: 'info', verbose: false },
      });
    });

    it('should let project config override global config key by key', async () => {
      await fs.writeFile(
        path.join(globalDir, 'config.yaml'),
        'display:\n  previewLength: 40\n  showData: false\nexport:\n  defaultFormat: html\n',
      );
      await fs.writeFile(path.join(projectDir, '.agent-replay.yaml'), 'display:\n  previewLength: 120\n');

      const config = new ConfigManager(projectDir, globalDir).load();
      expect(config.display).toEqual({ previewLength: 120, showData: false });
      expect(config.export.defaultFormat).toBe('html');
    });

    it('should apply environment variables over files', async () => {
      await fs.writeFile(path.join(projectDir, '.agent-replay.yaml'), 'traces:\n  dir: from-file\n');
      vi.stubEnv('AGENT_REPLAY_TRACE_DIR', 'from-env');
      vi.stubEnv('AGENT_REPLAY_LOG_LEVEL', 'DEBUG');

      const config = new ConfigManager(projectDir, globalDir).load();
      expect(config.traces.dir).toBe('from-env');
      expect(config.logging.level).toBe('debug');
    });

    it('should apply overrides last', () => {
      vi.stubEnv('AGENT_REPLAY_TRACE_DIR', 'from-env');
      const config = new ConfigManager(projectDir, globalDir).load({ traces: { dir: 'cli' } });
      expect(config.traces.dir).toBe('cli');
    });

    it('should treat an empty file as no config', async () => {
      await fs.writeFile(path.join(projectDir, '.agent-replay.yaml'), '');
      expect(new ConfigManager(projectDir, globalDir).load().display.previewLength).toBe(80);
    });

    it('should reject out-of-range values', async () => {
      await fs.writeFile(path.join(projectDir, '.agent-replay.yaml'), 'display:\n  previewLength: 2\n');
      const manager = new ConfigManager(projectDir, globalDir);
      expect(() => manager.load()).toThrow(ConfigError);
      expect(() => manager.load()).toThrow(/^Invalid configuration: display\.previewLength: /);
    });

    it('should reject a config file that is not a mapping', async () => {
      await fs.writeFile(path.join(projectDir, '.agent-replay.yaml'), '- one\n- two\n');
      expect(() => new ConfigManager(projectDir, globalDir).load()).toThrow(
        `Expected a mapping at the top of project config ${path.join(projectDir, '.agent-replay.yaml')}`,
      );
    });

    it('should reject malformed YAML', async () => {
      await fs.writeFile(path.join(globalDir, 'config.yaml'), 'display: [unclosed\n');
      expect(() => new ConfigManager(projectDir, globalDir).load()).toThrow(/^Failed to parse global config/);
    });

    it('should reject an unknown log level from the environment', () => {
      vi.stubEnv('AGENT_REPLAY_LOG_LEVEL', 'loud');
      expect(() => new ConfigManager(projectDir, globalDir).load()).toThrow(
        'Unknown log level in AGENT_REPLAY_LOG_LEVEL: loud',
      );
    });
  });

  describe('get', () => {
    it('should load lazily and cache the result', async () => {
      const manager = new ConfigManager(projectDir, globalDir);
      const first = manager.get();
      await fs.writeFile(path.join(projectDir, '.agent-replay.yaml'), 'display:\n  previewLength: 99\n');
      expect(manager.get()).toBe(first);
      expect(manager.load().display.previewLength).toBe(99);
    });
  });

  describe('getGlobalDir', () => {
    it('should take the global directory from the environment when none is passed', () => {
      vi.stubEnv('AGENT_REPLAY_CONFIG_DIR', globalDir);
      expect(new ConfigManager(projectDir).getGlobalDir()).toBe(globalDir);
    });

    it('should prefer an explicit directory over the environment', () => {
      vi.stubEnv('AGENT_REPLAY_CONFIG_DIR', '/elsewhere');
      expect(new ConfigManager(projectDir, globalDir).getGlobalDir()).toBe(globalDir);
    });

    it('should default to the home directory', () => {
      expect(new ConfigManager(projectDir).getGlobalDir()).toBe(path.join(os.homedir(), '.agent-replay'));
    });
  });

    // ─── Trace paths ──────────────────────────────────────────────

  describe('resolveTracePath', () => {
    it('should resolve relative to the project directory first', async () => {
      await fs.writeFile(path.join(projectDir, 'run.jsonl'), '');
      const manager = new ConfigManager(projectDir, globalDir);
      expect(manager.resolveTracePath('run.jsonl')).toBe(path.join(projectDir, 'run.jsonl'));
    });

    it('should fall back to the configured trace directory', async () => {
      await fs.mkdir(path.join(projectDir, 'traces'));
      await fs.writeFile(path.join(projectDir, 'traces', 'run.jsonl'), '');
      const manager = new ConfigManager(projectDir, globalDir);
      manager.load({ traces: { dir: 'traces' } });
      expect(manager.resolveTracePath('run.jsonl')).toBe(path.join(projectDir, 'traces', 'run.jsonl'));
    });

    it('should accept an absolute path as-is', async () => {
      const file = path.join(globalDir, 'abs.jsonl');
      await fs.writeFile(file, '');
      expect(new ConfigManager(projectDir, globalDir).resolveTracePath(file)).toBe(file);
    });

    it('should throw NotFoundError when nothing matches', () => {
      const manager = new ConfigManager(projectDir, globalDir);
      expect(() => manager.resolveTracePath('missing.jsonl')).toThrow(NotFoundError);
      expect(() => manager.resolveTracePath('missing.jsonl')).toThrow('Trace file not found: missing.jsonl');
    });
  });

  describe('createDefaultConfig', () => {
    it('should write a loadable default file once', async () => {
      const nested = path.join(globalDir, 'nested');
      const manager = new ConfigManager(projectDir, nested);
      const file = manager.createDefaultConfig();

      expect(file).toBe(path.join(nested, 'config.yaml'));
      expect(manager.load().export.defaultFormat).toBe('json');

      await fs.writeFile(file, 'export:\n  defaultFormat: html\n');
      manager.createDefaultConfig();
      expect(manager.load().export.defaultFormat).toBe('html');
    });
  });
});
