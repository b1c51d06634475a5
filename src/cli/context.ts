/**
 * Per-invocation setup shared by every command: configuration, logger and
 * a viewer configured from the display settings.
 */

import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import { TraceViewer } from './viewer.js';
import type { AgentReplayConfig } from '../core/types.js';

export interface CommandContext {
  configManager: ConfigManager;
  config: AgentReplayConfig;
  viewer: TraceViewer;
}

export type GlobalOptions = {
  verbose?: boolean;
  dir?: string;
};

export function createContext(options: GlobalOptions = {}): CommandContext {
  const configManager = new ConfigManager(options.dir ?? process.cwd());
  const config = configManager.load(options.verbose ? { logging: { verbose: true } } : undefined);

  setLogger(createLogger('agent-replay', config.logging.verbose, config.logging.level));

  return {
    configManager,
    config,
    viewer: new TraceViewer({
      previewLength: config.display.previewLength,
      showData: config.display.showData,
    }),
  };
}

export function print(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}
