/**
 * `agent-replay show <trace>` — Print a trace as a span list or a tree.
 */

import { Command } from 'commander';
import { loadTrace } from '../../trace/store.js';
import { createContext, print, type GlobalOptions } from '../context.js';

interface ShowOptions {
  tree?: boolean;
}

export function createShowCommand(): Command {
  const cmd = new Command('show');

  cmd
    .description('Display a trace file')
    .argument('<trace>', 'Path to a .jsonl trace file')
    .option('--tree', 'Show the trace as a span tree')
    .action((tracePath: string, options: ShowOptions, command: Command) => {
      const ctx = createContext(command.optsWithGlobals<GlobalOptions>());
      const trace = loadTrace(ctx.configManager.resolveTracePath(tracePath));
      print(options.tree ? ctx.viewer.renderTree(trace) : ctx.viewer.renderTrace(trace));
    });

  return cmd;
}
