/**
 * `agent-replay info <trace>` — Summary counts for a trace.
 */

import { Command } from 'commander';
import { loadTrace } from '../../trace/store.js';
import { createContext, print, type GlobalOptions } from '../context.js';

export function createInfoCommand(): Command {
  const cmd = new Command('info');

  cmd
    .description('Show summary information about a trace')
    .argument('<trace>', 'Path to a .jsonl trace file')
    .option('--json', 'Output as JSON')
    .action((tracePath: string, options: { json?: boolean }, command: Command) => {
      const ctx = createContext(command.optsWithGlobals<GlobalOptions>());
      const trace = loadTrace(ctx.configManager.resolveTracePath(tracePath));

      if (options.json) {
        console.log(JSON.stringify({
          trace_id: trace.traceId,
          name: trace.name,
          spans: trace.spans.length,
          events: trace.eventCount,
          duration: trace.duration ?? null,
          metadata: trace.metadata,
        }, null, 2));
        return;
      }

      print(ctx.viewer.renderInfo(trace));
    });

  return cmd;
}
