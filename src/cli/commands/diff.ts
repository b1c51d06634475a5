/**
 * `agent-replay diff <a> <b>` — Compare two runs and list divergences.
 * Exits with code 1 when any divergence is critical.
 */

import { Command } from 'commander';
import { loadTrace } from '../../trace/store.js';
import { DivergenceAnalyzer } from '../../time-travel/diff-analyzer.js';
import { createContext, print, type GlobalOptions } from '../context.js';

interface DiffOptions {
  json?: boolean;
  report?: boolean;
}

export function createDiffCommand(): Command {
  const cmd = new Command('diff');

  cmd
    .description('Compare two trace files and show divergences')
    .argument('<trace-a>', 'Baseline trace')
    .argument('<trace-b>', 'Trace to compare against the baseline')
    .option('--json', 'Output the diff result as JSON')
    .option('--report', 'Output a markdown report')
    .action((pathA: string, pathB: string, options: DiffOptions, command: Command) => {
      const ctx = createContext(command.optsWithGlobals<GlobalOptions>());
      const traceA = loadTrace(ctx.configManager.resolveTracePath(pathA));
      const traceB = loadTrace(ctx.configManager.resolveTracePath(pathB));

      const analyzer = new DivergenceAnalyzer();
      const result = analyzer.diff(traceA, traceB);

      if (options.json) {
        console.log(JSON.stringify(result.toDict(), null, 2));
      } else if (options.report) {
        console.log(analyzer.generateReport(result));
      } else {
        print(ctx.viewer.renderDiff(result));
      }

      if (result.criticalCount > 0) {
        process.exitCode = 1;
      }
    });

  return cmd;
}
