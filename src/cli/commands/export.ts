/**
 * `agent-replay export <trace>` — Write a trace as JSON or a HTML timeline.
 */

import { Command, Option } from 'commander';
import { extname } from 'path';
import { loadTrace } from '../../trace/store.js';
import { exportHtml, exportJson } from '../../trace/trace-exporter.js';
import { createContext, type GlobalOptions } from '../context.js';
import type { ExportFormat } from '../../core/types.js';

interface ExportOptions {
  format?: ExportFormat;
  output?: string;
}

export function createExportCommand(): Command {
  const cmd = new Command('export');

  cmd
    .description('Export a trace to JSON or HTML')
    .argument('<trace>', 'Path to a .jsonl trace file')
    .addOption(new Option('-f, --format <format>', 'Export format').choices(['json', 'html']))
    .option('-o, --output <path>', 'Output file path')
    .action((tracePath: string, options: ExportOptions, command: Command) => {
      const ctx = createContext(command.optsWithGlobals<GlobalOptions>());
      const source = ctx.configManager.resolveTracePath(tracePath);
      const trace = loadTrace(source);

      const format = options.format ?? ctx.config.export.defaultFormat;
      const output = options.output ?? replaceExtension(source, `.${format}`);
      const written = format === 'html' ? exportHtml(trace, output) : exportJson(trace, output);

      console.log(`Exported to ${written}`);
    });

  return cmd;
}

function replaceExtension(path: string, ext: string): string {
  const current = extname(path);
  return (current ? path.slice(0, -current.length) : path) + ext;
}
