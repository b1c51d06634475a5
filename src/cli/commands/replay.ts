/**
 * `agent-replay replay <trace>` — Step through a trace interactively.
 */

import { Command, InvalidArgumentError } from 'commander';
import * as readline from 'readline';
import { ReplayEngine } from '../../time-travel/replayer.js';
import { loadTrace } from '../../trace/store.js';
import { createContext, print, type GlobalOptions } from '../context.js';
import type { TraceViewer } from '../viewer.js';

export function createReplayCommand(): Command {
  const cmd = new Command('replay');

  cmd
    .description('Step through a trace interactively')
    .argument('<trace>', 'Path to a .jsonl trace file')
    .option('--start <step>', 'Start at this step (1-based)', parseStep)
    .action(async (tracePath: string, options: { start?: number }, command: Command) => {
      const ctx = createContext(command.optsWithGlobals<GlobalOptions>());
      const engine = new ReplayEngine(loadTrace(ctx.configManager.resolveTracePath(tracePath)));
      if (options.start !== undefined) {
        engine.seek(options.start - 1);
      }
      await runReplayLoop(engine, ctx.viewer);
    });

  return cmd;
}

export interface ReplayCommandResult {
  output: string[];
  exit: boolean;
}

const HELP = [
  'Commands:',
  '  n, next        Advance one step (default)',
  '  p, prev        Go back one step',
  '  j, jump <n>    Jump to step n',
  '  s, search <q>  List steps matching q',
  '  span           List every step in the current span',
  '  r, reset       Go back to the first step',
  '  q, quit        Exit',
];

/**
 * Apply one line of replay input to the engine. Steps are shown 1-based;
 * the engine works 0-based.
 */
export function handleReplayInput(engine: ReplayEngine, viewer: TraceViewer, input: string): ReplayCommandResult {
  const line = input.trim();
  const [command = '', ...rest] = line.split(/\s+/);
  const arg = rest.join(' ');

  switch (command.toLowerCase()) {
    case 'q':
    case 'quit':
    case 'exit':
      return { output: [], exit: true };

    case '':
    case 'n':
    case 'next':
      if (!engine.step()) {
        return { output: ['Already at the end of the trace'], exit: false };
      }
      return { output: [], exit: false };

    case 'p':
    case 'prev':
    case 'back':
      if (!engine.stepBack()) {
        return { output: ['Already at the start of the trace'], exit: false };
      }
      return { output: [], exit: false };

    case 'j':
    case 'jump': {
      const target = Number(arg);
      if (!arg || !Number.isInteger(target)) {
        return { output: ['Usage: j <step>'], exit: false };
      }
      if (!engine.jump(target - 1)) {
        return { output: [`Step ${target} is out of range (1-${engine.totalSteps})`], exit: false };
      }
      return { output: [], exit: false };
    }

    case 's':
    case 'search': {
      if (!arg) {
        return { output: ['Usage: s <query>'], exit: false };
      }
      const matches = engine.search(arg);
      if (matches.length === 0) {
        return { output: [`No steps match "${arg}"`], exit: false };
      }
      return { output: [`Matches for "${arg}": ${matches.map((i) => i + 1).join(', ')}`], exit: false };
    }

    case 'span': {
      const steps = engine.currentSpanEvents();
      if (steps.length === 0) {
        return { output: ['Trace has no events'], exit: false };
      }
      return {
        output: [`Span ${steps[0].span.name}:`, ...steps.map(({ event }) => `  ${viewer.describeEvent(event)}`)],
        exit: false,
      };
    }

    case 'r':
    case 'reset':
      engine.reset();
      return { output: [], exit: false };

    case 'h':
    case 'help':
      return { output: HELP, exit: false };

    default:
      return { output: [`Unknown command: ${command}. Type h for help.`], exit: false };
  }
}

async function runReplayLoop(engine: ReplayEngine, viewer: TraceViewer): Promise<void> {
  console.log();
  console.log(`🔁 Replay: ${engine.trace.name}`);
  console.log(`   ${engine.totalSteps} events. Commands: (n)ext, (p)rev, (j)ump N, (s)earch Q, (q)uit`);
  console.log('─'.repeat(50));
  console.log();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  print(viewer.renderStep(engine));
  rl.prompt();

  await new Promise<void>((resolve) => {
    rl.on('line', (line: string) => {
      const result = handleReplayInput(engine, viewer, line);
      print(result.output);
      if (result.exit) {
        rl.close();
        return;
      }
      print(viewer.renderStep(engine));
      rl.prompt();
    });

    rl.on('close', () => resolve());
  });
}

export function parseStep(value: string): number {
  const step = Number(value);
  if (!value.trim() || !Number.isInteger(step) || step < 1) {
    throw new InvalidArgumentError('Expected a step number of 1 or more.');
  }
  return step;
}
