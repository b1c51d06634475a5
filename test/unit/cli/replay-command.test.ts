import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { createReplayCommand, handleReplayInput, parseStep } from '../../../src/cli/commands/replay.js';
import { TraceViewer } from '../../../src/cli/viewer.js';
import { ReplayEngine } from '../../../src/time-travel/replayer.js';
import { Trace } from '../../../src/trace/model.js';
import { makeTrace } from '../../helpers/traces.js';

describe('handleReplayInput', () => {
  const viewer = new TraceViewer();
  let engine: ReplayEngine;

  const send = (input: string) => handleReplayInput(engine, viewer, input);

  beforeEach(() => {
    engine = new ReplayEngine(
      makeTrace('session', [
        { name: 'think', events: [['llm_request', { model: 'gpt-4' }, 1], ['decision', { choice: 'search' }, 3]] },
        { name: 'act', events: [['tool_call', { tool: 'search', args: { q: 'weather' } }, 2]] },
      ]),
    );
  });

  // ─── Navigation ───────────────────────────────────────────────

  it('should advance on next and on an empty line', () => {
    expect(send('n')).toEqual({ output: [], exit: false });
    expect(send('')).toEqual({ output: [], exit: false });
    expect(engine.position).toBe(2);
  });

  it('should report the end instead of advancing past it', () => {
    send('next');
    send('next');
    send('next');
    expect(send('n').output).toEqual(['Already at the end of the trace']);
    expect(engine.position).toBe(3);
  });

  it('should step back and report the start', () => {
    expect(send('p').output).toEqual(['Already at the start of the trace']);
    send('n');
    expect(send('back').output).toEqual([]);
    expect(engine.position).toBe(0);
  });

  it('should jump with 1-based step numbers', () => {
    expect(send('j 3').output).toEqual([]);
    expect(engine.position).toBe(2);
    expect(send('jump 1').output).toEqual([]);
    expect(engine.position).toBe(0);
  });

  it('should reject bad jump targets without moving', () => {
    send('j 2');
    expect(send('j').output).toEqual(['Usage: j <step>']);
    expect(send('j two').output).toEqual(['Usage: j <step>']);
    expect(send('j 0').output).toEqual(['Step 0 is out of range (1-3)']);
    expect(send('j 4').output).toEqual(['Step 4 is out of range (1-3)']);
    expect(engine.position).toBe(1);
  });

  it('should reset to the first step', () => {
    send('j 3');
    send('r');
    expect(engine.position).toBe(0);
  });

  // ─── Queries ──────────────────────────────────────────────────

  it('should list matching step numbers', () => {
    expect(send('s search').output).toEqual(['Matches for "search": 2, 3']);
    expect(send('search Weather').output).toEqual(['Matches for "Weather": 2']);
  });

  it('should keep multi-word queries together', () => {
    expect(send('s think   llm').output).toEqual(['Matches for "think llm": 1']);
  });

  it('should report searches without matches or a query', () => {
    expect(send('s nothing').output).toEqual(['No steps match "nothing"']);
    expect(send('s').output).toEqual(['Usage: s <query>']);
  });

  it('should list the events of the current span', () => {
    send('j 3');
    expect(send('span').output).toEqual([
      'Span think:',
      '  🧠 LLM REQUEST model=gpt-4 messages=0',
      '  🔀 DECISION  -> search',
    ]);
  });

  it('should report an empty trace for span', () => {
    engine = new ReplayEngine(new Trace());
    expect(send('span').output).toEqual(['Trace has no events']);
  });

  // ─── Session ──────────────────────────────────────────────────

  it('should exit on quit aliases', () => {
    for (const input of ['q', 'quit', 'exit', '  Q  ']) {
      expect(send(input)).toEqual({ output: [], exit: true });
    }
  });

  it('should show help', () => {
    const { output } = send('h');
    expect(output[0]).toBe('Commands:');
    expect(output).toContain('  q, quit        Exit');
  });

  it('should reject unknown commands', () => {
    expect(send('fly away').output).toEqual(['Unknown command: fly. Type h for help.']);
  });
});

describe('replay --start', () => {
  it('should accept positive whole step numbers', () => {
    expect(parseStep('1')).toBe(1);
    expect(parseStep('12')).toBe(12);
  });

  it('should reject anything else as an invalid argument', () => {
    for (const value of ['x', '', '2.5', '0', '-3']) {
      expect(() => parseStep(value)).toThrow(InvalidArgumentError);
    }
  });

  it('should surface the standard option error before loading the trace', async () => {
    const written: string[] = [];
    const cmd = createReplayCommand()
      .exitOverride()
      .configureOutput({ writeErr: (text) => written.push(text) });

    await expect(cmd.parseAsync(['run.jsonl', '--start', 'x'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(written).toEqual([
      "error: option '--start <step>' argument 'x' is invalid. Expected a step number of 1 or more.\n",
    ]);
  });
});
