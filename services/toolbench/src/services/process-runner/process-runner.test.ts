import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import {
  LineSplitter,
  SpawnProcessRunner,
  type OutputLine,
  type ProcessResult,
} from './process-runner.js';

function collect(script: string, command: string = process.execPath) {
  const lines: OutputLine[] = [];
  const exits: ProcessResult[] = [];
  const runner = new SpawnProcessRunner();
  const handle = runner.start(
    { command, args: ['-e', script], cwd: os.tmpdir() },
    {
      onLine: (line) => lines.push(line),
      onExit: (result) => exits.push(result),
    }
  );
  return { lines, exits, handle };
}

describe('LineSplitter', () => {
  it('holds back partial lines until they are completed', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('alpha\nbe')).toEqual(['alpha']);
    expect(splitter.push('ta\r\ngam')).toEqual(['beta']);
    expect(splitter.flush()).toEqual(['gam']);
    expect(splitter.flush()).toEqual([]);
  });

  it('keeps empty lines', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('one\n\ntwo\n')).toEqual(['one', '', 'two']);
  });
});

describe('SpawnProcessRunner', () => {
  it('delivers stdout lines in the order they were written', async () => {
    const script = 'for (let i = 1; i <= 200; i++) process.stdout.write("line " + i + "\\n");';
    const { lines, handle } = collect(script);

    const result = await handle.completion;

    expect(result.kind).toBe('exited');
    expect(lines.map((l) => l.text)).toEqual(
      Array.from({ length: 200 }, (_, i) => `line ${i + 1}`)
    );
    expect(lines.every((l) => l.stream === 'stdout')).toBe(true);
  });

  it('merges stderr into the same sink', async () => {
    const script = [
      'process.stdout.write("first\\n");',
      'setTimeout(() => process.stderr.write("second\\n"), 150);',
      'setTimeout(() => process.stdout.write("third\\n"), 300);',
    ].join('');
    const { lines, handle } = collect(script);

    await handle.completion;

    expect(lines).toEqual([
      { stream: 'stdout', text: 'first' },
      { stream: 'stderr', text: 'second' },
      { stream: 'stdout', text: 'third' },
    ]);
  });

  it('flushes a final line without a trailing newline', async () => {
    const { lines, handle } = collect('process.stdout.write("no newline");');
    await handle.completion;
    expect(lines).toEqual([{ stream: 'stdout', text: 'no newline' }]);
  });

  it('reports the exit code of a failing process', async () => {
    const { exits, handle } = collect('console.error("boom"); process.exit(3);');

    const result = await handle.completion;

    expect(result).toMatchObject({ kind: 'exited', exitCode: 3, signal: null });
    expect(exits).toHaveLength(1);
  });

  it('reports a missing executable as a launch failure', async () => {
    const missing = path.join(os.tmpdir(), 'pcb-toolbench-no-such-binary');
    const { lines, exits, handle } = collect('', missing);

    const result = await handle.completion;

    expect(result.kind).toBe('launch-failed');
    if (result.kind === 'launch-failed') {
      expect(result.error.command).toBe(missing);
      expect(result.error.errno).toBe('ENOENT');
    }
    expect(lines).toEqual([]);
    expect(exits).toHaveLength(1);
  });

  it('passes unbuffered-output settings to the child', async () => {
    const { lines, handle } = collect(
      'console.log(process.env.PYTHONUNBUFFERED + "," + process.env.PYTHONIOENCODING);'
    );
    await handle.completion;
    expect(lines).toEqual([{ stream: 'stdout', text: '1,utf-8' }]);
  });
});
