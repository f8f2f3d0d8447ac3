import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { ScriptRunner } from '../scripts/scriptRunner';
import { InterpreterRegistry, createDefaultRegistry, javascriptInterpreter } from '../scripts/interpreters';
import type { Interpreter, ScriptBindings } from '../scripts/interpreters';
import { CommandTree } from '../commands/commandTree';
import { TreeSynchronizer } from '../commands/treeSynchronizer';
import { ScriptMenuError, errorMessage, isScriptMenuError } from '../errors';
import { makeTempDir, removeDir, writeScript } from './helpers';

const config = { scriptsDir: '/srv/scripts' };
const machine = { hostname: 'bench-01' };
const gui = { notify: () => {} };
const bindings: ScriptBindings = { config, machine, gui };

async function runError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected the script run to fail');
    },
    (err: unknown) => err,
  );
}

describe('InterpreterRegistry', () => {
  const python: Interpreter = { name: 'Python', extensions: ['.PY', 'py'], evaluate: () => undefined };
  const other: Interpreter = { name: 'OtherJS', extensions: ['js', 'mjs'], evaluate: () => undefined };

  it('collects lower-cased, deduplicated extensions', () => {
    const registry = new InterpreterRegistry().register(javascriptInterpreter).register(python);
    expect([...registry.supportedExtensions()].sort()).toEqual(['cjs', 'js', 'py']);
  });

  it('resolves extensions with or without the dot, in any case', () => {
    const registry = new InterpreterRegistry().register(python);
    expect(registry.getByExtension('.Py')).toBe(python);
    expect(registry.getByExtension('rb')).toBeUndefined();
  });

  it('keeps the first interpreter registered for an extension', () => {
    const registry = new InterpreterRegistry().register(javascriptInterpreter).register(other);
    expect(registry.getByExtension('js')).toBe(javascriptInterpreter);
    expect(registry.getByExtension('mjs')).toBe(other);
    expect(registry.list()).toEqual([javascriptInterpreter, other]);
  });
});

describe('ScriptRunner', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('passes the configured bindings through unmodified', async () => {
    const file = await writeScript(dir, 'identity.js', '({ config: config, machine: machine, gui: gui })');
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);

    const result = await runner.run(file);

    expect(result).toEqual({ config, machine, gui });
    expect(result).toHaveProperty('config', config);
    const handles = Object.values(Object(result));
    expect(handles[0]).toBe(config);
    expect(handles[1]).toBe(machine);
    expect(handles[2]).toBe(gui);
  });

  it('builds a fresh binding set for every run', async () => {
    const seen: ScriptBindings[] = [];
    const recorder: Interpreter = {
      name: 'Recorder',
      extensions: ['rec'],
      evaluate: (_source, received) => {
        seen.push(received);
      },
    };
    const file = await writeScript(dir, 'a.rec');
    const runner = new ScriptRunner(new InterpreterRegistry().register(recorder), bindings);

    await runner.run(file);
    await runner.run(file);

    expect(seen).toHaveLength(2);
    expect(seen[0]).not.toBe(seen[1]);
    expect(seen[0]).not.toBe(bindings);
    expect(seen[0].config).toBe(config);
    expect(seen[1].gui).toBe(gui);
  });

  it('returns the completion value and awaits returned promises', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);
    const sync = await writeScript(dir, 'sum.js', '20 + 22');
    const deferred = await writeScript(dir, 'later.cjs', 'Promise.resolve(machine.hostname)');

    await expect(runner.run(sync)).resolves.toBe(42);
    await expect(runner.run(deferred)).resolves.toBe('bench-01');
  });

  it('re-reads the file on every invocation', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);
    const file = await writeScript(dir, 'edit.js', '1 + 1');

    await expect(runner.run(file)).resolves.toBe(2);
    await writeScript(dir, 'edit.js', '40 + 2');
    await expect(runner.run(file)).resolves.toBe(42);
  });

  it('resolves interpreters by case-insensitive extension', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);
    const file = await writeScript(dir, 'LOUD.JS', '"ok"');

    await expect(runner.run(file)).resolves.toBe('ok');
  });

  it('fails with unsupported-script-type when no interpreter matches', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);
    const file = await writeScript(dir, 'notes.txt', 'hello');

    const err = await runError(runner.run(file));

    expect(isScriptMenuError(err, 'unsupported-script-type')).toBe(true);
    expect(errorMessage(err)).toBe('No interpreter registered for .txt scripts');
  });

  it('names the file when it has no extension', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);

    const err = await runError(runner.run(join(dir, 'Makefile')));

    expect(isScriptMenuError(err, 'unsupported-script-type')).toBe(true);
    expect(errorMessage(err)).toBe('No interpreter for Makefile');
  });

  it('leaves the command tree unchanged when the type is unsupported', async () => {
    await writeScript(dir, 'a.js');
    const notes = await writeScript(dir, 'notes.txt');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const registry = createDefaultRegistry();
    const runner = new ScriptRunner(registry, bindings);
    const tree = new CommandTree(dir);
    const synchronizer = new TreeSynchronizer({
      tree,
      supportedExtensions: registry.supportedExtensions(),
      createInvoker: (file) => () => runner.run(file),
    });
    await synchronizer.synchronize();
    const before = tree.toView();

    const err = await runError(runner.run(notes));

    expect(isScriptMenuError(err, 'unsupported-script-type')).toBe(true);
    expect(tree.toView()).toEqual(before);
  });

  it('wraps exceptions thrown by the script', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);
    const file = await writeScript(dir, 'fail.js', 'throw new Error("nope")');

    const err = await runError(runner.run(file));

    expect(isScriptMenuError(err, 'script-execution-failed')).toBe(true);
    expect(errorMessage(err)).toBe('fail.js failed: nope');
    expect(err instanceof ScriptMenuError && errorMessage(err.cause)).toBe('nope');
  });

  it('wraps rejections of async scripts', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);
    const file = await writeScript(dir, 'reject.js', 'Promise.reject(new Error("later"))');

    const err = await runError(runner.run(file));

    expect(isScriptMenuError(err, 'script-execution-failed')).toBe(true);
    expect(errorMessage(err)).toBe('reject.js failed: later');
  });

  it('reports a missing file as an execution failure', async () => {
    const runner = new ScriptRunner(createDefaultRegistry(), bindings);

    const err = await runError(runner.run(join(dir, 'gone.js')));

    expect(isScriptMenuError(err, 'script-execution-failed')).toBe(true);
  });
});
