import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import { ScriptMenuError, errorMessage } from '../errors';
import { normalizeExtension } from './interpreters';
import type { InterpreterRegistry, ScriptBindings } from './interpreters';

/**
 * Runs script files through the interpreter registered for their extension.
 *
 * Nothing is cached: each run re-reads the file, so edits apply on the next
 * invocation. Errors are thrown to the caller, who decides how to show them.
 */
export class ScriptRunner {
  constructor(
    private readonly registry: InterpreterRegistry,
    private readonly bindings: ScriptBindings,
  ) {}

  async run(file: string): Promise<unknown> {
    const ext = normalizeExtension(extname(file));
    const interpreter = this.registry.getByExtension(ext);
    if (!interpreter) {
      throw new ScriptMenuError(
        'unsupported-script-type',
        ext ? `No interpreter registered for .${ext} scripts` : `No interpreter for ${basename(file)}`,
      );
    }

    const bindings: ScriptBindings = {
      config: this.bindings.config,
      machine: this.bindings.machine,
      gui: this.bindings.gui,
    };

    try {
      const source = await readFile(file, 'utf-8');
      return await interpreter.evaluate(source, bindings, file);
    } catch (err) {
      throw new ScriptMenuError(
        'script-execution-failed',
        `${basename(file)} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
