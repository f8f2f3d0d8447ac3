import { createContext, runInContext } from 'vm';

/**
 * Named values a script sees as globals. The runner only passes them
 * through; their shape belongs to the host application.
 */
export interface ScriptBindings {
  readonly config: unknown;
  readonly machine: unknown;
  readonly gui: unknown;
}

export interface Interpreter {
  readonly name: string;
  /** File extensions handled, with or without the leading dot */
  readonly extensions: readonly string[];
  /** Evaluate a script body; may return a promise */
  evaluate(source: string, bindings: ScriptBindings, filename: string): unknown;
}

export function normalizeExtension(ext: string): string {
  return ext.replace(/^\./, '').toLowerCase();
}

/**
 * Extension-keyed lookup of interpreters. When two interpreters claim the
 * same extension, the first registered keeps it.
 */
export class InterpreterRegistry {
  private readonly interpreters: Interpreter[] = [];
  private readonly byExtension = new Map<string, Interpreter>();

  register(interpreter: Interpreter): this {
    this.interpreters.push(interpreter);
    for (const ext of interpreter.extensions) {
      const key = normalizeExtension(ext);
      if (key && !this.byExtension.has(key)) {
        this.byExtension.set(key, interpreter);
      }
    }
    return this;
  }

  getByExtension(ext: string): Interpreter | undefined {
    return this.byExtension.get(normalizeExtension(ext));
  }

  /** Lower-cased, deduplicated extensions of every registered interpreter */
  supportedExtensions(): Set<string> {
    return new Set(this.byExtension.keys());
  }

  list(): readonly Interpreter[] {
    return this.interpreters;
  }
}

/**
 * Evaluates the file body in a fresh V8 context whose globals are the
 * bindings plus `console`. The completion value of the script is returned.
 */
export const javascriptInterpreter: Interpreter = {
  name: 'JavaScript',
  extensions: ['js', 'cjs'],
  evaluate(source, bindings, filename) {
    const context = createContext({
      config: bindings.config,
      machine: bindings.machine,
      gui: bindings.gui,
      console,
    });
    return runInContext(source, context, { filename });
  },
};

export function createDefaultRegistry(): InterpreterRegistry {
  return new InterpreterRegistry().register(javascriptInterpreter);
}
