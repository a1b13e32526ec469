/**
 * Named evaluator lookup.
 *
 * The runner resolves evaluator names through a registry instead of a
 * hard-coded switch, so custom evaluators plug in with `register()`.
 */

import { EvaluatorRegistryError } from '../errors.js';
import type { Evaluator, EvaluatorConstructor, EvaluatorOptions } from '../evaluators/types.js';

function isEvaluatorConstructor(value: unknown): value is EvaluatorConstructor {
  if (typeof value !== 'function') {
    return false;
  }
  const prototype: unknown = value.prototype;
  return (
    typeof prototype === 'object' &&
    prototype !== null &&
    'evaluate' in prototype &&
    typeof prototype.evaluate === 'function' &&
    'isPassing' in prototype &&
    typeof prototype.isPassing === 'function'
  );
}

/**
 * Registry of evaluator constructors keyed by evaluator name.
 */
export class EvaluatorRegistry {
  private readonly constructors = new Map<string, EvaluatorConstructor>();
  private frozen = false;

  /** Register a constructor under `name`. */
  register(name: string, ctor: EvaluatorConstructor): this {
    if (this.frozen) {
      throw new EvaluatorRegistryError(
        `Cannot register evaluator '${name}': registry is frozen`,
      );
    }
    if (name.trim().length === 0) {
      throw new EvaluatorRegistryError('Evaluator name must not be empty');
    }
    if (this.constructors.has(name)) {
      throw new EvaluatorRegistryError(`Evaluator '${name}' is already registered`);
    }
    if (!isEvaluatorConstructor(ctor)) {
      throw new EvaluatorRegistryError(
        `Cannot register '${name}': constructor does not produce an Evaluator (needs evaluate and isPassing methods)`,
      );
    }
    this.constructors.set(name, ctor);
    return this;
  }

  /** Get the constructor for `name`. Throws when unknown. */
  get(name: string): EvaluatorConstructor {
    const ctor = this.constructors.get(name);
    if (!ctor) {
      const available = this.list();
      throw new EvaluatorRegistryError(
        `Unknown evaluator: '${name}'. Available: ${available.length > 0 ? available.join(', ') : '(none)'}`,
      );
    }
    return ctor;
  }

  has(name: string): boolean {
    return this.constructors.has(name);
  }

  /** Registered names, sorted. */
  list(): string[] {
    return [...this.constructors.keys()].sort();
  }

  create(name: string, options: EvaluatorOptions = {}): Evaluator {
    const Ctor = this.get(name);
    return new Ctor(options);
  }

  /** Reject further registrations. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
