// Runtime immutability for policy handles and audit snapshots.

export class PolicyMutationError extends Error {
  readonly path: string;

  constructor(path: string, operation: string) {
    super(`Policy is read-only: cannot ${operation} ${path}`);
    this.name = 'PolicyMutationError';
    this.path = path;
  }
}

function isObject(value: unknown): value is object {
  return value !== null && typeof value === 'object';
}

const guarded = new WeakMap<object, object>();

function guard<T extends object>(target: T, path: string): T {
  return new Proxy(target, {
    get(obj, prop, receiver) {
      const value: unknown = Reflect.get(obj, prop, receiver);
      if (!isObject(value)) return value;
      const existing = guarded.get(value);
      if (existing) return existing;
      const child = guard(value, `${path}.${String(prop)}`);
      guarded.set(value, child);
      return child;
    },
    set(_obj, prop) {
      throw new PolicyMutationError(`${path}.${String(prop)}`, 'assign');
    },
    deleteProperty(_obj, prop) {
      throw new PolicyMutationError(`${path}.${String(prop)}`, 'delete');
    },
    defineProperty(_obj, prop) {
      throw new PolicyMutationError(`${path}.${String(prop)}`, 'define');
    },
    setPrototypeOf() {
      throw new PolicyMutationError(path, 'change the prototype of');
    },
    preventExtensions() {
      throw new PolicyMutationError(path, 'freeze');
    },
  });
}

/**
 * Wrap a policy object so that every nested read returns a guarded view and
 * every write throws `PolicyMutationError`. The caller must drop its own
 * reference to `value` after locking.
 */
export function lockPolicy<T extends object>(value: T, label: string): T {
  return guard(value, label);
}

/**
 * Replace what JSON cannot carry with marker strings: bigints become
 * `[bigint 123]` and a reference back to an enclosing object `[circular]`.
 */
function jsonSafe(value: unknown, ancestors: readonly object[]): unknown {
  if (typeof value === 'bigint') return `[bigint ${value.toString()}]`;
  if (!isObject(value)) return value;
  if (ancestors.includes(value)) return '[circular]';
  if (typeof Reflect.get(value, 'toJSON') === 'function') return value;

  const path = [...ancestors, value];
  if (Array.isArray(value)) return value.map((item: unknown) => jsonSafe(item, path));
  const out: Record<string, unknown> = {};
  for (const key of Object.keys(value)) {
    out[key] = jsonSafe(Reflect.get(value, key), path);
  }
  return out;
}

/** Detached, deeply frozen JSON copy of a value. Never throws on odd input. */
export function snapshot(value: unknown): unknown {
  const copy: unknown = JSON.parse(JSON.stringify(jsonSafe(value ?? null, [])) ?? 'null');
  return deepFreeze(copy);
}

export function deepFreeze<T>(value: T): T {
  if (isObject(value) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}
