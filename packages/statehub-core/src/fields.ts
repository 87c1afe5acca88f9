import type { StateType } from './types.js';

export interface FieldDescriptor {
  readonly name: string;
  read(instance: object): unknown;
}

const descriptorCache = new WeakMap<StateType, readonly FieldDescriptor[]>();
const getterCache = new WeakMap<object, readonly string[]>();

/**
 * Names of the getters an instance inherits, nearest class first, stopping at
 * `Object.prototype`. A name a nearer prototype defines as a method or plain value hides a getter
 * further up. Built once per prototype.
 */
export function prototypeGetters(instance: object): readonly string[] {
  const start: object | null = Object.getPrototypeOf(instance);
  if (!start) return [];
  const cached = getterCache.get(start);
  if (cached) return cached;

  const names: string[] = [];
  const visited = new Set<string>(['constructor']);
  let proto: object | null = start;
  while (proto && proto !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(proto)) {
      if (visited.has(name)) continue;
      visited.add(name);
      if (Object.getOwnPropertyDescriptor(proto, name)?.get) names.push(name);
    }
    proto = Object.getPrototypeOf(proto);
  }

  const frozen = Object.freeze(names);
  getterCache.set(start, frozen);
  return frozen;
}

/**
 * Public, readable, top-level fields of a state type, in enumeration order:
 * own data fields of an instance first (declaration order), then getters found on the
 * prototype chain, nearest class first. Methods, function-valued fields, symbol keys and
 * setter-only accessors are skipped. Built once per constructor.
 *
 * @param sample - an instance to enumerate own fields from; a fresh `new type()` when omitted
 */
export function describeFields<T extends object>(type: StateType<T>, sample?: T): readonly FieldDescriptor[] {
  const cached = descriptorCache.get(type);
  if (cached) return cached;

  const instance: object = sample ?? new type();
  const fields: FieldDescriptor[] = [];
  const seen = new Set<string>();

  for (const name of Object.keys(instance)) {
    const descriptor = Object.getOwnPropertyDescriptor(instance, name);
    if (!descriptor || typeof descriptor.value === 'function') continue;
    seen.add(name);
    fields.push({ name, read: (target) => Reflect.get(target, name) });
  }

  for (const name of prototypeGetters(instance)) {
    if (seen.has(name)) continue;
    fields.push({ name, read: (target) => Reflect.get(target, name) });
  }

  const frozen = Object.freeze(fields);
  descriptorCache.set(type, frozen);
  return frozen;
}
