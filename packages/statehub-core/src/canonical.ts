import { EncodingError } from './errors.js';
import { prototypeGetters } from './fields.js';

/**
 * Canonical structural encoding of state values.
 *
 * The output is JSON text in which object keys are sorted, so two values with the same
 * reachable content always encode to the same string. Values JSON cannot carry are written as
 * tagged objects `{"$t": tag, ...}`: `undefined`, non-finite numbers, `bigint`, `Date`, `RegExp`,
 * `Map`, `Set` and class instances. A class instance carries its own fields and the getters it
 * inherits, as `describeFields` lists them for a state type. A plain object that owns a `$t` key
 * is escaped as an `Object` tag, so every `$t` node in the output is a tag.
 */

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

const TAG = '$t';

function sortByText<T>(items: T[], text: (item: T) => string): T[] {
  const keyed = items.map((item) => ({ item, key: text(item) }));
  keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  return keyed.map(({ item }) => item);
}

function isSkipped(value: unknown): boolean {
  return typeof value === 'function' || typeof value === 'symbol';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

function fieldNames(value: object, withGetters: boolean): string[] {
  const names = Object.keys(value);
  if (!withGetters) return names.sort();
  const own = new Set(names);
  return [...names, ...prototypeGetters(value).filter((name) => !own.has(name))].sort();
}

function encodeFields(value: object, ancestors: Set<object>, withGetters: boolean): { [key: string]: Json } {
  const fields: { [key: string]: Json } = {};
  for (const key of fieldNames(value, withGetters)) {
    const field: unknown = Reflect.get(value, key);
    if (isSkipped(field)) continue;
    Object.defineProperty(fields, key, {
      value: encodeNode(field, ancestors),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return fields;
}

function encodeObject(value: object, ancestors: Set<object>): Json {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (isSkipped(item) ? null : encodeNode(item, ancestors)));
  }
  if (value instanceof Date) {
    return { [TAG]: 'Date', v: encodeNode(value.getTime(), ancestors) };
  }
  if (value instanceof RegExp) {
    return { [TAG]: 'RegExp', source: value.source, flags: value.flags };
  }
  if (value instanceof Map) {
    const entries = [...value.entries()].map(([k, v]: [unknown, unknown]): Json[] => [
      encodeNode(k, ancestors),
      encodeNode(v, ancestors),
    ]);
    return { [TAG]: 'Map', v: sortByText(entries, ([k]) => JSON.stringify(k)) };
  }
  if (value instanceof Set) {
    const items = [...value.values()].map((item: unknown) => encodeNode(item, ancestors));
    return { [TAG]: 'Set', v: sortByText(items, (item) => JSON.stringify(item)) };
  }
  if (!isPlainObject(value)) {
    return { [TAG]: 'Object', c: constructorName(value), v: encodeFields(value, ancestors, true) };
  }
  const fields = encodeFields(value, ancestors, false);
  return Object.hasOwn(fields, TAG) ? { [TAG]: 'Object', v: fields } : fields;
}

function encodeNode(value: unknown, ancestors: Set<object>): Json {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : { [TAG]: 'number', v: String(value) };
    case 'bigint':
      return { [TAG]: 'bigint', v: value.toString() };
    case 'undefined':
    case 'function':
    case 'symbol':
      return { [TAG]: 'undefined' };
    case 'object':
      break;
  }
  if (value === null) return null;

  if (ancestors.has(value)) {
    throw new EncodingError('Cannot encode a value that contains itself', 'CYCLIC_VALUE', {
      type: constructorName(value),
    });
  }
  ancestors.add(value);
  try {
    return encodeObject(value, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

/**
 * @throws {EncodingError} when the value is reachable from itself
 */
export function encodeCanonical(value: unknown): string {
  return JSON.stringify(encodeNode(value, new Set()));
}

// #region Decoding
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(tag: string): EncodingError {
  return new EncodingError(`Malformed canonical encoding: bad "${tag}" node`, 'MALFORMED_ENCODING', { tag });
}

function templateField(template: unknown, key: string): unknown {
  return typeof template === 'object' && template !== null ? Reflect.get(template, key) : undefined;
}

function decodeFields(fields: Record<string, unknown>, template: unknown): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(fields).map(([key, node]) => [key, decodeNode(node, templateField(template, key))]),
  );
}

/**
 * Rebuild a class instance on the template's prototype. Getter-backed fields become own
 * read-only data properties shadowing the getter, since no constructor ran to set up the state
 * behind it. Other fields are assigned, so read-only prototype properties apply exactly as for an
 * ordinary assignment.
 */
function rebuildInstance(className: string, fields: Record<string, unknown>, template: unknown): unknown {
  if (typeof template !== 'object' || template === null || constructorName(template) !== className) {
    return fields;
  }
  const prototype: object | null = Object.getPrototypeOf(template);
  const instance: object = Object.create(prototype);
  const getters = new Set(prototypeGetters(template));
  for (const [key, value] of Object.entries(fields)) {
    if (getters.has(key)) {
      Object.defineProperty(instance, key, { value, enumerable: true, writable: false, configurable: true });
    } else {
      Object.assign(instance, { [key]: value });
    }
  }
  return instance;
}

function decodeTag(node: Record<string, unknown>, tag: string, template: unknown): unknown {
  const v = node.v;
  switch (tag) {
    case 'undefined':
      return undefined;
    case 'number':
      if (typeof v !== 'string') throw malformed(tag);
      return Number(v);
    case 'bigint':
      if (typeof v !== 'string') throw malformed(tag);
      return BigInt(v);
    case 'Date': {
      const time = decodeNode(v, undefined);
      if (typeof time !== 'number') throw malformed(tag);
      return new Date(time);
    }
    case 'RegExp':
      if (typeof node.source !== 'string' || typeof node.flags !== 'string') throw malformed(tag);
      return new RegExp(node.source, node.flags);
    case 'Map': {
      if (!Array.isArray(v)) throw malformed(tag);
      const templateMap = template instanceof Map ? template : undefined;
      return new Map(
        v.map((entry: unknown): [unknown, unknown] => {
          if (!Array.isArray(entry) || entry.length !== 2) throw malformed(tag);
          const key = decodeNode(entry[0], undefined);
          return [key, decodeNode(entry[1], templateMap?.get(key))];
        }),
      );
    }
    case 'Set':
      if (!Array.isArray(v)) throw malformed(tag);
      return new Set(v.map((item: unknown) => decodeNode(item, undefined)));
    case 'Object': {
      if (!isRecord(v)) throw malformed(tag);
      const fields = decodeFields(v, template);
      return typeof node.c === 'string' ? rebuildInstance(node.c, fields, template) : fields;
    }
    default:
      throw malformed(tag);
  }
}

function decodeNode(node: unknown, template: unknown): unknown {
  if (Array.isArray(node)) {
    return node.map((item: unknown, index) =>
      decodeNode(item, Array.isArray(template) ? template[index] : undefined),
    );
  }
  if (!isRecord(node)) return node;
  const tag = node[TAG];
  if (typeof tag === 'string') return decodeTag(node, tag, template);
  return decodeFields(node, template);
}

/**
 * Decode text produced by `encodeCanonical`.
 *
 * @param template - a live value of the same shape; class-instance nodes are rebuilt on its
 * prototype (recursively, following its properties). Without a matching template they decode as
 * plain objects.
 * @throws {EncodingError} on a malformed tag; `SyntaxError` on text that is not JSON; whatever an
 * assignment throws while rebuilding an instance
 */
export function decodeCanonical(text: string, template?: unknown): unknown {
  const tree: unknown = JSON.parse(text);
  return decodeNode(tree, template);
}
// #endregion
