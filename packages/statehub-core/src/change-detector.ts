import { decodeCanonical, encodeCanonical } from './canonical.js';
import type { ChangeDetectionMode } from './config.js';
import { describeFields, type FieldDescriptor } from './fields.js';
import { type Logger, SilentLogger } from './logger.js';
import type { PropertyChange, StateType } from './types.js';

/**
 * How one field's before and after values are compared
 */
export interface ComparisonStrategy {
  readonly mode: ChangeDetectionMode;
  /** Comparison key of a field value, taken before and after the mutation */
  key(value: unknown): unknown;
  equals(before: unknown, after: unknown): boolean;
  /** The pre-mutation value, rebuilt from its key; `after` is the live value of the same field */
  restore(key: unknown, after: unknown): unknown;
}

/**
 * Native equality. Cannot see in-place edits of a nested object reached through an unchanged
 * reference.
 */
export const referenceStrategy: ComparisonStrategy = {
  mode: 'reference',
  key: (value) => value,
  equals: (before, after) => Object.is(before, after),
  restore: (key) => key,
};

/**
 * Canonical encodings. In-place nested edits change the encoding of the outer field.
 */
export const structuralStrategy: ComparisonStrategy = {
  mode: 'structural',
  key: (value) => encodeCanonical(value),
  equals: (before, after) => before === after,
  restore: (key, after) => (typeof key === 'string' ? decodeCanonical(key, after) : null),
};

export function strategyFor(mode: ChangeDetectionMode): ComparisonStrategy {
  return mode === 'reference' ? referenceStrategy : structuralStrategy;
}

/**
 * Comparison keys of every field of a state instance, taken just before a mutation
 */
export interface Snapshot<T extends object> {
  readonly type: StateType<T>;
  readonly keys: ReadonlyMap<string, unknown>;
}

/**
 * Computes which top-level fields of a state instance changed across a mutation
 */
export class ChangeDetector {
  private readonly logger: Logger;

  constructor(
    readonly strategy: ComparisonStrategy = structuralStrategy,
    logger?: Logger,
  ) {
    this.logger = logger ?? new SilentLogger();
  }

  snapshot<T extends object>(type: StateType<T>, state: T): Snapshot<T> {
    const keys = new Map<string, unknown>();
    for (const field of describeFields(type, state)) {
      keys.set(field.name, this.strategy.key(field.read(state)));
    }
    return { type, keys };
  }

  /**
   * Changed fields only, in field enumeration order
   */
  diff<T extends object>(before: Snapshot<T>, after: T): PropertyChange<T>[] {
    const changes: PropertyChange<T>[] = [];
    for (const field of describeFields(before.type, after)) {
      const oldKey = before.keys.get(field.name);
      const newValue = field.read(after);
      if (this.strategy.equals(oldKey, this.strategy.key(newValue))) continue;
      changes.push(this.change<T>(field, oldKey, newValue, before.type.name));
    }
    return changes;
  }

  private change<T>(field: FieldDescriptor, oldKey: unknown, newValue: unknown, typeName: string): PropertyChange<T> {
    let oldValue: unknown = null;
    try {
      oldValue = this.strategy.restore(oldKey, newValue) ?? null;
    } catch (error) {
      this.logger.warn(
        `Could not rebuild previous value of ${typeName}.${field.name}, reporting null`,
        error instanceof Error ? error.message : String(error),
      );
    }
    return Object.freeze(buildChange<T>(field.name, oldValue, newValue));
  }
}

// Names and values come from enumerating the fields of a `T`
function buildChange<T>(propertyName: string, oldValue: unknown, newValue: unknown): PropertyChange<T> {
  const change = { propertyName, oldValue, newValue };
  return change as unknown as PropertyChange<T>;
}
