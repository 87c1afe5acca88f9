// #region Keys
/**
 * A state type is a class with a zero-argument constructor.
 * The store keeps at most one live instance per constructor.
 */
export type StateType<T extends object = object> = new () => T;

/**
 * Events are routed by their constructor. Primitive payloads route to their wrapper
 * (`Number`, `String`, `Boolean`), object literals to `Object`.
 */
export type EventKey<E = unknown> = abstract new (...args: never[]) => E;

export type EventOf<K> = K extends NumberConstructor
  ? number
  : K extends StringConstructor
    ? string
    : K extends BooleanConstructor
      ? boolean
      : K extends abstract new (...args: never[]) => infer E
        ? E
        : never;
// #endregion

// #region Changes
/** Top-level field names a change can be reported for */
export type FieldName<T> = Extract<keyof T, string>;

/**
 * One top-level field whose comparison key differed across a mutation.
 * Narrowing on `propertyName` narrows the value types.
 */
export type PropertyChange<T = Record<string, unknown>> = {
  readonly [K in FieldName<T>]: {
    readonly propertyName: K;
    /** `null` when the field was empty before, or its old value could not be rebuilt */
    readonly oldValue: T[K] | null;
    readonly newValue: T[K];
  };
}[FieldName<T>];

export interface StateChange<T> {
  readonly state: T;
  readonly changedProperties: readonly PropertyChange<T>[];
}
// #endregion

// #region Streams
export type Listener<T> = (value: T) => void;

export type Predicate<T> = (value: T) => boolean;

/** Safe to call more than once */
export type Unsubscribe = () => void;

/**
 * A multi-subscriber stream. Every `subscribe` call is an independent subscription over the
 * same underlying channel.
 */
export interface Stream<T> {
  subscribe(listener: Listener<T>, onClose?: () => void): Unsubscribe;
  filter(predicate: Predicate<T>): Stream<T>;
}

export type UpdateFn<T> = (state: T) => void | PromiseLike<void>;
// #endregion

// #region Errors
export interface HandlerErrorContext {
  /** `store` for current-value and change-event channels, `bus` for event channels */
  readonly source: 'store' | 'bus';
  /** Name of the constructor the channel is keyed by */
  readonly channel: string;
  readonly value: unknown;
}

export type HandlerErrorHook = (error: unknown, context: HandlerErrorContext) => void;
// #endregion
