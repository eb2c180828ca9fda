// src/core/saga/types.ts

/**
 * Maps each step identity to the type of the forward payload it publishes.
 * Steps that publish nothing map to `undefined`.
 */
export type PayloadMap = Record<string, unknown>;

/**
 * Read-only view of the forward-data registry handed to every perform call.
 */
export interface ForwardReader<T extends PayloadMap> {
    has(id: keyof T & string): boolean;
    get<K extends keyof T & string>(id: K): T[K] | undefined;
    /** Throws NotFoundError when the producing step has not recorded a payload. */
    require<K extends keyof T & string>(id: K): T[K];
}

/**
 * Result of a successful perform.
 */
export interface StepOutcome<T extends PayloadMap, K extends keyof T & string = keyof T & string> {
    /** Appended, in order, to the back of the pending queue. */
    readonly moreSteps: ReadonlyArray<Step<T>>;
    /** Pushed, in order, onto the compensation stack. */
    readonly moreRollbacks: ReadonlyArray<Step<T>>;
    /** Recorded under the emitting step's id when not undefined. */
    readonly forward?: T[K];
}

/**
 * A single unit of saga work.
 *
 * `rollback` is optional: a step without one needs no compensation.
 * When present it must be idempotent and must no-op when perform never
 * captured anything to undo.
 */
export interface Step<T extends PayloadMap, K extends keyof T & string = keyof T & string> {
    readonly id: K;
    readonly description: string;
    perform(forward: ForwardReader<T>): Promise<StepOutcome<T, K>>;
    rollback?(): Promise<void>;
}

export interface OutcomeParts<T extends PayloadMap, K extends keyof T & string> {
    moreSteps?: ReadonlyArray<Step<T>>;
    moreRollbacks?: ReadonlyArray<Step<T>>;
    forward?: T[K];
}

export function emit<T extends PayloadMap, K extends keyof T & string>(parts: OutcomeParts<T, K> = {}): StepOutcome<T, K> {
    return {
        moreSteps: parts.moreSteps ?? [],
        moreRollbacks: parts.moreRollbacks ?? [],
        forward: parts.forward,
    };
}

/**
 * State a step records during perform for use by its rollback.
 * Starts as NOT_CAPTURED; rollback inspects `captured` rather than probing for null.
 */
export type Captured<V> =
    | { readonly captured: false }
    | { readonly captured: true; readonly value: V };

export const NOT_CAPTURED: Captured<never> = { captured: false };

export function capture<V>(value: V): Captured<V> {
    return { captured: true, value };
}
