import { createAssociation, type KeyEquality } from './association';
import { validateCount, validateProjection, validateSource } from './util/validation';

/**
 * Any value except undefined. Accumulators are constrained to it so that a
 * missing map entry can be told apart from a stored accumulator.
 */
export type Defined = {} | null;

export type KeyProjection<E, K> = (element: E, index: number) => K;

export type ValueProjection<E, V> = (element: E, index: number) => V;

export type OrderProjection<E, O> = (element: E, index: number) => O;

export type Predicate<E> = (element: E, index: number) => boolean;

/**
 * A strict "less than" relation.
 */
export type Ordering<T> = (left: T, right: T) => boolean;

export interface ByKeyOptions {
    /**
     * Expected number of distinct keys. A sizing hint only: it is validated
     * but never changes the result.
     */
    expectedUniqueCount?: number;

    /** How keys of the result association compare. Defaults to 'identity'. */
    keyEquality?: KeyEquality;
}

/**
 * Per-key running state folded from contributed values.
 *
 * @example
 * // Running total
 * const total: Accumulator<number, number> = {
 *     identity: () => 0,
 *     combine: (acc, value) => acc + value
 * };
 */
export interface Accumulator<V, A extends Defined> {
    /** Creates the neutral state for a key seen for the first time */
    identity(): A;

    /** Folds one value into the state and returns the next state */
    combine(accumulator: A, value: V): A;
}

/**
 * An accumulator whose running state is converted once, after the pass,
 * into the reported result (for example sum and count into a mean).
 */
export interface FinalizingAccumulator<V, A extends Defined, R> extends Accumulator<V, A> {
    finalize(accumulator: A): R;
}

/**
 * Checks the arguments every keyed operation shares. Runs before the first
 * element is read, so a misuse never leaves a partial result behind.
 */
export function validateKeyedCall(
    source: unknown,
    projections: Record<string, unknown>,
    options: ByKeyOptions
): void {
    validateSource(source);
    for (const [role, projection] of Object.entries(projections)) {
        validateProjection(projection, role);
    }
    if (options.expectedUniqueCount !== undefined) {
        validateCount(options.expectedUniqueCount, 'expectedUniqueCount');
    }
}

/**
 * The single-pass accumulation kernel.
 *
 * Visits each element once, left to right. For every element the key is
 * projected first, then the value; the first occurrence of a key creates its
 * accumulator with `identity()`, and every occurrence is folded in with
 * `combine`.
 */
export function reduceByKey<E, K, V, A extends Defined>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    accumulator: Accumulator<V, A>,
    options: ByKeyOptions = {}
): Map<K, A> {
    validateKeyedCall(source, { key, value }, options);

    const accumulators = createAssociation<K, A>(options);
    let index = 0;
    for (const element of source) {
        const keyValue = key(element, index);
        const contributed = value(element, index);
        const stored = accumulators.get(keyValue);
        const current = stored === undefined ? accumulator.identity() : stored;
        accumulators.set(keyValue, accumulator.combine(current, contributed));
        index++;
    }
    return accumulators;
}

/**
 * The second phase of a reduction: converts every accumulator into its
 * reported form. The raw accumulators are not kept.
 */
export function finalizeAll<K, A, R>(
    accumulators: ReadonlyMap<K, A>,
    finalize: (accumulator: A) => R,
    options: Pick<ByKeyOptions, 'keyEquality'> = {}
): Map<K, R> {
    const results = createAssociation<K, R>(options);
    for (const [keyValue, state] of accumulators) {
        results.set(keyValue, finalize(state));
    }
    return results;
}
