import { ContractViolationError } from '../errors';
import {
    finalizeAll,
    reduceByKey,
    type Accumulator,
    type ByKeyOptions,
    type Defined,
    type FinalizingAccumulator,
    type KeyProjection,
    type ValueProjection
} from '../kernel';

/**
 * Combining function of the short form: returns the next accumulator.
 * Every key starts from the same initial value, which must therefore be a
 * primitive; object accumulators go through {@link foldBy} or an
 * accumulator with `identity()`.
 */
export type CombineOperator<A, V> = (accumulator: A, value: V) => A;

type AnyAccumulator = Accumulator<unknown, Defined> & {
    finalize?: (accumulator: Defined) => unknown;
};

/**
 * The general keyed reduction.
 *
 * Accepts either an accumulator object (`identity`, `combine` and an
 * optional `finalize`) or an initial value plus a combining function.
 * With `finalize`, each key reports `finalize(accumulator)` instead of the
 * accumulator itself.
 *
 * @example
 * // Mean score per team
 * transformReduceBy(scores, s => s.team, s => s.points, average())
 *
 * @example
 * // Longest word per initial
 * transformReduceBy(words, w => w[0], w => w.length, 0, Math.max)
 */
export function transformReduceBy<E, K, V, A extends Defined, R>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    accumulator: FinalizingAccumulator<V, A, R>,
    options?: ByKeyOptions
): Map<K, R>;
export function transformReduceBy<E, K, V, A extends Defined>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    accumulator: Accumulator<V, A>,
    options?: ByKeyOptions
): Map<K, A>;
export function transformReduceBy<E, K, V, A extends Defined>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    initial: A,
    combine: CombineOperator<A, V>,
    options?: ByKeyOptions
): Map<K, A>;
export function transformReduceBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, unknown>,
    accumulatorOrInitial: unknown,
    combineOrOptions?: CombineOperator<Defined, unknown> | ByKeyOptions,
    maybeOptions: ByKeyOptions = {}
): Map<K, unknown> {
    if (typeof combineOrOptions === 'function') {
        const initial = accumulatorOrInitial;
        if (initial === undefined) {
            throw new ContractViolationError('transformReduceBy needs an initial value other than undefined');
        }
        if (typeof initial === 'object' && initial !== null) {
            throw new ContractViolationError(
                'transformReduceBy shares its initial value between keys, so it must be a primitive. Use foldBy or an accumulator with identity() for object accumulators'
            );
        }
        return reduceByKey(source, key, value, {
            identity: () => initial,
            combine: combineOrOptions
        }, maybeOptions);
    }

    const options = combineOrOptions ?? {};
    if (!isAccumulator(accumulatorOrInitial)) {
        throw new ContractViolationError(
            'transformReduceBy expects an accumulator with identity() and combine(), or an initial value and a combining function'
        );
    }
    const accumulator = accumulatorOrInitial;
    const reduced = reduceByKey(source, key, value, accumulator, options);
    const finalize = accumulator.finalize;
    if (finalize === undefined) {
        return reduced;
    }
    return finalizeAll(reduced, (state) => finalize.call(accumulator, state), options);
}

function isAccumulator(candidate: unknown): candidate is AnyAccumulator {
    return typeof candidate === 'object' &&
        candidate !== null &&
        'identity' in candidate &&
        typeof candidate.identity === 'function' &&
        'combine' in candidate &&
        typeof candidate.combine === 'function' &&
        (!('finalize' in candidate) || candidate.finalize === undefined || typeof candidate.finalize === 'function');
}
