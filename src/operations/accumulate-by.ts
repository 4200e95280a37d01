import { plus, type Summable } from '../accumulators';
import type { ByKeyOptions, KeyProjection, ValueProjection } from '../kernel';
import { transformReduceBy } from './transform-reduce-by';

/**
 * Sums the values of each key.
 *
 * Without `initial` every key starts at 0. With `initial`, every key starts
 * at that value, so each total is shifted by it exactly once. Bigint values
 * need a bigint `initial` such as `0n`.
 *
 * @example
 * accumulateBy(scores, s => s.team, s => s.points)
 * // Map { 'red' => 7, 'blue' => 6 }
 *
 * accumulateBy(scores, s => s.team, s => s.points, 10)
 * // Map { 'red' => 17, 'blue' => 16 }
 */
export function accumulateBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, number>,
    options?: ByKeyOptions
): Map<K, number>;
export function accumulateBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, number>,
    initial: number,
    options?: ByKeyOptions
): Map<K, number>;
export function accumulateBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, bigint>,
    initial: bigint,
    options?: ByKeyOptions
): Map<K, bigint>;
export function accumulateBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, Summable>,
    initialOrOptions?: Summable | ByKeyOptions,
    maybeOptions: ByKeyOptions = {}
): Map<K, Summable> {
    if (typeof initialOrOptions === 'number' || typeof initialOrOptions === 'bigint') {
        return transformReduceBy<E, K, Summable, Summable>(source, key, value, initialOrOptions, plus, maybeOptions);
    }
    return transformReduceBy<E, K, Summable, Summable>(source, key, value, 0, plus, initialOrOptions);
}
