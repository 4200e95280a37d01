import { count } from '../accumulators';
import { reduceByKey, type ByKeyOptions, type KeyProjection } from '../kernel';

/**
 * Counts the elements of each key.
 *
 * Keys that never occur are absent from the result; read it with
 * `countOf` to treat them as zero.
 *
 * @example
 * countBy([1, 1, 1, 2, 2, 3], x => x)
 * // Map { 1 => 3, 2 => 2, 3 => 1 }
 */
export function countBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    options: ByKeyOptions = {}
): Map<K, number> {
    return reduceByKey(source, key, () => undefined, count(), options);
}
