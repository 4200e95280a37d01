import type { Ordering } from '../kernel';
import { compareNatural } from '../util/compare';
import { validateCount, validateProjection } from '../util/validation';

export type PairOrdering<K, V> = Ordering<readonly [K, V]>;

/**
 * Copies an association into `[key, value]` pairs sorted by `less`.
 */
export function toSortedPairs<K, V>(
    association: ReadonlyMap<K, V>,
    less: PairOrdering<K, V>
): Array<[K, V]> {
    validateProjection(less, 'ordering');
    const pairs = Array.from(association);
    return pairs.sort((left, right) => {
        if (less(left, right)) {
            return -1;
        }
        return less(right, left) ? 1 : 0;
    });
}

/**
 * The first `k` pairs of an association under an arbitrary ordering.
 * Returns every pair when `k` exceeds the number of keys.
 */
export function topK<K, V>(
    association: ReadonlyMap<K, V>,
    k: number,
    less: PairOrdering<K, V>
): Array<[K, V]> {
    validateCount(k, 'k');
    return toSortedPairs(association, less).slice(0, k);
}

/**
 * Largest values first; equal values by ascending key.
 *
 * @example
 * topKByValue(countBy([1, 1, 1, 2, 2, 3], x => x), 2)
 * // [[1, 3], [2, 2]]
 */
export function topKByValue<K, V>(association: ReadonlyMap<K, V>, k: number): Array<[K, V]> {
    return topK(association, k, ([leftKey, leftValue], [rightKey, rightValue]) => {
        const byValue = compareNatural(leftValue, rightValue);
        if (byValue !== 0) {
            return byValue > 0;
        }
        return compareNatural(leftKey, rightKey) < 0;
    });
}

/**
 * Smallest values first; equal values by ascending key.
 */
export function bottomKByValue<K, V>(association: ReadonlyMap<K, V>, k: number): Array<[K, V]> {
    return topK(association, k, ([leftKey, leftValue], [rightKey, rightValue]) => {
        const byValue = compareNatural(leftValue, rightValue);
        if (byValue !== 0) {
            return byValue < 0;
        }
        return compareNatural(leftKey, rightKey) < 0;
    });
}

/**
 * Smallest keys first. Keys are unique; the descending-value tie-break
 * only matters for keys that compare equal under natural order.
 */
export function topKByKey<K, V>(association: ReadonlyMap<K, V>, k: number): Array<[K, V]> {
    return topK(association, k, ([leftKey, leftValue], [rightKey, rightValue]) => {
        const byKey = compareNatural(leftKey, rightKey);
        if (byKey !== 0) {
            return byKey < 0;
        }
        return compareNatural(leftValue, rightValue) > 0;
    });
}
