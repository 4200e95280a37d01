import { createAssociation } from '../association';
import { validateKeyedCall, type ByKeyOptions, type KeyProjection, type ValueProjection } from '../kernel';
import { validateDestination } from '../util/validation';

export interface IndexByOptions extends ByKeyOptions {
    /**
     * When true (the default) the last element carrying a key wins.
     * When false the first one wins, and entries already present in a
     * destination are kept.
     */
    overwrite?: boolean;
}

/**
 * Options of {@link indexByInto}. The destination decides key equality.
 */
export type IndexByIntoOptions = Pick<IndexByOptions, 'expectedUniqueCount' | 'overwrite'>;

/**
 * Maps each key to a single value projected from one of its elements.
 *
 * Both projections run for every element, whether or not it wins, so a
 * stateful value projection (a counter, a generator) sees every element.
 *
 * @example
 * // Position of the last occurrence of each value
 * indexBy([1, 2, 2, 3], x => x, (_, i) => i)
 * // Map { 1 => 0, 2 => 2, 3 => 3 }
 */
export function indexBy<E, K, V>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    options: IndexByOptions = {}
): Map<K, V> {
    return indexByInto(source, key, value, createAssociation<K, V>(options), options);
}

/**
 * Like {@link indexBy}, writing into a caller-supplied map, which is
 * mutated in place and returned.
 */
export function indexByInto<E, K, V, M extends Map<K, V>>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    destination: M,
    options: IndexByIntoOptions = {}
): M {
    validateKeyedCall(source, { key, value }, options);
    validateDestination(destination, 'indexByInto');

    const overwrite = options.overwrite ?? true;
    let index = 0;
    for (const element of source) {
        const keyValue = key(element, index);
        const projected = value(element, index);
        if (overwrite || !destination.has(keyValue)) {
            destination.set(keyValue, projected);
        }
        index++;
    }
    return destination;
}
