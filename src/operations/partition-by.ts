import { validateKeyedCall, type Predicate, type ValueProjection } from '../kernel';

export interface Partition<V> {
    falses: V[];
    trues: V[];
}

/**
 * Splits a sequence in one pass into the elements that satisfy a predicate
 * and those that do not, each bucket in input order.
 *
 * The predicate sees the original element before the value projection
 * runs, so a value projection that empties the element cannot affect it.
 *
 * @example
 * partitionBy([1, 2, 3, 4, 5, 6], v => v % 2 === 0)
 * // { falses: [1, 3, 5], trues: [2, 4, 6] }
 */
export function partitionBy<E>(
    source: Iterable<E>,
    predicate: Predicate<E>
): Partition<E>;
export function partitionBy<E, V>(
    source: Iterable<E>,
    predicate: Predicate<E>,
    value: ValueProjection<E, V>
): Partition<V>;
export function partitionBy<E>(
    source: Iterable<E>,
    predicate: Predicate<E>,
    value: ValueProjection<E, unknown> = (element) => element
): Partition<unknown> {
    validateKeyedCall(source, { predicate, value }, {});

    const partition: Partition<unknown> = { falses: [], trues: [] };
    let index = 0;
    for (const element of source) {
        const holds = predicate(element, index);
        const projected = value(element, index);
        if (holds) {
            partition.trues.push(projected);
        } else {
            partition.falses.push(projected);
        }
        index++;
    }
    return partition;
}
