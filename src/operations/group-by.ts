import { createAssociation } from '../association';
import { ContractViolationError } from '../errors';
import { validateKeyedCall, type ByKeyOptions, type KeyProjection, type ValueProjection } from '../kernel';
import { validateDestination, validateProjection } from '../util/validation';

/**
 * Options of {@link groupByInto}. The destination decides key equality.
 */
export type GroupByIntoOptions = Pick<ByKeyOptions, 'expectedUniqueCount'>;

/**
 * Buckets elements by key. Within a bucket, values keep input order.
 * Without a value projection the elements themselves are bucketed.
 *
 * @example
 * // Anagram classes
 * groupBy(words, w => [...w].sort().join(''))
 */
export function groupBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    options?: ByKeyOptions
): Map<K, E[]>;
export function groupBy<E, K, V>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    options?: ByKeyOptions
): Map<K, V[]>;
export function groupBy<E, K>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    valueOrOptions?: ValueProjection<E, unknown> | ByKeyOptions,
    maybeOptions: ByKeyOptions = {}
): Map<K, unknown[]> {
    if (typeof valueOrOptions === 'function') {
        return groupByInto(source, key, valueOrOptions, createAssociation<K, unknown[]>(maybeOptions), maybeOptions);
    }
    if (valueOrOptions !== undefined && typeof valueOrOptions !== 'object') {
        validateProjection(valueOrOptions, 'value');
    }
    const options = valueOrOptions ?? {};
    return groupByInto(source, key, (element) => element, createAssociation<K, E[]>(options), options);
}

/**
 * Appends onto an existing grouping. The destination is mutated in place
 * and returned; its existing buckets must be arrays.
 */
export function groupByInto<E, K, V, M extends Map<K, V[]>>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    destination: M,
    options: GroupByIntoOptions = {}
): M {
    validateKeyedCall(source, { key, value }, options);
    validateDestination(destination, 'groupByInto');
    for (const [existingKey, bucket] of destination) {
        if (!Array.isArray(bucket)) {
            throw new ContractViolationError(`groupByInto destination bucket for ${String(existingKey)} is not an array`);
        }
    }

    let index = 0;
    for (const element of source) {
        const keyValue = key(element, index);
        const projected = value(element, index);
        const bucket = destination.get(keyValue);
        if (bucket === undefined) {
            destination.set(keyValue, [projected]);
        } else {
            bucket.push(projected);
        }
        index++;
    }
    return destination;
}
