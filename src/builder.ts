import type { Accumulator, ByKeyOptions, Defined, FinalizingAccumulator, KeyProjection, OrderProjection, Predicate, ValueProjection } from './kernel';
import { accumulateBy } from './operations/accumulate-by';
import { countBy } from './operations/count-by';
import { extremaBy, minmaxBy, type Extrema, type ExtremaOptions } from './operations/extrema-by';
import { foldBy } from './operations/fold-by';
import { groupBy } from './operations/group-by';
import { indexBy, type IndexByOptions } from './operations/index-by';
import { partitionBy, type Partition } from './operations/partition-by';
import { transformReduceBy } from './operations/transform-reduce-by';
import { validateProjection } from './util/validation';

/**
 * Chains lazy stages in front of one keyed operation.
 *
 * `filter` and `map` only describe stages; elements flow through them when
 * a terminal operation pulls from the builder, so the input is still read
 * once. Every index passed to a projection is the element's position in
 * the sequence that stage receives.
 *
 * @example
 * from(orders)
 *     .filter(order => order.status === 'paid')
 *     .accumulateBy(order => order.region, order => order.total)
 */
export class ByKeyBuilder<E> {
    constructor(private source: Iterable<E>) {}

    /**
     * Keeps only the elements that satisfy the predicate.
     *
     * @example
     * .filter(item => item.price > 50)
     */
    filter(predicate: Predicate<E>): ByKeyBuilder<E> {
        validateProjection(predicate, 'filter');
        const source = this.source;
        return new ByKeyBuilder<E>({
            *[Symbol.iterator]() {
                let index = 0;
                for (const element of source) {
                    if (predicate(element, index++)) {
                        yield element;
                    }
                }
            }
        });
    }

    /**
     * Replaces each element with a projection of it.
     *
     * @example
     * .map(line => line.trim().toLowerCase())
     */
    map<U>(projection: ValueProjection<E, U>): ByKeyBuilder<U> {
        validateProjection(projection, 'map');
        const source = this.source;
        return new ByKeyBuilder<U>({
            *[Symbol.iterator]() {
                let index = 0;
                for (const element of source) {
                    yield projection(element, index++);
                }
            }
        });
    }

    countBy<K>(key: KeyProjection<E, K>, options?: ByKeyOptions): Map<K, number> {
        return countBy(this.source, key, options);
    }

    indexBy<K, V>(key: KeyProjection<E, K>, value: ValueProjection<E, V>, options?: IndexByOptions): Map<K, V> {
        return indexBy(this.source, key, value, options);
    }

    groupBy<K>(key: KeyProjection<E, K>, options?: ByKeyOptions): Map<K, E[]>;
    groupBy<K, V>(key: KeyProjection<E, K>, value: ValueProjection<E, V>, options?: ByKeyOptions): Map<K, V[]>;
    groupBy<K>(
        key: KeyProjection<E, K>,
        valueOrOptions?: ValueProjection<E, unknown> | ByKeyOptions,
        options?: ByKeyOptions
    ): Map<K, unknown[]> {
        return typeof valueOrOptions === 'function'
            ? groupBy(this.source, key, valueOrOptions, options)
            : groupBy(this.source, key, valueOrOptions);
    }

    foldBy<K, V, A extends Defined>(
        key: KeyProjection<E, K>,
        value: ValueProjection<E, V>,
        initial: () => A,
        combine: (accumulator: A, value: V) => void,
        options?: ByKeyOptions
    ): Map<K, A> {
        return foldBy(this.source, key, value, initial, combine, options);
    }

    /**
     * Reduces each key with an accumulator object. See {@link transformReduceBy}.
     */
    transformReduceBy<K, V, A extends Defined, R>(
        key: KeyProjection<E, K>,
        value: ValueProjection<E, V>,
        accumulator: FinalizingAccumulator<V, A, R>,
        options?: ByKeyOptions
    ): Map<K, R>;
    transformReduceBy<K, V, A extends Defined>(
        key: KeyProjection<E, K>,
        value: ValueProjection<E, V>,
        accumulator: Accumulator<V, A>,
        options?: ByKeyOptions
    ): Map<K, A>;
    transformReduceBy<K, V, A extends Defined>(
        key: KeyProjection<E, K>,
        value: ValueProjection<E, V>,
        accumulator: Accumulator<V, A>,
        options?: ByKeyOptions
    ): Map<K, unknown> {
        // The operation reads finalize at run time
        return transformReduceBy(this.source, key, value, accumulator, options);
    }

    accumulateBy<K>(key: KeyProjection<E, K>, value: ValueProjection<E, number>, options?: ByKeyOptions): Map<K, number>;
    accumulateBy<K>(key: KeyProjection<E, K>, value: ValueProjection<E, number>, initial: number, options?: ByKeyOptions): Map<K, number>;
    accumulateBy<K>(
        key: KeyProjection<E, K>,
        value: ValueProjection<E, number>,
        initialOrOptions?: number | ByKeyOptions,
        options?: ByKeyOptions
    ): Map<K, number> {
        return typeof initialOrOptions === 'number'
            ? accumulateBy(this.source, key, value, initialOrOptions, options)
            : accumulateBy(this.source, key, value, initialOrOptions);
    }

    extremaBy<K, V, O>(
        key: KeyProjection<E, K>,
        value: ValueProjection<E, V>,
        order: OrderProjection<E, O>,
        options?: ExtremaOptions<O>
    ): Map<K, Extrema<V>> {
        return extremaBy(this.source, key, value, order, options);
    }

    minmaxBy<K, V>(key: KeyProjection<E, K>, value: ValueProjection<E, V>, options?: ExtremaOptions<V>): Map<K, Extrema<V>> {
        return minmaxBy(this.source, key, value, options);
    }

    partitionBy(predicate: Predicate<E>): Partition<E>;
    partitionBy<V>(predicate: Predicate<E>, value: ValueProjection<E, V>): Partition<V>;
    partitionBy(predicate: Predicate<E>, value?: ValueProjection<E, unknown>): Partition<unknown> {
        return value === undefined
            ? partitionBy(this.source, predicate)
            : partitionBy(this.source, predicate, value);
    }

    toArray(): E[] {
        return Array.from(this.source);
    }
}
