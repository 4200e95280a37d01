import { createAssociation } from '../association';
import {
    finalizeAll,
    validateKeyedCall,
    type ByKeyOptions,
    type KeyProjection,
    type OrderProjection,
    type Ordering,
    type ValueProjection
} from '../kernel';
import { naturalLess } from '../util/compare';
import { validateProjection } from '../util/validation';

export interface Extrema<V> {
    min: V;
    max: V;
}

export interface ExtremaOptions<O> extends ByKeyOptions {
    /** Strict "less than" over ordering values. Defaults to natural order. */
    compare?: Ordering<O>;
}

interface ExtremaState<V, O> {
    minValue: V;
    minOrder: O;
    maxValue: V;
    maxOrder: O;
}

/**
 * Tracks, per key, the value of the element with the smallest ordering and
 * the value of the element with the largest ordering.
 *
 * The ordering projection runs before the value projection for each
 * element, so the value projection may take data out of the element.
 * A later element only replaces a stored extreme on strict improvement:
 * on ties the earliest element is kept.
 *
 * @example
 * // Earliest and latest reading of each sensor
 * extremaBy(readings, r => r.sensor, r => r, r => r.timestamp)
 */
export function extremaBy<E, K, V, O>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    order: OrderProjection<E, O>,
    options: ExtremaOptions<O> = {}
): Map<K, Extrema<V>> {
    validateKeyedCall(source, { key, value, order }, options);
    return trackExtrema<E, K, V, O>(source, key, (element, index) => {
        const orderValue = order(element, index);
        return [orderValue, value(element, index)];
    }, options.compare ?? naturalLess, options);
}

/**
 * Smallest and largest value per key, ordering by the value itself.
 *
 * @example
 * minmaxBy(readings, r => r.sensor, r => r.value)
 * // Map { 'alpha' => { min: 4, max: 15 }, ... }
 */
export function minmaxBy<E, K, V>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    options: ExtremaOptions<V> = {}
): Map<K, Extrema<V>> {
    validateKeyedCall(source, { key, value }, options);
    return trackExtrema<E, K, V, V>(source, key, (element, index) => {
        const projected = value(element, index);
        return [projected, projected];
    }, options.compare ?? naturalLess, options);
}

function trackExtrema<E, K, V, O>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    project: (element: E, index: number) => readonly [O, V],
    compare: Ordering<O>,
    options: ByKeyOptions
): Map<K, Extrema<V>> {
    validateProjection(compare, 'compare');

    const states = createAssociation<K, ExtremaState<V, O>>(options);
    let index = 0;
    for (const element of source) {
        const keyValue = key(element, index);
        const [orderValue, projected] = project(element, index);
        const state = states.get(keyValue);
        if (state === undefined) {
            states.set(keyValue, {
                minValue: projected,
                minOrder: orderValue,
                maxValue: projected,
                maxOrder: orderValue
            });
        } else {
            if (compare(orderValue, state.minOrder)) {
                state.minOrder = orderValue;
                state.minValue = projected;
            }
            if (compare(state.maxOrder, orderValue)) {
                state.maxOrder = orderValue;
                state.maxValue = projected;
            }
        }
        index++;
    }

    return finalizeAll(states, (state) => ({ min: state.minValue, max: state.maxValue }), options);
}
