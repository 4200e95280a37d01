import { countOf, getOrThrow } from '../association';
import { countBy } from '../operations/count-by';
import { minmaxBy } from '../operations/extrema-by';
import { topKByValue } from '../operations/ranking';

/**
 * The `k` most frequent values, most frequent first. Values with the same
 * frequency come out smallest first.
 */
export function topKFrequent(values: number[], k: number): number[] {
    return topKByValue(countBy(values, value => value), k).map(([value]) => value);
}

/**
 * Values of `right` that also occur in `left`, each kept as many times as
 * it occurs in both. Output follows the order of `right`.
 *
 * @example
 * intersectWithMultiplicity([1, 2, 2, 1], [2, 2])
 * // [2, 2]
 */
export function intersectWithMultiplicity(left: number[], right: number[]): number[] {
    const remaining = countBy(left, value => value);
    const shared: number[] = [];
    for (const value of right) {
        const available = countOf(remaining, value);
        if (available > 0) {
            shared.push(value);
            remaining.set(value, available - 1);
        }
    }
    return shared;
}

/**
 * Length of the shortest contiguous run having the same degree as the whole
 * array, the degree being the highest frequency of any value.
 *
 * @example
 * shortestSubarrayWithDegree([1, 2, 2, 3, 1, 4, 2])
 * // 6
 */
export function shortestSubarrayWithDegree(values: number[]): number {
    const frequencies = countBy(values, value => value);
    // First and last position of each value
    const spans = minmaxBy(values, value => value, (_, index) => index);

    let degree = 0;
    for (const frequency of frequencies.values()) {
        degree = Math.max(degree, frequency);
    }

    let shortest = values.length;
    for (const [value, frequency] of frequencies) {
        if (frequency === degree) {
            const span = getOrThrow(spans, value);
            shortest = Math.min(shortest, span.max - span.min + 1);
        }
    }
    return shortest;
}
