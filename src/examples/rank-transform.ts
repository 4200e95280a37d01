import { getOrThrow } from '../association';
import { indexBy } from '../operations/index-by';

/**
 * Replaces every value with its rank among the distinct values, starting
 * at 1. Equal values share a rank.
 *
 * @example
 * rankTransform([40, 10, 20, 30])
 * // [4, 1, 2, 3]
 */
export function rankTransform(values: number[]): number[] {
    const distinct = Array.from(new Set(values)).sort((left, right) => left - right);
    const ranks = indexBy(distinct, value => value, (_, index) => index + 1);
    return values.map(value => getOrThrow(ranks, value));
}
