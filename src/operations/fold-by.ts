import { reduceByKey, type ByKeyOptions, type Defined, type KeyProjection, type ValueProjection } from '../kernel';
import { validateProjection } from '../util/validation';

/**
 * Folds the values of each key into a caller-built accumulator.
 *
 * @param initial - Creates the starting accumulator; called once per distinct key
 * @param combine - Mutates the accumulator in place with one value
 *
 * @example
 * // Distinct tags per author
 * foldBy(posts, p => p.author, p => p.tag, () => new Set<string>(), (tags, tag) => { tags.add(tag); })
 */
export function foldBy<E, K, V, A extends Defined>(
    source: Iterable<E>,
    key: KeyProjection<E, K>,
    value: ValueProjection<E, V>,
    initial: () => A,
    combine: (accumulator: A, value: V) => void,
    options: ByKeyOptions = {}
): Map<K, A> {
    validateProjection(initial, 'initial');
    validateProjection(combine, 'combine');
    return reduceByKey(source, key, value, {
        identity: initial,
        combine: (accumulator, contributed) => {
            combine(accumulator, contributed);
            return accumulator;
        }
    }, options);
}
