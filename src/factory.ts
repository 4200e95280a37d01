import { ByKeyBuilder } from './builder';
import { validateSource } from './util/validation';

export function from<E>(source: Iterable<E>): ByKeyBuilder<E> {
    validateSource(source);
    return new ByKeyBuilder<E>(source);
}
