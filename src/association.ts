import { KeyNotFoundError } from './errors';
import type { ByKeyOptions, Defined } from './kernel';
import { computeKeyHash } from './util/hash';

export type KeyEquality = 'identity' | 'structural';

export type KeyedArray<T, K = string> = { key: K, value: T }[];

/**
 * A Map whose keys compare by value rather than by reference.
 *
 * Keys are canonicalized and hashed, so `['A', 1]` and a separately built
 * `['A', 1]` address the same entry. The first key instance stored for an
 * entry is the one reported by iteration.
 */
export class StructuralMap<K, V> extends Map<K, V> {
    /** Maps key hash to the stored key and its value */
    private readonly entriesByHash: Map<string, [K, V]> = new Map();

    readonly [Symbol.toStringTag] = 'StructuralMap';

    constructor(entries?: Iterable<readonly [K, V]>) {
        // Map's constructor would call set() before entriesByHash exists
        super();
        if (entries) {
            for (const [key, value] of entries) {
                this.set(key, value);
            }
        }
    }

    get size(): number {
        return this.entriesByHash.size;
    }

    get(key: K): V | undefined {
        return this.entriesByHash.get(computeKeyHash(key))?.[1];
    }

    has(key: K): boolean {
        return this.entriesByHash.has(computeKeyHash(key));
    }

    set(key: K, value: V): this {
        const hash = computeKeyHash(key);
        const existing = this.entriesByHash.get(hash);
        if (existing) {
            existing[1] = value;
        } else {
            this.entriesByHash.set(hash, [key, value]);
        }
        return this;
    }

    delete(key: K): boolean {
        return this.entriesByHash.delete(computeKeyHash(key));
    }

    clear(): void {
        this.entriesByHash.clear();
    }

    forEach(callbackfn: (value: V, key: K, map: Map<K, V>) => void, thisArg?: unknown): void {
        for (const [key, value] of this.entriesByHash.values()) {
            callbackfn.call(thisArg, value, key, this);
        }
    }

    entries() {
        return this.snapshot().entries();
    }

    keys() {
        return this.snapshot().keys();
    }

    values() {
        return this.snapshot().values();
    }

    [Symbol.iterator]() {
        return this.snapshot()[Symbol.iterator]();
    }

    /**
     * Structurally distinct keys are never SameValueZero-equal, so a native
     * Map over the stored entries holds exactly the same pairs.
     */
    private snapshot(): Map<K, V> {
        return new Map(this.entriesByHash.values());
    }
}

export function createAssociation<K, V>(options: Pick<ByKeyOptions, 'keyEquality'> = {}): Map<K, V> {
    return options.keyEquality === 'structural'
        ? new StructuralMap<K, V>()
        : new Map<K, V>();
}

/**
 * Looks up a key that must be present in a value-bearing association.
 */
export function getOrThrow<K, V extends Defined>(association: ReadonlyMap<K, V>, key: K): V {
    const value = association.get(key);
    if (value === undefined) {
        throw new KeyNotFoundError(key);
    }
    return value;
}

/**
 * Reads a count-like association, where an absent key means zero occurrences.
 */
export function countOf<K>(counts: ReadonlyMap<K, number>, key: K): number {
    return counts.get(key) ?? 0;
}

export function toKeyedArray<K, V>(association: ReadonlyMap<K, V>): KeyedArray<V, K> {
    return Array.from(association, ([key, value]) => ({ key, value }));
}
