import { encode as base64Encode } from '@stablelib/base64';
import { hash as sha512Hash } from '@stablelib/sha512';
import { encode as utf8Encode } from '@stablelib/utf8';
import { ContractViolationError } from '../errors';

/**
 * Produces a canonical string for a structural key.
 * Object properties are sorted, so `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }`
 * canonicalize identically. Strings are quoted, so `'1'` and `1` differ.
 * Maps and sets canonicalize by their entries, in sorted order.
 */
export function canonicalizeKey(key: unknown): string {
    return canonicalize(key, new Set<object>());
}

function canonicalize(value: unknown, ancestors: Set<object>): string {
    if (typeof value !== 'object' || value === null) {
        return canonicalizePrimitive(value);
    }
    if (value instanceof Date) {
        return `Date(${value.getTime()})`;
    }
    if (value instanceof RegExp) {
        return `RegExp(${String(value)})`;
    }
    if (ancestors.has(value)) {
        throw new ContractViolationError('A structural key cannot contain a cycle');
    }
    ancestors.add(value);
    try {
        if (Array.isArray(value)) {
            return `[${value.map(item => canonicalize(item, ancestors)).join(',')}]`;
        }
        if (value instanceof Map) {
            const entries = Array.from(value, ([entryKey, entryValue]) =>
                `${canonicalize(entryKey, ancestors)}=>${canonicalize(entryValue, ancestors)}`
            );
            return `Map{${entries.sort().join(',')}}`;
        }
        if (value instanceof Set) {
            const members = Array.from(value, member => canonicalize(member, ancestors));
            return `Set{${members.sort().join(',')}}`;
        }
        const properties = Object.keys(value).sort();
        const entries = properties.map(prop =>
            `${JSON.stringify(prop)}:${canonicalize(Reflect.get(value, prop), ancestors)}`
        );
        return `{${entries.join(',')}}`;
    } finally {
        ancestors.delete(value);
    }
}

function canonicalizePrimitive(value: unknown): string {
    switch (typeof value) {
        case 'string':
            return JSON.stringify(value);
        case 'number':
        case 'boolean':
        case 'undefined':
            // String(-0) is "0", matching Map's SameValueZero
            return String(value);
        case 'bigint':
            return `${value}n`;
        case 'symbol':
        case 'function':
            throw new ContractViolationError(`A ${typeof value} cannot be used as a structural key`);
    }
    return 'null';
}

function computeHash(str: string): string {
    const utf8Bytes = utf8Encode(str);
    const hashBytes = sha512Hash(utf8Bytes);
    return base64Encode(hashBytes);
}

export function computeKeyHash(key: unknown): string {
    return computeHash(canonicalizeKey(key));
}
