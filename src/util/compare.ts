/**
 * Three-way natural comparison used as the default ordering.
 *
 * Numbers, bigints, strings, booleans and dates compare natively when both
 * sides share a type. Mixed types compare by their string form.
 * NaN compares equal to everything, so it never displaces a stored extreme.
 */
export function compareNatural(left: unknown, right: unknown): number {
    if (typeof left === 'number' && typeof right === 'number') {
        return threeWay(left, right);
    }
    if (typeof left === 'bigint' && typeof right === 'bigint') {
        return threeWay(left, right);
    }
    if (typeof left === 'string' && typeof right === 'string') {
        return threeWay(left, right);
    }
    if (typeof left === 'boolean' && typeof right === 'boolean') {
        return threeWay(Number(left), Number(right));
    }
    if (left instanceof Date && right instanceof Date) {
        return threeWay(left.getTime(), right.getTime());
    }
    return threeWay(String(left), String(right));
}

/**
 * Strict "less than" under {@link compareNatural}.
 */
export function naturalLess(left: unknown, right: unknown): boolean {
    return compareNatural(left, right) < 0;
}

function threeWay<T extends number | bigint | string>(left: T, right: T): number {
    if (left < right) {
        return -1;
    }
    if (left > right) {
        return 1;
    }
    return 0;
}
