import {
    accumulateBy,
    average,
    ContractViolationError,
    count,
    plus,
    transformReduceBy,
    type FinalizingAccumulator
} from '../index';

interface Score {
    team: string;
    points: number;
}

const scores: Score[] = [
    { team: 'red', points: 3 },
    { team: 'blue', points: 2 },
    { team: 'red', points: 5 },
    { team: 'blue', points: 4 },
    { team: 'red', points: -1 }
];

describe('accumulateBy', () => {
    it('should sum the values of each key', () => {
        const totals = accumulateBy(scores, score => score.team, score => score.points);

        expect(totals).toEqual(new Map([['red', 7], ['blue', 6]]));
    });

    it('should add the initial value once per key', () => {
        const biased = accumulateBy(scores, score => score.team, score => score.points, 10);

        expect(biased.get('red')).toBe(17);
        expect(biased.get('blue')).toBe(16);
    });

    it('should sum bigint values from a bigint initial value', () => {
        const totals = accumulateBy(['a', 'b', 'a'], x => x, () => 5000000000n, 0n);

        expect(totals.get('a')).toBe(10000000000n);
        expect(totals.get('b')).toBe(5000000000n);
    });

    it('should refuse to mix numbers and bigints', () => {
        expect(() => Reflect.apply(accumulateBy, undefined, [[1], (x: number) => x, () => 1, 0n]))
            .toThrow('Cannot add bigint and number');
    });

    it('should accept options in place of the initial value', () => {
        const totals = accumulateBy(
            [{ at: [0, 0], w: 2 }, { at: [0, 0], w: 3 }],
            cell => cell.at,
            cell => cell.w,
            { keyEquality: 'structural' }
        );

        expect(totals.size).toBe(1);
        expect(totals.get([0, 0])).toBe(5);
    });
});

describe('transformReduceBy', () => {
    const samples = [
        { bucket: 'a', v: 2 },
        { bucket: 'b', v: 10 },
        { bucket: 'a', v: 6 },
        { bucket: 'b', v: 2 },
        { bucket: 'a', v: 4 }
    ];

    it('should finalize each accumulator when the accumulator has finalize', () => {
        const averages = transformReduceBy(samples, sample => sample.bucket, sample => sample.v, average());

        expect(averages.get('a')).toBe(4);
        expect(averages.get('b')).toBe(6);
    });

    it('should report the raw accumulator without finalize', () => {
        const counts = transformReduceBy(samples, sample => sample.bucket, sample => sample.v, count());

        expect(counts).toEqual(new Map([['a', 3], ['b', 2]]));
    });

    it('should take an initial value and a combining function', () => {
        const longest = transformReduceBy(['kiwi', 'fig', 'banana', 'blueberry'], word => word[0], word => word.length, 0, Math.max);

        expect(longest).toEqual(new Map([['k', 4], ['f', 3], ['b', 9]]));
    });

    it('should call finalize with the accumulator as this', () => {
        const scaled: FinalizingAccumulator<number, number, string> & { unit: string } = {
            unit: 'pt',
            identity: () => 0,
            combine: (acc, value) => acc + value,
            finalize(acc) {
                return `${acc}${this.unit}`;
            }
        };

        const result = transformReduceBy(scores, score => score.team, score => score.points, scaled);

        expect(result.get('red')).toBe('7pt');
    });

    it('should average numbers by parity', () => {
        const numbers = [1, 1, 2, 3, 5, 8, 13];

        const byParity = transformReduceBy(numbers, x => x % 2, x => x, average());

        expect(byParity.get(0)).toBe(5);
        expect(byParity.get(1)).toBeCloseTo(4.6, 9);
    });

    it('should skip null contributions when averaging', () => {
        const readings = [{ s: 'x', v: null }, { s: 'x', v: 3 }, { s: 'y', v: null }];

        const means = transformReduceBy(readings, r => r.s, r => r.v, average());

        expect(means.get('x')).toBe(3);
        expect(means.has('y')).toBe(true);
        expect(means.get('y')).toBeUndefined();
    });

    it('should reject an undefined initial value', () => {
        const sum = (acc: number, value: number) => acc + value;

        expect(() => Reflect.apply(transformReduceBy, undefined, [[1], (x: number) => x, (x: number) => x, undefined, sum]))
            .toThrow('transformReduceBy needs an initial value other than undefined');
    });

    it('should reject an object initial value that every key would share', () => {
        const append = (acc: number[], value: number) => {
            acc.push(value);
            return acc;
        };

        expect(() => transformReduceBy([1, 2, 1], x => x, x => x, [], append)).toThrow(
            'transformReduceBy shares its initial value between keys, so it must be a primitive. Use foldBy or an accumulator with identity() for object accumulators'
        );
    });

    it('should reject an object that is not an accumulator', () => {
        expect(() => Reflect.apply(transformReduceBy, undefined, [[1], (x: number) => x, (x: number) => x, { combine: () => 0 }]))
            .toThrow('transformReduceBy expects an accumulator with identity() and combine(), or an initial value and a combining function');
    });
});

describe('plus', () => {
    it('should add numbers and bigints of the same kind', () => {
        expect(plus(2, 3)).toBe(5);
        expect(plus(2n, 3n)).toBe(5n);
    });

    it('should throw for mixed kinds', () => {
        expect(() => plus(1, 1n)).toThrow(ContractViolationError);
    });
});
