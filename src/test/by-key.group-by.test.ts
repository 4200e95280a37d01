import { ContractViolationError, foldBy, groupBy, groupByInto, StructuralMap } from '../index';

describe('groupBy', () => {
    it('should bucket elements by key in input order', () => {
        const words = ['ant', 'anchor', 'bat', 'ball', 'apple', 'coral'];

        const grouped = groupBy(words, word => word[0]);

        expect(grouped.get('a')).toEqual(['ant', 'anchor', 'apple']);
        expect(grouped.get('b')).toEqual(['bat', 'ball']);
        expect(grouped.get('c')).toEqual(['coral']);
    });

    it('should group anagrams by their sorted letters', () => {
        const words = ['eat', 'tea', 'tan', 'ate', 'nat', 'bat'];

        const groups = groupBy(words, word => Array.from(word).sort().join(''), word => word.toUpperCase());

        expect(groups.get('aet')).toEqual(['EAT', 'TEA', 'ATE']);
        expect(groups.get('ant')).toEqual(['TAN', 'NAT']);
        expect(groups.get('abt')).toEqual(['BAT']);
    });

    it('should produce buckets whose sizes add up to the input length', () => {
        const numbers = [1, 1, 2, 3, 5, 8, 13];

        const grouped = groupBy(numbers, x => x % 2);

        expect(grouped.get(0)).toHaveLength(2);
        expect(grouped.get(1)).toHaveLength(5);
        const total = Array.from(grouped.values()).reduce((sum, bucket) => sum + bucket.length, 0);
        expect(total).toBe(numbers.length);
    });

    it('should group by structurally equal keys with a value projection', () => {
        const cells: Array<[number, string]> = [[1, 'a'], [1, 'a'], [2, 'b']];

        const grouped = groupBy(cells, cell => cell, cell => cell[1], { keyEquality: 'structural' });

        expect(grouped.size).toBe(2);
        expect(grouped.get([1, 'a'])).toEqual(['a', 'a']);
        expect(grouped.get([2, 'b'])).toEqual(['b']);
    });

    it('should group whole elements by structurally equal keys', () => {
        const points = [{ x: 1, y: 2 }, { y: 2, x: 1 }, { x: 3, y: 4 }];

        const grouped = groupBy(points, point => point, { keyEquality: 'structural' });

        expect(grouped).toBeInstanceOf(StructuralMap);
        expect(grouped.get({ x: 1, y: 2 })).toEqual([points[0], points[1]]);
        expect(grouped.get({ x: 3, y: 4 })).toEqual([points[2]]);
    });

    it('should reject a value projection that is not a function', () => {
        expect(() => Reflect.apply(groupBy, undefined, [[1], (x: number) => x, 'value']))
            .toThrow('The value projection must be a function. Received: string');
    });
});

describe('groupByInto', () => {
    it('should append onto an existing grouping', () => {
        const words = ['ant', 'anchor', 'bat', 'ball', 'apple', 'coral'];
        const reuse = new Map<string, string[]>([['z', ['zzz']]]);

        const reused = groupByInto(words, word => word[word.length - 1], word => word, reuse);

        expect(reused).toBe(reuse);
        expect(reused.get('z')).toEqual(['zzz']);
        expect(reused.get('t')).toEqual(['ant', 'bat']);
        expect(reused.get('l')).toEqual(['ball', 'coral']);
        expect(reused.get('r')).toEqual(['anchor']);
        expect(reused.get('e')).toEqual(['apple']);
    });

    it('should append to a bucket that already holds the key', () => {
        const reuse = new Map<number, number[]>([[0, [100]]]);

        groupByInto([1, 2, 4], x => x % 2, x => x, reuse);

        expect(reuse.get(0)).toEqual([100, 2, 4]);
        expect(reuse.get(1)).toEqual([1]);
    });

    it('should follow the key equality of the destination', () => {
        const destination = new StructuralMap<number[], string[]>([[[0, 0], ['origin']]]);

        groupByInto(['a', 'b', 'c'], letter => letter === 'b' ? [1, 1] : [0, 0], letter => letter, destination);

        expect(destination.size).toBe(2);
        expect(destination.get([0, 0])).toEqual(['origin', 'a', 'c']);
        expect(destination.get([1, 1])).toEqual(['b']);
    });

    it('should reject a destination whose buckets are not arrays', () => {
        const corrupt = new Map<string, unknown>([['a', 'not a bucket']]);

        expect(() => Reflect.apply(groupByInto, undefined, [['abc'], (x: string) => x[0], (x: string) => x, corrupt]))
            .toThrow('groupByInto destination bucket for a is not an array');
    });
});

describe('foldBy', () => {
    it('should give every key its own accumulator', () => {
        const posts = [
            { author: 'ana', tag: 'ts' },
            { author: 'ben', tag: 'go' },
            { author: 'ana', tag: 'ts' },
            { author: 'ana', tag: 'node' }
        ];

        const tags = foldBy(posts, post => post.author, post => post.tag, () => new Set<string>(), (set, tag) => {
            set.add(tag);
        });

        expect(tags.get('ana')).toEqual(new Set(['ts', 'node']));
        expect(tags.get('ben')).toEqual(new Set(['go']));
        expect(tags.get('ana')).not.toBe(tags.get('ben'));
    });

    it('should fold values in input order', () => {
        const words = ['eat', 'tea', 'tan', 'ate', 'nat', 'bat'];

        const groups = foldBy(words, word => Array.from(word).sort().join(''), word => word, (): string[] => [], (bucket, word) => {
            bucket.push(word);
        });

        expect(groups.get('aet')).toEqual(['eat', 'tea', 'ate']);
        expect(groups.get('ant')).toHaveLength(2);
        expect(groups.get('abt')).toHaveLength(1);
    });

    it('should require a factory for the initial accumulator', () => {
        expect(() => Reflect.apply(foldBy, undefined, [[1], (x: number) => x, (x: number) => x, [], () => undefined]))
            .toThrow(ContractViolationError);
    });
});
