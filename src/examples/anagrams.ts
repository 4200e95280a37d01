import { countOf } from '../association';
import { countBy } from '../operations/count-by';
import { groupBy } from '../operations/group-by';

/**
 * Groups words that are permutations of each other. Words inside a group
 * keep their input order.
 *
 * @example
 * groupAnagrams(['eat', 'tea', 'tan', 'ate', 'nat', 'bat'])
 * // [['eat', 'tea', 'ate'], ['tan', 'nat'], ['bat']]
 */
export function groupAnagrams(words: string[]): string[][] {
    const groups = groupBy(words, word => Array.from(word).sort().join(''));
    return Array.from(groups.values());
}

export function isAnagram(left: string, right: string): boolean {
    if (left.length !== right.length) {
        return false;
    }
    const leftCounts = countBy(left, letter => letter);
    const rightCounts = countBy(right, letter => letter);
    if (leftCounts.size !== rightCounts.size) {
        return false;
    }
    for (const [letter, count] of leftCounts) {
        if (countOf(rightCounts, letter) !== count) {
            return false;
        }
    }
    return true;
}
