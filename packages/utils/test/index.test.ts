import { describe, it, expect } from 'vitest';
import {
    runConcurrent,
    toKebabCase,
    toPascalCase,
    slugify,
    escapeHtml,
    isPlainObject,
} from '../src/index.js';

describe('toKebabCase', () => {
    it('should split camelCase words', () => {
        expect(toKebabCase('heroTitle')).toBe('hero-title');
    });

    it('should split PascalCase words', () => {
        expect(toKebabCase('MainContent')).toBe('main-content');
    });

    it('should replace underscores and spaces', () => {
        expect(toKebabCase('nav_bar item')).toBe('nav-bar-item');
    });

    it('should leave kebab-case unchanged', () => {
        expect(toKebabCase('already-kebab')).toBe('already-kebab');
    });
});

describe('toPascalCase', () => {
    it('should join words with capitals', () => {
        expect(toPascalCase('my landing page')).toBe('MyLandingPage');
    });

    it('should treat punctuation as separators', () => {
        expect(toPascalCase('about-us: team')).toBe('AboutUsTeam');
    });

    it('should return empty string without letters or digits', () => {
        expect(toPascalCase('!!')).toBe('');
    });
});

describe('slugify', () => {
    it('should lower-case and hyphenate', () => {
        expect(slugify('My Page!')).toBe('my-page');
    });

    it('should split camelCase', () => {
        expect(slugify('landingPage')).toBe('landing-page');
    });

    it('should trim leading and trailing separators', () => {
        expect(slugify('  --Hello--  ')).toBe('hello');
    });
});

describe('escapeHtml', () => {
    it('should escape markup characters', () => {
        expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
            '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;',
        );
    });

    it('should leave plain text unchanged', () => {
        expect(escapeHtml('Hello world')).toBe('Hello world');
    });
});

describe('isPlainObject', () => {
    it('should accept mappings only', () => {
        expect(isPlainObject({ a: 1 })).toBe(true);
        expect(isPlainObject([])).toBe(false);
        expect(isPlainObject(null)).toBe(false);
        expect(isPlainObject('x')).toBe(false);
        expect(isPlainObject(new Date(0))).toBe(false);
        expect(isPlainObject(Object.create(null))).toBe(true);
    });
});

describe('runConcurrent', () => {
    it('should process items concurrently and return results in order', async () => {
        const items = [1, 2, 3, 4, 5];
        const results = await runConcurrent(items, 3, async (item) => item * 2);
        expect(results).toEqual([2, 4, 6, 8, 10]);
    });

    it('should respect concurrency limit', async () => {
        let maxConcurrent = 0;
        let currentConcurrent = 0;

        const items = [1, 2, 3, 4, 5, 6];
        await runConcurrent(items, 2, async (item) => {
            currentConcurrent++;
            maxConcurrent = Math.max(maxConcurrent, currentConcurrent);
            await new Promise((resolve) => setTimeout(resolve, 10));
            currentConcurrent--;
            return item;
        });

        expect(maxConcurrent).toBe(2);
    });

    it('should call onItemComplete for each completed item', async () => {
        const completions: Array<{
            result: number;
            index: number;
            completed: number;
            total: number;
        }> = [];

        await runConcurrent(
            [10, 20, 30],
            2,
            async (item) => item * 2,
            (result, index, completed, total) => {
                completions.push({ result, index, completed, total });
            },
        );

        expect(completions).toHaveLength(3);
        expect(completions.map((c) => c.result).sort()).toEqual([20, 40, 60]);
        expect(completions.every((c) => c.total === 3)).toBe(true);
        // Completed count should be 1, 2, 3 (in some order based on execution)
        expect(completions.map((c) => c.completed).sort()).toEqual([1, 2, 3]);
    });

    it('should handle empty array', async () => {
        const results = await runConcurrent([], 5, async (item) => item);
        expect(results).toEqual([]);
    });

    it('should handle concurrency greater than items length', async () => {
        const results = await runConcurrent(
            [1, 2],
            10,
            async (item) => item * 3,
        );
        expect(results).toEqual([3, 6]);
    });

    it('should propagate errors', async () => {
        await expect(
            runConcurrent([1, 2, 3], 2, async (item) => {
                if (item === 2) throw new Error('test error');
                return item;
            }),
        ).rejects.toThrow('test error');
    });
});
