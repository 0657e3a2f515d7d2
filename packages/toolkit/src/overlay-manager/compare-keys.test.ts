import { expect, test } from 'vitest';
import { compareKeys } from './compare-keys.ts';

test('it orders parents before their descendants', () => {
  expect(['src/b.ts', 'src', 'README.md', 'src/a.ts'].sort(compareKeys)).toStrictEqual([
    'README.md',
    'src',
    'src/a.ts',
    'src/b.ts',
  ]);
});

test('it orders by code unit rather than locale', () => {
  expect(['b', 'B', 'a', 'Z'].sort(compareKeys)).toStrictEqual(['B', 'Z', 'a', 'b']);
  expect(compareKeys('same', 'same')).toBe(0);
});
