import { describe, it, expect } from 'vitest';
import { naturalCompare, sortByName } from '../domain/naturalSort.js';

describe('naturalCompare', () => {
  it('puts numbered names before plain words', () => {
    expect(['item', '1.item', '2.item'].sort(naturalCompare)).toEqual(['1.item', '2.item', 'item']);
  });

  it('compares numeric runs by value', () => {
    expect(['1.10', '1.2', '2.1'].sort(naturalCompare)).toEqual(['1.2', '1.10', '2.1']);
    expect(['10 things', '9 things'].sort(naturalCompare)).toEqual(['9 things', '10 things']);
    expect(['10', '9', '1'].sort(naturalCompare)).toEqual(['1', '9', '10']);
  });

  it('orders words case-insensitively', () => {
    expect(['beta', 'Alpha', 'gamma'].sort(naturalCompare)).toEqual(['Alpha', 'beta', 'gamma']);
  });

  it('is zero only for identical names', () => {
    expect(naturalCompare('Array', 'Array')).toBe(0);
    expect(naturalCompare('array', 'Array')).not.toBe(0);
  });
});

describe('sortByName', () => {
  it('sorts items by the extracted name', () => {
    const items = [{ name: 'Statements' }, { name: '2. Basics' }, { name: 'operators' }];
    expect(sortByName(items, item => item.name).map(item => item.name)).toEqual(['2. Basics', 'operators', 'Statements']);
  });
});
