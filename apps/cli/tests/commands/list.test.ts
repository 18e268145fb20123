import { describe, it, expect } from 'vitest';
import { pageFooter } from '../../src/commands/list.js';

describe('pageFooter', () => {
  it('stays quiet when the list fits on the first page', () => {
    expect(pageFooter(3, { total: 3, page: 0, size: 20 })).toBe('');
  });

  it('shows the page and the range of tasks', () => {
    expect(pageFooter(2, { total: 5, page: 0, size: 2 })).toBe('Page 1 of 3: tasks 1-2 of 5');
    expect(pageFooter(1, { total: 5, page: 2, size: 2 })).toBe('Page 3 of 3: tasks 5-5 of 5');
  });

  it('reports a page past the end', () => {
    expect(pageFooter(0, { total: 5, page: 5, size: 2 })).toBe('Page 6 is past the end (3 page(s), 5 task(s))');
  });
});
