import { describe, it, expect } from 'vitest';
import { B, HeaderTable, Id, Table, tableRows } from '../../src/index';
import { compact } from '../helpers/tree';

describe('table (SHORTHAND)', () => {
  it('should expand rows of cells into tr and td', () => {
    const table = Table(
      [
        ['Name', 'Age'],
        ['Ada', 36],
      ],
      Id('people')
    );

    expect(compact(table)).toBe(
      '<table id="people"><tr><td>Name</td><td>Age</td></tr><tr><td>Ada</td><td>36</td></tr></table>'
    );
  });

  it('should keep element cells as given outside header positions', () => {
    const rows = tableRows([[B('x'), 'y']]);

    expect(rows.map(compact)).toEqual(['<tr><b>x</b><td>y</td></tr>']);
  });

  it.each([
    ['row', '<tr><th>a</th><th>b</th></tr><tr><td>c</td><td>d</td></tr>'],
    ['column', '<tr><th>a</th><td>b</td></tr><tr><th>c</th><td>d</td></tr>'],
    ['both', '<tr><th>a</th><th>b</th></tr><tr><th>c</th><td>d</td></tr>'],
  ] as const)('should mark header cells given %s headers', (header, expected) => {
    const table = HeaderTable(header, [
      ['a', 'b'],
      ['c', 'd'],
    ]);

    expect(compact(table)).toBe(`<table>${expected}</table>`);
  });
});
