/**
 * Table shorthand: rows of cell data become `tr` / `td` / `th` elements
 */

import { Element, Text, type ComposeArg } from '../tree/nodes';

export type TableCell = Element | Text | string | number;
export type TableData = readonly (readonly TableCell[])[];

/**
 * Which cells are headers:
 * - `row`: every cell of the first row
 * - `column`: the first cell of every row
 * - `both`: the two combined
 */
export type HeaderOption = 'row' | 'column' | 'both';

export interface TableOptions {
  header?: HeaderOption;
}

function isHeaderCell(
  header: HeaderOption | undefined,
  row: number,
  column: number
): boolean {
  if (!header) return false;
  const inRow = row === 0 && (header === 'row' || header === 'both');
  const inColumn = column === 0 && (header === 'column' || header === 'both');
  return inRow || inColumn;
}

/**
 * Build `tr` elements from cell data. Scalar cells are wrapped in `td`
 * (or `th` for header cells); element cells are kept as given unless they
 * fall on a header position, where they are wrapped in `th`.
 */
export function tableRows(rows: TableData, options: TableOptions = {}): Element[] {
  return rows.map(
    (cells, rowIndex) =>
      new Element(
        'tr',
        cells.map((cell, columnIndex) => {
          if (isHeaderCell(options.header, rowIndex, columnIndex)) {
            return new Element('th', cell);
          }
          return cell instanceof Element ? cell : new Element('td', cell);
        })
      )
  );
}

function isCell(value: unknown): value is TableCell {
  return (
    value instanceof Element ||
    value instanceof Text ||
    typeof value === 'string' ||
    typeof value === 'number'
  );
}

function isTableData(arg: unknown): arg is TableData {
  return (
    Array.isArray(arg) &&
    arg.length > 0 &&
    arg.every((row) => Array.isArray(row) && row.every(isCell))
  );
}

/**
 * `<table>` where an array of arrays is read as rows of cells.
 *
 * @example
 * ```ts
 * Table([
 *   ['Name', 'Age'],
 *   ['Ada', 36],
 * ], Id('people'));
 * ```
 */
export function Table(...args: Array<ComposeArg | TableData>): Element {
  return new Element(
    'table',
    args.map((arg) => (isTableData(arg) ? tableRows(arg) : arg))
  );
}

/** `Table` with header cells; `rows` are always read as cell data */
export function HeaderTable(
  header: HeaderOption,
  rows: TableData,
  ...args: ComposeArg[]
): Element {
  return new Element('table', ...args, tableRows(rows, { header }));
}
