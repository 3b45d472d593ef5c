/**
 * Rendering benchmark
 *
 * Pretty and compact output for a wide table-like tree.
 */

import { bench, describe } from 'vitest';
import { Class, Div, Li, P, Span, Ul, render } from '../src/index';

function buildTree(rows: number) {
  return Div(
    Class('list'),
    Ul(
      Array.from({ length: rows }, (_, i) =>
        Li(Class('row'), { dataIndex: i }, Span(`Item ${i}`), P('a < b & c'))
      )
    )
  );
}

describe('render', () => {
  const tree = buildTree(500);

  bench('pretty (500 rows)', () => {
    render(tree);
  });

  bench('compact (500 rows)', () => {
    render(tree, { pretty: false });
  });
});
