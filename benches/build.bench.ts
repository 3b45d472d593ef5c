/**
 * Construction and query benchmark
 */

import { bench, describe } from 'vitest';
import { Div, Li, P, Ul, scope } from '../src/index';

describe('build', () => {
  bench('explicit children (200 items)', () => {
    Ul(Array.from({ length: 200 }, (_, i) => Li(`Item ${i}`)));
  });

  bench('scoped children (200 items)', () => {
    const list = Ul();
    scope(list, () => {
      for (let i = 0; i < 200; i++) Li(`Item ${i}`);
    });
  });

  bench('replicate (200 copies)', () => {
    P('Paragraph').times(200);
  });
});

describe('find', () => {
  const tree = Div(
    Array.from({ length: 100 }, (_, i) => Ul(Li(`Item ${i}`), Li(P('nested'))))
  );

  bench('substring', () => {
    tree.find('Item 9');
  });

  bench('element by tag', () => {
    tree.find({ kind: 'element', tag: 'li' });
  });
});
