import { describe, it, expect } from 'vitest';
import {
  Class,
  Comment,
  Div,
  H1,
  Hr,
  Id,
  Input,
  Li,
  P,
  Ul,
} from '../../src/index';

describe('render (DOM PARITY)', () => {
  it('should read back unchanged given compact output parsed by the DOM', () => {
    const tree = Div(
      Id('app'),
      H1('Title & more'),
      P('a < b', Class('x y')),
      new Comment('note'),
      Input({ type: 'checkbox', checked: true }),
      Hr(),
      Ul(Li('one'), Li('two'))
    );
    const html = tree.display({ pretty: false, booleanAttributes: 'empty' });

    const host = document.createElement('div');
    host.innerHTML = html;

    expect(host.innerHTML).toBe(html);
    expect(host.querySelector('h1')?.textContent).toBe('Title & more');
    expect(host.querySelector('p')?.className).toBe('x y');
    expect(host.querySelectorAll('li')).toHaveLength(2);
    expect(host.querySelector('input')?.hasAttribute('checked')).toBe(true);
  });
});
