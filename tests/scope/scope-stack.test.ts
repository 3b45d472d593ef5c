import { describe, it, expect, vi } from 'vitest';
import {
  Br,
  Class,
  Div,
  InvalidArgumentError,
  Id,
  Li,
  P,
  ScopeStack,
  Span,
  Text,
  Ul,
  getScopeStack,
  scope,
  withScopeStack,
} from '../../src/index';
import { compact } from '../helpers/tree';

const EXPECTED =
  '<p class="paragraph_class">\n  Text\n  <span id="span_id">\n    span\n  </span>\n</p>';

describe('scope stack (IMPLICIT PARENTING)', () => {
  it('should attach nodes and attributes built inside the scope', () => {
    const p = P('Text').within(() => {
      Class('paragraph_class');
      Span('span', Id('span_id'));
    });

    expect(p.display()).toBe(EXPECTED);
  });

  it('should not attach twice given nodes attached explicitly inside the scope', () => {
    const p = P().within((self) => {
      const sp = Span();
      sp.add('span').add(Id('span_id'));

      self.add(Class('paragraph_class'));
      self.add('Text', sp);
    });

    expect(p.display()).toBe(EXPECTED);
  });

  it('should nest the second element in the first given several elements at once', () => {
    const p = P();
    const sp = Span();

    scope([p, sp], () => {
      new Text('span');
      Id('span_id');

      p.add(Class('paragraph_class'));
      p.add('Text');
    });

    expect(p.display()).toBe(EXPECTED);
  });

  it('should keep an already parented element where it is given several elements', () => {
    const inner = Span();
    const outer = Div(inner);

    scope([outer, inner], () => {
      P('x');
    });

    expect(compact(outer)).toBe('<div><span><p>x</p></span></div>');
  });

  it('should leave an enclosing element in place given it is opened after its descendant', () => {
    const p = P('x');
    const div = Div(p);

    scope([p, div], () => {
      Span('in');
    });

    expect(compact(div)).toBe('<div><p>x</p><span>in</span></div>');
    expect(div.parent).toBeNull();
  });

  it('should attach a copied text node once given a text node built from another', () => {
    const div = Div();

    scope(div, () => {
      new Text(new Text('a'));
    });

    expect(compact(div)).toBe('<div>a</div>');
  });

  it('should stack correctly given nested scopes', () => {
    const list = Ul();

    scope(list, () => {
      Li('a');
      const item = Li();
      scope(item, () => {
        Span('inner');
      });
    });

    expect(compact(list)).toBe('<ul><li>a</li><li><span>inner</span></li></ul>');
  });

  it('should attach copies rather than the template given times inside a scope', () => {
    const div = Div();

    scope(div, () => {
      const template = Li('x');
      Ul(template.times(2));
    });

    expect(compact(div)).toBe('<div><ul><li>x</li><li>x</li></ul></div>');
  });

  it('should expose the open element while the body runs', () => {
    const div = Div();
    let seen: unknown;
    let depth = -1;

    scope(div, () => {
      seen = getScopeStack().top;
      depth = getScopeStack().depth;
    });

    expect(seen).toBe(div);
    expect(depth).toBe(1);
    expect(getScopeStack().depth).toBe(0);
  });

  it('should return the body result', () => {
    expect(scope(Div(), () => 42)).toBe(42);
  });
});

describe('scope stack (FAILURE)', () => {
  it('should pop the frame and drop pending nodes given the body throws', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const div = Div();

    expect(() =>
      scope(div, () => {
        P('lost');
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(div.length).toBe(0);
    expect(getScopeStack().depth).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      '[tagtree]',
      'Scope body threw; 1 pending item(s) were not attached.'
    );
  });

  it('should leave every target untouched given content pending for a void element', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const div = Div();
    const br = Br();

    expect(() =>
      scope([div, br], () => {
        Span('s');
      })
    ).toThrow('<br> is a void element and cannot contain child nodes.');

    expect(compact(div)).toBe('<div></div>');
    expect(br.parent).toBeNull();
    expect(getScopeStack().depth).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      '[tagtree]',
      'Scope commit was rejected; 2 pending item(s) were not attached.'
    );
  });

  it('should reject the commit before attaching anything given it would close a cycle', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const outer = Div();
    const inner = Span();
    let holder = P();

    expect(() =>
      scope([outer, inner], () => {
        holder = P();
        holder.add(outer);
      })
    ).toThrow(InvalidArgumentError);

    expect(outer.length).toBe(0);
    expect(inner.length).toBe(0);
    expect(inner.parent).toBeNull();
    expect(outer.parent).toBe(holder);
  });

  it('should stay quiet given production mode', () => {
    process.env.NODE_ENV = 'production';
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(() =>
      scope(Div(), () => {
        P('lost');
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(warn).not.toHaveBeenCalled();
  });
});

describe('scope stack (ISOLATION)', () => {
  it('should use a private stack given withScopeStack', () => {
    const stack = new ScopeStack();
    const global = getScopeStack();

    const div = withScopeStack(stack, () => {
      expect(getScopeStack()).toBe(stack);
      return Div().within(() => {
        expect(stack.depth).toBe(1);
        expect(global.depth).toBe(0);
        P('x');
      });
    });

    expect(getScopeStack()).toBe(global);
    expect(compact(div)).toBe('<div><p>x</p></div>');
  });

  it('should report pending items until they are claimed', () => {
    const stack = new ScopeStack();

    withScopeStack(stack, () => {
      Div().within(() => {
        const p = P('x');
        expect(stack.isPending(p)).toBe(true);
        Div(p);
        expect(stack.isPending(p)).toBe(false);
      });
    });
  });
});
