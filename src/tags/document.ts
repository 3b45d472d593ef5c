/**
 * Document skeleton and doctype declarations
 */

import { Container, Element, type ComposeArg } from '../tree/nodes';

export const DoctypeDeclaration = {
  HTML5: '!DOCTYPE html',
  HTML4_01_STRICT:
    '!DOCTYPE HTML PUBLIC "-//W3C//DTD HTML 4.01//EN"\n"http://www.w3.org/TR/html4/strict.dtd"',
  HTML4_01_TRANSITIONAL:
    '!DOCTYPE HTML PUBLIC "-//W3C//DTD HTML 4.01 Transitional//EN"\n"http://www.w3.org/TR/html4/loose.dtd"',
  HTML4_01_FRAMESET:
    '!DOCTYPE HTML PUBLIC "-//W3C//DTD HTML 4.01 Frameset//EN"\n"http://www.w3.org/TR/html4/frameset.dtd"',
  XHTML1_0_STRICT:
    '!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Strict//EN"\n"http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd"',
  XHTML1_0_TRANSITIONAL:
    '!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Transitional//EN"\n"http://www.w3.org/TR/xhtml1/DTD/xhtml1-transitional.dtd"',
  XHTML1_0_FRAMESET:
    '!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Frameset//EN"\n"http://www.w3.org/TR/xhtml1/DTD/xhtml1-frameset.dtd"',
  XHTML1_1:
    '!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.1//EN"\n"http://www.w3.org/TR/xhtml11/DTD/xhtml11.dtd"',
  XHTML1_1_BASIC:
    '!DOCTYPE html PUBLIC "-//W3C//DTD XHTML Basic 1.1//EN"\n"http://www.w3.org/TR/xhtml-basic/xhtml-basic11.dtd"',
} as const;

export type DoctypeDeclaration =
  (typeof DoctypeDeclaration)[keyof typeof DoctypeDeclaration];

/** `<!DOCTYPE html>` by default; renders as a void element */
export function Doctype(
  declaration: DoctypeDeclaration = DoctypeDeclaration.HTML5
): Element {
  return new Element(declaration);
}

export const DEFAULT_DOCUMENT_TITLE = 'Title of the page';

/**
 * Doctype plus `html > (head, body)`. Content passed to the constructor,
 * `add` or `insert` goes into `body`.
 */
export class Document extends Container {
  readonly head: Element;
  readonly body: Element;

  constructor(...content: ComposeArg[]) {
    super();
    this.head = new Element(
      'head',
      new Element('meta', { charset: 'utf-8' }),
      new Element('title', DEFAULT_DOCUMENT_TITLE)
    );
    this.body = new Element('body', ...content);
    this.append([Doctype(), new Element('html', this.head, this.body)]);
  }

  add(...args: ComposeArg[]): this {
    this.body.add(...args);
    return this;
  }

  insert(index: number, ...args: ComposeArg[]): this {
    this.body.insert(index, ...args);
    return this;
  }
}
