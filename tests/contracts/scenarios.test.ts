import { describe, it, expect } from 'vitest';
import {
  Class,
  Comment,
  ConditionalComment,
  Div,
  H1,
  Hr,
  P,
  Strong,
  Br,
} from '../../src/index';
import { asElement, asText, compact } from '../helpers/tree';

describe('rendering contracts (SCENARIOS)', () => {
  it('should indent children two spaces given a div with heading, paragraph, class and rule', () => {
    const div = Div(H1('Title'), P('Paragraph'), Class('container'), Hr());

    expect(div.display()).toBe(
      '<div class="container">\n  <h1>\n    Title\n  </h1>\n  <p>\n    Paragraph\n  </p>\n  <hr>\n</div>'
    );
  });

  it('should add no whitespace given compact display', () => {
    expect(Div(H1('Header')).display({ pretty: false })).toBe(
      '<div><h1>Header</h1></div>'
    );
  });

  it('should wrap the body in a conditional directive given a comment condition', () => {
    expect(
      ConditionalComment('IE 8', 'This is conditional comment').display()
    ).toBe('<!--[if IE 8]>\n  This is conditional comment\n<![endif]-->');

    const comment = new Comment('This is conditional comment');
    comment.condition = 'IE 8';
    expect(String(comment)).toBe(
      '<!--[if IE 8]>\n  This is conditional comment\n<![endif]-->'
    );
  });

  it('should render siblings without a wrapper given plus', () => {
    const both = P('First').plus(P('Second'));

    expect(both.kind).toBe('container');
    expect(compact(both)).toBe('<p>First</p><p>Second</p>');
    expect(both.display()).toBe('<p>\n  First\n</p>\n<p>\n  Second\n</p>');
  });

  it('should produce independent copies given times', () => {
    const copies = P('Paragraph').times(3);

    expect(compact(copies)).toBe(
      '<p>Paragraph</p><p>Paragraph</p><p>Paragraph</p>'
    );

    asText(asElement(copies.get(0)).get(0)).content = 'Changed';

    expect(compact(copies)).toBe(
      '<p>Changed</p><p>Paragraph</p><p>Paragraph</p>'
    );
  });

  it('should replace then remove by index given set and delete', () => {
    const div = Div(P('a'), Br(), P('b'));

    div.set(2, Strong('x'));
    div.delete(1);

    expect(div.length).toBe(2);
    expect(compact(div)).toBe('<div><p>a</p><strong>x</strong></div>');
  });
});
