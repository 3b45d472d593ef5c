/**
 * Attribute factories
 *
 * Thin constructors over `Attribute`. The factory name is a convenience; the
 * rendered name always comes from the string passed to `defineAttribute`.
 * A trailing underscore marks names that collide with a tag factory
 * (`Title_` vs `Title`).
 */

import { InvalidArgumentError } from '../common/errors';
import { Attribute, type AttributeInput } from './attribute';
import { cssPropertyName, normalizeAttributeName } from './normalize';

export type AttributeFactory = (value: AttributeInput) => Attribute;
export type BooleanAttributeFactory = () => Attribute;

export function defineAttribute(name: string): AttributeFactory {
  const canonical = normalizeAttributeName(name);
  return (value) => new Attribute(canonical, value);
}

export function defineBooleanAttribute(name: string): BooleanAttributeFactory {
  const canonical = normalizeAttributeName(name);
  return () => new Attribute(canonical, true);
}

/** Any attribute by keyword-style name: `attr('acceptCharset', 'utf-8')` */
export function attr(name: string, value: AttributeInput = true): Attribute {
  return new Attribute(normalizeAttributeName(name), value);
}

/** Space-separated values: `Class('card', 'wide')` → `class="card wide"` */
export function Class(...values: Array<string | number>): Attribute {
  return new Attribute('class', values.map(String).join(' '));
}

export type StyleDeclarations = Readonly<Record<string, string | number>>;

/**
 * Inline CSS. Strings are taken as written; object entries become
 * `property-name: value;` with camelCase and `_` turned into dashes.
 *
 * @example
 * ```ts
 * Style_({ color: 'black', fontSize: '20 px' });
 * // style="color: black;font-size: 20 px;"
 * ```
 */
export function Style_(
  ...parts: Array<string | StyleDeclarations>
): Attribute {
  let css = '';
  for (const part of parts) {
    if (typeof part === 'string') {
      const trimmed = part.trim();
      if (trimmed) css += trimmed.endsWith(';') ? trimmed : `${trimmed};`;
      continue;
    }
    for (const [property, value] of Object.entries(part)) {
      css += `${cssPropertyName(property)}: ${value};`;
    }
  }
  return new Attribute('style', css);
}

function dashed(prefix: string, suffix: string, value: AttributeInput): Attribute {
  const tail = suffix.trim();
  if (!tail) {
    throw new InvalidArgumentError(`${prefix}-* attributes need a name.`);
  }
  return new Attribute(normalizeAttributeName(`${prefix}-${tail}`), value);
}

/** `Data_('user-id', 7)` → `data-user-id="7"` */
export function Data_(name: string, value: AttributeInput): Attribute {
  return dashed('data', name, value);
}

/** `Aria_('label', 'Close')` → `aria-label="Close"` */
export function Aria_(name: string, value: AttributeInput): Attribute {
  return dashed('aria', name, value);
}

/** Inline event handler: `On('click', 'go()')` → `onclick="go()"` */
export function On(event: string, handler: string): Attribute {
  const name = event.trim().toLowerCase().replace(/^on/, '');
  if (!name) throw new InvalidArgumentError('An event name cannot be empty.');
  return new Attribute(`on${name}`, handler);
}

export const Accept = defineAttribute('accept');
export const AcceptCharset = defineAttribute('accept-charset');
export const Accesskey = defineAttribute('accesskey');
export const Action = defineAttribute('action');
export const Alt = defineAttribute('alt');
export const Autocomplete = defineAttribute('autocomplete');
export const Charset = defineAttribute('charset');
export const Cite_ = defineAttribute('cite');
export const Cols = defineAttribute('cols');
export const Colspan = defineAttribute('colspan');
export const Content = defineAttribute('content');
export const Contenteditable = defineAttribute('contenteditable');
export const Coords = defineAttribute('coords');
export const Datetime = defineAttribute('datetime');
export const Dir_ = defineAttribute('dir');
export const Dirname = defineAttribute('dirname');
export const Download = defineAttribute('download');
export const Draggable = defineAttribute('draggable');
export const Enctype = defineAttribute('enctype');
export const Enterkeyhint = defineAttribute('enterkeyhint');
export const For = defineAttribute('for');
export const Form_ = defineAttribute('form');
export const Formaction = defineAttribute('formaction');
export const Headers = defineAttribute('headers');
export const Height = defineAttribute('height');
export const Hidden = defineAttribute('hidden');
export const High = defineAttribute('high');
export const Href = defineAttribute('href');
export const Hreflang = defineAttribute('hreflang');
export const HttpEquiv = defineAttribute('http-equiv');
export const Id = defineAttribute('id');
export const Inputmode = defineAttribute('inputmode');
export const Kind = defineAttribute('kind');
export const Label_ = defineAttribute('label');
export const Lang = defineAttribute('lang');
export const List = defineAttribute('list');
export const Low = defineAttribute('low');
export const Max = defineAttribute('max');
export const Maxlength = defineAttribute('maxlength');
export const Media = defineAttribute('media');
export const Method = defineAttribute('method');
export const Min = defineAttribute('min');
export const Name = defineAttribute('name');
export const Optimum = defineAttribute('optimum');
export const Pattern = defineAttribute('pattern');
export const Placeholder = defineAttribute('placeholder');
export const Popover = defineAttribute('popover');
export const Popovertarget = defineAttribute('popovertarget');
export const Popovertargetaction = defineAttribute('popovertargetaction');
export const Poster = defineAttribute('poster');
export const Preload = defineAttribute('preload');
export const Rel = defineAttribute('rel');
export const Rows = defineAttribute('rows');
export const Rowspan = defineAttribute('rowspan');
export const Sandbox = defineAttribute('sandbox');
export const Scope = defineAttribute('scope');
export const Shape = defineAttribute('shape');
export const Size = defineAttribute('size');
export const Sizes = defineAttribute('sizes');
export const Span_ = defineAttribute('span');
export const Spellcheck = defineAttribute('spellcheck');
export const Src = defineAttribute('src');
export const Srcdoc = defineAttribute('srcdoc');
export const Srclang = defineAttribute('srclang');
export const Srcset = defineAttribute('srcset');
export const Start = defineAttribute('start');
export const Step = defineAttribute('step');
export const Tabindex = defineAttribute('tabindex');
export const Target = defineAttribute('target');
export const Title_ = defineAttribute('title');
export const Translate = defineAttribute('translate');
export const Type = defineAttribute('type');
export const Usemap = defineAttribute('usemap');
export const Value = defineAttribute('value');
export const Width = defineAttribute('width');
export const Wrap = defineAttribute('wrap');

// Presence-only
export const Async = defineBooleanAttribute('async');
export const Autofocus = defineBooleanAttribute('autofocus');
export const Autoplay = defineBooleanAttribute('autoplay');
export const Checked = defineBooleanAttribute('checked');
export const Controls = defineBooleanAttribute('controls');
export const Default = defineBooleanAttribute('default');
export const Defer = defineBooleanAttribute('defer');
export const Disabled = defineBooleanAttribute('disabled');
export const Inert = defineBooleanAttribute('inert');
export const Ismap = defineBooleanAttribute('ismap');
export const Loop = defineBooleanAttribute('loop');
export const Multiple = defineBooleanAttribute('multiple');
export const Muted = defineBooleanAttribute('muted');
export const Novalidate = defineBooleanAttribute('novalidate');
export const Open = defineBooleanAttribute('open');
export const Readonly = defineBooleanAttribute('readonly');
export const Required = defineBooleanAttribute('required');
export const Reversed = defineBooleanAttribute('reversed');
export const Selected = defineBooleanAttribute('selected');
