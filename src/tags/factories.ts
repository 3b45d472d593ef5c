/**
 * Tag factories
 *
 * One factory per tag over a single `Element` type. Void status and the
 * rendered name come from the tag metadata table; a trailing underscore
 * avoids clashing with a global (`Map_`, `Object_`).
 */

import { Element, type ComposeArg } from '../tree/nodes';

export type TagFactory = (...args: ComposeArg[]) => Element;

export function defineTag(tag: string): TagFactory {
  return (...args) => new Element(tag, ...args);
}

// Document
export const Html = defineTag('html');
export const Head = defineTag('head');
export const Title = defineTag('title');
export const Body = defineTag('body');
export const Meta = defineTag('meta');
export const Base = defineTag('base');
export const Link = defineTag('link');
export const Style = defineTag('style');
export const Script = defineTag('script');
export const Noscript = defineTag('noscript');

// Text
export const H1 = defineTag('h1');
export const H2 = defineTag('h2');
export const H3 = defineTag('h3');
export const H4 = defineTag('h4');
export const H5 = defineTag('h5');
export const H6 = defineTag('h6');
export const P = defineTag('p');
export const Paragraph = defineTag('paragraph');
export const Br = defineTag('br');
export const Hr = defineTag('hr');
export const Wbr = defineTag('wbr');

// Formatting
export const Abbr = defineTag('abbr');
export const Acronym = defineTag('acronym');
export const Address = defineTag('address');
export const B = defineTag('b');
export const Bdi = defineTag('bdi');
export const Bdo = defineTag('bdo');
export const Big = defineTag('big');
export const Blockquote = defineTag('blockquote');
export const Center = defineTag('center');
export const Cite = defineTag('cite');
export const Code = defineTag('code');
export const Del = defineTag('del');
export const Dfn = defineTag('dfn');
export const Em = defineTag('em');
export const Font = defineTag('font');
export const I = defineTag('i');
export const Ins = defineTag('ins');
export const Kbd = defineTag('kbd');
export const Mark = defineTag('mark');
export const Meter = defineTag('meter');
export const Pre = defineTag('pre');
export const Progress = defineTag('progress');
export const Q = defineTag('q');
export const Rp = defineTag('rp');
export const Rt = defineTag('rt');
export const Ruby = defineTag('ruby');
export const S = defineTag('s');
export const Samp = defineTag('samp');
export const Small = defineTag('small');
export const Strike = defineTag('strike');
export const Strong = defineTag('strong');
export const Sub = defineTag('sub');
export const Sup = defineTag('sup');
export const Template = defineTag('template');
export const Time = defineTag('time');
export const Tt = defineTag('tt');
export const U = defineTag('u');
export const Var = defineTag('var');

// Forms
export const Form = defineTag('form');
export const Input = defineTag('input');
export const Textarea = defineTag('textarea');
export const Button = defineTag('button');
export const Select = defineTag('select');
export const Optgroup = defineTag('optgroup');
export const Option = defineTag('option');
export const Label = defineTag('label');
export const Fieldset = defineTag('fieldset');
export const Legend = defineTag('legend');
export const Datalist = defineTag('datalist');
export const Output = defineTag('output');

// Frames
export const Frame = defineTag('frame');
export const Frameset = defineTag('frameset');
export const Noframes = defineTag('noframes');
export const Iframe = defineTag('iframe');

// Media
export const Img = defineTag('img');
export const Map_ = defineTag('map');
export const Area = defineTag('area');
export const Canvas = defineTag('canvas');
export const Figcaption = defineTag('figcaption');
export const Figure = defineTag('figure');
export const Picture = defineTag('picture');
export const Svg = defineTag('svg');
export const Audio = defineTag('audio');
export const Source = defineTag('source');
export const Track = defineTag('track');
export const Video = defineTag('video');

// Links and lists
export const A = defineTag('a');
export const Nav = defineTag('nav');
export const Menu = defineTag('menu');
export const Ul = defineTag('ul');
export const Ol = defineTag('ol');
export const Li = defineTag('li');
export const Dir = defineTag('dir');
export const Dl = defineTag('dl');
export const Dt = defineTag('dt');
export const Dd = defineTag('dd');

// Tables (`Table` itself lives in ./table)
export const Caption = defineTag('caption');
export const Td = defineTag('td');
export const Tr = defineTag('tr');
export const Th = defineTag('th');
export const Thead = defineTag('thead');
export const Tbody = defineTag('tbody');
export const Tfoot = defineTag('tfoot');
export const Col = defineTag('col');
export const Colgroup = defineTag('colgroup');

// Sections
export const Div = defineTag('div');
export const Span = defineTag('span');
export const Header = defineTag('header');
export const Hgroup = defineTag('hgroup');
export const Footer = defineTag('footer');
export const Main = defineTag('main');
export const Section = defineTag('section');
export const Search = defineTag('search');
export const Article = defineTag('article');
export const Aside = defineTag('aside');
export const Details = defineTag('details');
export const Dialog = defineTag('dialog');
export const Summary = defineTag('summary');
export const Data = defineTag('data');

// Programming
export const Applet = defineTag('applet');
export const Basefont = defineTag('basefont');
export const Embed = defineTag('embed');
export const Object_ = defineTag('object');
export const Param = defineTag('param');
