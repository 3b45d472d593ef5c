/**
 * Markup serialization
 *
 * Pretty mode is line based: every tag, text run and comment delimiter sits
 * on its own line, indented by depth, and lines are joined by `newline` with
 * no trailing newline. Compact mode writes the same tokens with nothing
 * between them.
 */

import type { MarkupNode } from '../tree/nodes';
import { debugEnabled, logger } from '../dev/logger';
import { renderAttrs, type BooleanAttributeStyle } from './attrs';
import { escapeText } from './escape';
import { StreamSink, StringSink, type RenderSink } from './sink';

export interface RenderOptions {
  /** Line per token with indentation (default true) */
  pretty?: boolean;
  /** One indentation level (default two spaces) */
  indent?: string;
  /** Line separator in pretty mode (default `\n`) */
  newline?: string;
  booleanAttributes?: BooleanAttributeStyle;
}

export type ResolvedRenderOptions = Readonly<Required<RenderOptions>>;

export const DEFAULT_RENDER_OPTIONS: ResolvedRenderOptions = {
  pretty: true,
  indent: '  ',
  newline: '\n',
  booleanAttributes: 'short',
};

export interface StreamRenderOptions extends RenderOptions {
  onChunk: (chunk: string) => void;
  onComplete?: () => void;
}

export function resolveRenderOptions(
  options?: RenderOptions
): ResolvedRenderOptions {
  if (!options) return DEFAULT_RENDER_OPTIONS;
  return {
    pretty: options.pretty ?? DEFAULT_RENDER_OPTIONS.pretty,
    indent: options.indent ?? DEFAULT_RENDER_OPTIONS.indent,
    newline: options.newline ?? DEFAULT_RENDER_OPTIONS.newline,
    booleanAttributes:
      options.booleanAttributes ?? DEFAULT_RENDER_OPTIONS.booleanAttributes,
  };
}

class LineWriter {
  private started = false;
  private readonly indents: string[] = [''];

  constructor(
    private readonly sink: RenderSink,
    readonly options: ResolvedRenderOptions
  ) {}

  line(depth: number, text: string): void {
    if (!this.options.pretty) {
      this.sink.write(text);
      return;
    }
    if (this.started) this.sink.write(this.options.newline);
    this.started = true;
    this.sink.write(this.indentFor(depth));
    this.sink.write(text);
  }

  private indentFor(depth: number): string {
    while (this.indents.length <= depth) {
      this.indents.push(this.indents[this.indents.length - 1] + this.options.indent);
    }
    return this.indents[depth];
  }
}

function writeNode(node: MarkupNode, depth: number, out: LineWriter): void {
  switch (node.kind) {
    case 'text':
      out.line(depth, escapeText(node.content));
      return;

    case 'element': {
      const attrs = renderAttrs(
        node.attributes.values(),
        out.options.booleanAttributes
      );
      out.line(depth, `<${node.tag}${attrs}>`);
      if (node.isVoid) return;
      writeChildren(node.children, depth + 1, out);
      out.line(depth, `</${node.tag}>`);
      return;
    }

    case 'comment': {
      const { condition } = node;
      const open = condition ? `<!--[if ${condition}]>` : '<!--';
      const close = condition ? '<![endif]-->' : '-->';
      // An empty comment keeps both delimiters on one line.
      if (node.children.length === 0) {
        out.line(depth, open + close);
        return;
      }
      out.line(depth, open);
      writeChildren(node.children, depth + 1, out);
      out.line(depth, close);
      return;
    }

    case 'container':
      writeChildren(node.children, depth, out);
      return;

    default: {
      const unreachable: never = node;
      throw new Error(`Unknown node: ${String(unreachable)}`);
    }
  }
}

function writeChildren(
  children: readonly MarkupNode[],
  depth: number,
  out: LineWriter
): void {
  for (const child of children) writeNode(child, depth, out);
}

/** Write `node` into any sink; the sink is ended afterwards */
export function renderToSink(
  node: MarkupNode,
  sink: RenderSink,
  options?: RenderOptions
): void {
  const resolved = resolveRenderOptions(options);
  if (debugEnabled('TAGTREE_RENDER_DEBUG')) {
    logger.debug('render', { kind: node.kind, options: resolved });
  }
  writeNode(node, 0, new LineWriter(sink, resolved));
  sink.end();
}

export function render(node: MarkupNode, options?: RenderOptions): string {
  const sink = new StringSink();
  renderToSink(node, sink, options);
  return sink.toString();
}

/**
 * Emit the rendering as a series of chunks. Concatenated, the chunks equal
 * `render(node, options)`.
 */
export function renderToStream(
  node: MarkupNode,
  options: StreamRenderOptions
): void {
  const { onChunk, onComplete, ...renderOptions } = options;
  renderToSink(
    node,
    new StreamSink(onChunk, onComplete ?? (() => {})),
    renderOptions
  );
}
