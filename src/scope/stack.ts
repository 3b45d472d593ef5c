/**
 * Scope stack: implicit parenting for scoped construction
 *
 * INVARIANTS:
 * - Every node and attribute registers with the active stack when it is
 *   constructed; the target frame is the topmost one at that moment
 * - Attaching an item explicitly claims it, so it is never auto-attached
 * - Frames are popped on every exit path; pending items are committed only
 *   when the scope body returns normally
 * - Every frame is checked before any frame commits, so a rejected commit
 *   leaves all scope targets as they were
 *
 * The stack is ordinary state behind `ScopeStack`. `withScopeStack` swaps in
 * a private instance so independent builders never share one.
 */

import type { Attribute } from '../attributes/attribute';
import { InvalidArgumentError } from '../common/errors';
import type { Element, MarkupNode, TreeNode } from '../tree/nodes';
import { invariant } from '../dev/invariant';
import { logger } from '../dev/logger';

export type Scoped = MarkupNode | Attribute;

export interface ScopeFrame {
  readonly element: Element;
  /** Items waiting to be attached, in construction order */
  readonly pending: Set<Scoped>;
}

export class ScopeStack {
  private readonly frames: ScopeFrame[] = [];

  get depth(): number {
    return this.frames.length;
  }

  /** Element that receives newly constructed, unparented items */
  get top(): Element | undefined {
    return this.frames[this.frames.length - 1]?.element;
  }

  register(item: Scoped): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) frame.pending.add(item);
  }

  /** Take an item out of whichever frame it is waiting in */
  claim(item: Scoped): void {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      if (this.frames[i].pending.delete(item)) return;
    }
  }

  isPending(item: Scoped): boolean {
    return this.frames.some((frame) => frame.pending.has(item));
  }

  /**
   * Open `elements` left to right, run `fn`, then close them again.
   *
   * An element after the first that has no parent is nested in the element
   * opened before it, so `run([p, span], ...)` builds `p > span`. An element
   * that already encloses the previous one is left where it is.
   */
  run<T>(elements: readonly Element[], fn: () => T): T {
    if (elements.length === 0) return fn();

    const opened: ScopeFrame[] = [];
    for (const element of elements) {
      const outer = opened[opened.length - 1];
      if (
        outer &&
        element.parent === null &&
        !encloses(element, outer.element)
      ) {
        this.claim(element);
        outer.pending.add(element);
      }
      const frame: ScopeFrame = { element, pending: new Set() };
      this.frames.push(frame);
      opened.push(frame);
    }

    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.unwind(opened, false);
      throw error;
    }
    this.unwind(opened, true);
    return result;
  }

  private unwind(opened: readonly ScopeFrame[], commit: boolean): void {
    for (let i = opened.length - 1; i >= 0; i--) {
      const popped = this.frames.pop();
      invariant(popped === opened[i], 'Scope frames were closed out of order', {
        depth: this.frames.length,
      });
    }

    if (!commit) {
      warnDropped(opened, 'Scope body threw');
      return;
    }

    try {
      checkCommit(opened);
    } catch (error) {
      warnDropped(opened, 'Scope commit was rejected');
      throw error;
    }

    // Innermost first, so nested elements are complete before they attach.
    for (let i = opened.length - 1; i >= 0; i--) {
      const { element, pending } = opened[i];
      if (pending.size > 0) element.add([...pending]);
    }
  }
}

function warnDropped(opened: readonly ScopeFrame[], reason: string): void {
  let dropped = 0;
  for (const frame of opened) dropped += frame.pending.size;
  if (dropped > 0) {
    logger.warn(`${reason}; ${dropped} pending item(s) were not attached.`);
  }
}

function encloses(candidate: Element, node: Element): boolean {
  for (let cur: TreeNode | null = node; cur; cur = cur.parent) {
    if (cur === candidate) return true;
  }
  return false;
}

/**
 * Reject a commit that would put content in a void element or close a
 * cycle. Parents are taken as they will be once every frame has committed:
 * a pending item goes to its frame's element, anything else keeps its own.
 */
function checkCommit(opened: readonly ScopeFrame[]): void {
  const future = new Map<TreeNode, Element>();
  for (const { element, pending } of opened) {
    for (const item of pending) {
      if ('kind' in item) future.set(item, element);
    }
  }
  const parentOf = (node: TreeNode): TreeNode | null =>
    future.get(node) ?? node.parent;

  for (const { element, pending } of opened) {
    for (const item of pending) {
      if (!('kind' in item)) continue;
      if (element.isVoid) {
        throw new InvalidArgumentError(
          `<${element.tag}> is a void element and cannot contain child nodes.`
        );
      }
      // A loop that skips `item` is reported when its own pending item is checked.
      const seen = new Set<TreeNode>();
      for (let cur: TreeNode | null = element; cur; cur = parentOf(cur)) {
        if (seen.has(cur)) break;
        seen.add(cur);
        if (cur === item) {
          throw new InvalidArgumentError(
            `Cannot attach a ${item.kind} node inside itself.`
          );
        }
      }
    }
  }
}

// Process-wide default; replaced for the duration of withScopeStack()
let current = new ScopeStack();

export function getScopeStack(): ScopeStack {
  return current;
}

export function withScopeStack<T>(stack: ScopeStack, fn: () => T): T {
  const prev = current;
  current = stack;
  try {
    return fn();
  } finally {
    current = prev;
  }
}

/**
 * Scoped construction against the active stack.
 *
 * @example
 * ```ts
 * const list = Ul();
 * scope(list, () => {
 *   Li('first');
 *   Li('second');
 * });
 * ```
 */
export function scope<T>(
  target: Element | readonly Element[],
  fn: () => T
): T {
  return current.run('kind' in target ? [target] : target, fn);
}
