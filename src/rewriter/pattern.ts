import type { NodeFragment } from '../types';

/**
 * Source of the old node-shape pattern.
 *
 * Captures:
 * 1. `name`  - one or more non-quote characters between the quotes.
 * 2. `ty`    - one or more non-quote characters between the quotes.
 * 3. `inner` - `(`, one or more characters other than `)`, then `)`.
 *
 * Limitation:
 * `inner` is not a balanced-parenthesis match. It ends at the first `)`, so
 * `inner: (a: (b: 1))` captures `(a: (b: 1)` and leaves the second `)` in the
 * surrounding text.
 */
export const NODE_FRAGMENT_SOURCE =
  '\\(\\s*name:\\s*"([^"]+)",\\s*ty:\\s*"([^"]+)",\\s*inner:\\s*(\\([^)]+\\))';

/**
 * Creates a fresh global matcher for the old node shape.
 *
 * A new instance per scan keeps `lastIndex` local to the caller.
 */
export function createNodeFragmentPattern(): RegExp {
  return new RegExp(NODE_FRAGMENT_SOURCE, 'g');
}

/**
 * Decodes one pattern match into a {@link NodeFragment}.
 */
export function toNodeFragment(match: RegExpExecArray): NodeFragment {
  const [span, name, ty, inner] = match;
  return { name, ty, inner, index: match.index, length: span.length };
}

/**
 * Lists every old-shape fragment in `text`, leftmost first and without
 * overlap.
 *
 * Text that almost matches (different key order, unterminated quotes, an empty
 * `inner`) is not reported.
 */
export function findNodeFragments(text: string): NodeFragment[] {
  const pattern = createNodeFragmentPattern();
  const fragments: NodeFragment[] = [];

  let match = pattern.exec(text);
  while (match !== null) {
    fragments.push(toNodeFragment(match));
    match = pattern.exec(text);
  }

  return fragments;
}
