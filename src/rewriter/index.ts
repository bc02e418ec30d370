import type { RewriteResult } from '../types';
import { findNodeFragments } from './pattern';
import { renderNodeFragment } from './render';

export {
  NODE_FRAGMENT_SOURCE,
  createNodeFragmentPattern,
  findNodeFragments
} from './pattern';
export { renderNodeFragment } from './render';

/**
 * Rewrites every old-shape node in `text` and reports what was replaced.
 *
 * Contract:
 * - Text outside the matched spans is copied unchanged and in order.
 * - Captured values are inserted literally; no replacement-token expansion
 *   (`$1`, `$&`) takes place.
 * - Near-misses are not an error; they are left as they are.
 */
export function rewriteDocument(text: string): RewriteResult {
  const fragments = findNodeFragments(text);
  if (fragments.length === 0) return { output: text, fragments };

  const parts: string[] = [];
  let cursor = 0;

  for (const fragment of fragments) {
    parts.push(text.slice(cursor, fragment.index));
    parts.push(renderNodeFragment(fragment));
    cursor = fragment.index + fragment.length;
  }
  parts.push(text.slice(cursor));

  return { output: parts.join(''), fragments };
}

/**
 * Converts a document from the old node shape to the new one.
 *
 * @returns The rewritten document; `text` itself when nothing matched.
 */
export function transform(text: string): string {
  return rewriteDocument(text).output;
}
