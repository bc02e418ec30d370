import type { NodeFragment } from '../types';

const FIELD_INDENT = ' '.repeat(12);
const ENTRY_INDENT = ' '.repeat(16);

/**
 * Renders the new node shape for one fragment.
 *
 * ```ron
 * (
 *             name: "Blend",
 *             inner: {
 *                 "BlendNode": (mode: Linear)
 *             }
 * ```
 *
 * The outer group is left open: the `)` that closed the old node
 * follows the matched span in the source and is kept from there. A source
 * without that `)` yields an unbalanced document.
 */
export function renderNodeFragment(
  fragment: Pick<NodeFragment, 'name' | 'ty' | 'inner'>
): string {
  return [
    '(',
    `${FIELD_INDENT}name: "${fragment.name}",`,
    `${FIELD_INDENT}inner: {`,
    `${ENTRY_INDENT}"${fragment.ty}": ${fragment.inner}`,
    `${FIELD_INDENT}}`
  ].join('\n');
}
