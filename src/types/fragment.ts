/**
 * A node record in the old animation-graph shape, as located in a source
 * document by the fragment pattern.
 *
 * Old shape:
 * ```ron
 * (name: "Blend", ty: "BlendNode", inner: (mode: Linear))
 * ```
 */
export type NodeFragment = {
  /**
   * The node name, without the surrounding quotes.
   */
  name: string;

  /**
   * The node type tag, without the surrounding quotes. Becomes the key of the
   * `inner` map in the new shape.
   */
  ty: string;

  /**
   * The captured `inner` value, including its opening and closing parenthesis.
   *
   * Note:
   * The capture stops at the first `)`, so a nested group inside `inner`
   * is cut short (e.g. `(a: (b: 1)` for `inner: (a: (b: 1))`).
   */
  inner: string;

  /**
   * Offset of the matched span in the source document.
   */
  index: number;

  /**
   * Length of the matched span.
   */
  length: number;
};

/**
 * Result of rewriting one document.
 */
export type RewriteResult = {
  /**
   * The document with every fragment replaced by its new shape.
   */
  output: string;

  /**
   * The fragments that were replaced, in source order.
   */
  fragments: readonly NodeFragment[];
};
