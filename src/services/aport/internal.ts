/**
 * Internal Utilities for APORT Tree Operations
 *
 * Shared helpers for tree manipulation including:
 * - Key normalisation to bytes
 * - Common prefix calculation and prefix comparison (exact / optimistic)
 * - Node allocation with stable handles
 *
 * @module AportService/Internal
 * @since 0.1.0
 * @internal
 */

import { Option } from "effect";
import * as Aport from "../../entities/aport";
import * as Primitives from "../../entities/primitives";

const textEncoder = new TextEncoder();

/**
 * Normalise a key to bytes. Strings are UTF-8 encoded; byte keys are copied
 * so later mutation by the caller cannot reach stored keys.
 */
export const toBytes = (key: Aport.KeyInput): Uint8Array =>
  typeof key === "string" ? textEncoder.encode(key) : key.slice();

export const concatBytes = (head: Uint8Array, tail: Uint8Array): Uint8Array => {
  const joined = new Uint8Array(head.length + tail.length);
  joined.set(head, 0);
  joined.set(tail, head.length);
  return joined;
};

/**
 * Find the length of the common prefix between two byte sequences.
 */
export const commonPrefixLength = (
  a: Uint8Array,
  b: Uint8Array
): Primitives.NonNegativeInt => {
  let i = 0;
  const minLen = Math.min(a.length, b.length);
  while (i < minLen && a[i] === b[i]) {
    i++;
  }
  return i;
};

/**
 * Classify how the remaining key `fragment` relates to a node `prefix`.
 *
 * Exact: classification follows the real common prefix N.
 * Optimistic: bytes are never read; only the two lengths decide.
 */
export const comparePrefixes = (
  prefix: Uint8Array,
  fragment: Uint8Array,
  mode: Aport.MatchMode
): Aport.Comparison => {
  if (mode === "optimistic") {
    if (prefix.length < fragment.length)
      return Aport.Comparison.PrefixFullMatch({ matched: prefix.length });
    if (prefix.length === fragment.length)
      return Aport.Comparison.ExactMatch({ matched: prefix.length });
    return Aport.Comparison.NoMatch({ matched: 0 });
  }

  const matched = commonPrefixLength(prefix, fragment);

  if (matched === prefix.length) {
    return matched === fragment.length
      ? Aport.Comparison.ExactMatch({ matched })
      : Aport.Comparison.PrefixFullMatch({ matched });
  }

  // diverged (or ran out of key) inside the prefix
  return matched === 0
    ? Aport.Comparison.NoMatch({ matched })
    : Aport.Comparison.PartialMatch({ matched });
};

/**
 * Allocate a node carrying the next free handle of `tree`.
 */
export const spawnNode = <T>(
  tree: Aport.AportTree<T>,
  prefix: Uint8Array,
  value: Option.Option<T>
): Aport.AportNode<T> => {
  const handle = Aport.NodeHandleSchema.make(tree.nextHandle);
  tree.nextHandle += 1;
  return Aport.makeNode(handle, prefix, value);
};

export const makeRoot = <T>(tree: Aport.AportTree<T>): Aport.AportNode<T> =>
  spawnNode(tree, new Uint8Array(0), Option.none());

export const corrupted = (reason: string): never => {
  throw new Aport.CorruptedTreeError({ reason });
};

/**
 * Only child of a node, for fuse and splice.
 */
export const soleChild = <T>(node: Aport.AportNode<T>): Aport.AportNode<T> => {
  const [child] = node.children.values();
  return child ?? corrupted("expected a single child");
};
