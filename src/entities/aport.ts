/**
 * APORT Tree: Model & Schema
 *
 * A Proximate Optimistic Radix Tree: a prefix-compressed, byte-keyed tree
 * whose retrieval can run in one of two disciplines.
 *
 * This module contains:
 * - Node, tree, tracking-index and cursor types
 * - The comparison outcome of matching a node prefix against a key fragment
 * - Pure constructors for nodes and trees
 * - Tagged errors
 * - Content equivalence between trees
 * - No traversal logic, no async logic, no logging
 *
 * ## Formal Constraints
 *
 * ### Keys
 * - Keys are byte sequences (`Uint8Array`); strings are accepted and encoded as UTF-8.
 * - Comparison is on raw byte values, never locale-aware.
 * - The empty key is valid and lands on the root.
 *
 * ### Nodes
 * - `prefix` is the key segment relative to the parent; the root's is empty.
 * - `value` is `Some(v)` iff a key terminating exactly at this node is stored.
 * - `children` maps the first byte of each child's prefix to that child.
 * - `handle` is assigned once, at creation, and survives split, fuse and splice.
 *
 * ### Path Compression
 * - No non-root node is valueless with exactly one child.
 * - No non-root node is valueless and childless.
 * - The root is never removed, fused or spliced.
 *
 * ### Tracking
 * - `length` = number of valued nodes = number of links in `order`.
 * - Every link's `key` is the concatenation of prefixes from root to its node.
 *
 * @module Aport
 * @since 0.1.0
 */

import { Data, Option, Schema } from "effect";
import * as Equal from "effect/Equal";
import * as Equivalence from "effect/Equivalence";
import type { LazyArg } from "effect/Function";
import * as Primitives from "./primitives";

const textDecoder = new TextDecoder();

// ============================================================================
// KEYS, HANDLES & MODES
// ============================================================================

export const KeyInputSchema = Schema.Union(
  Schema.String,
  Schema.Uint8ArrayFromSelf
);

export type KeyInput = typeof KeyInputSchema.Type;

/**
 * Stable identifier of a node within its tree.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const NodeHandleSchema = Primitives.NonNegativeIntSchema.pipe(
  Schema.brand("NodeHandle")
);

export type NodeHandle = typeof NodeHandleSchema.Type;

/**
 * Retrieval discipline used by `get`.
 *
 * - `exact`: prefixes are verified byte by byte (a conventional radix tree)
 * - `optimistic`: only lengths are compared; the branch byte picked at each
 *   disambiguation point is the only content that is checked
 *
 * @category Schemas
 * @since 0.1.0
 */
export const MatchModeSchema = Schema.Literal("exact", "optimistic");

export type MatchMode = typeof MatchModeSchema.Type;

// ============================================================================
// NODE & TREE TYPES
// ============================================================================

export interface AportNode<T> {
  readonly handle: NodeHandle;
  prefix: Uint8Array;
  value: Option.Option<T>;
  readonly children: Map<Primitives.Byte, AportNode<T>>;
}

/**
 * One entry of the order-tracking index, linked most-recent-first.
 */
export interface OrderLink<T> {
  key: Uint8Array;
  readonly node: AportNode<T>;
  prev: Option.Option<NodeHandle>;
  next: Option.Option<NodeHandle>;
}

export interface OrderIndex<T> {
  readonly links: Map<NodeHandle, OrderLink<T>>;
  head: Option.Option<NodeHandle>;
  tail: Option.Option<NodeHandle>;
}

export interface AportTree<T> {
  root: AportNode<T>;
  length: Primitives.NonNegativeInt;
  order: OrderIndex<T>;
  nextHandle: Primitives.NonNegativeInt;
  readonly mode: MatchMode;
  readonly makeDefault: LazyArg<T>;
}

/**
 * Position in the iteration sequence; `None` is the end position.
 */
export type Cursor = Option.Option<NodeHandle>;

// ============================================================================
// COMPARISON
// ============================================================================

/**
 * Outcome of matching a node prefix (length P) against the remaining key
 * fragment (length S); `matched` is the number of bytes consumed.
 *
 * - `NoMatch`: nothing usable was matched
 * - `PrefixFullMatch`: the prefix is consumed and the fragment continues
 * - `PartialMatch`: the prefix continues past the matched bytes
 * - `ExactMatch`: both are consumed
 *
 * @category Models
 * @since 0.1.0
 */
export type Comparison = Data.TaggedEnum<{
  NoMatch: { readonly matched: Primitives.NonNegativeInt };
  PrefixFullMatch: { readonly matched: Primitives.NonNegativeInt };
  PartialMatch: { readonly matched: Primitives.NonNegativeInt };
  ExactMatch: { readonly matched: Primitives.NonNegativeInt };
}>;

export const Comparison = Data.taggedEnum<Comparison>();

// ============================================================================
// ERRORS
// ============================================================================

export class KeyNotFoundError extends Schema.TaggedError<KeyNotFoundError>()(
  "KeyNotFoundError",
  {
    message: Schema.String,
    key: Schema.Uint8ArrayFromSelf,
  }
) {}

/**
 * Raised when a traversal reaches a state that no comparison outcome
 * allows. Thrown as a defect: the tree is corrupted.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CorruptedTreeError extends Data.TaggedError("CorruptedTreeError")<{
  readonly reason: string;
}> {}

/**
 * Raised when a cursor is dereferenced or erased after its element is gone.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidCursorError extends Data.TaggedError("InvalidCursorError")<{
  readonly reason: string;
}> {}

export const makeKeyNotFoundError = (key: Uint8Array): KeyNotFoundError =>
  new KeyNotFoundError({
    message: `No such key: "${textDecoder.decode(key)}".`,
    key,
  });

// ============================================================================
// CONSTRUCTORS
// ============================================================================

/**
 * Create a detached node.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * import * as Aport from "./aport"
 * import * as Option from "effect/Option"
 *
 * const leaf = Aport.makeNode(
 *   Aport.NodeHandleSchema.make(7),
 *   new TextEncoder().encode("rnold"),
 *   Option.some(3)
 * )
 */
export const makeNode = <T>(
  handle: NodeHandle,
  prefix: Uint8Array,
  value: Option.Option<T>
): AportNode<T> => ({
  handle,
  prefix,
  value,
  children: new Map(),
});

export const makeOrderIndex = <T>(): OrderIndex<T> => ({
  links: new Map(),
  head: Option.none(),
  tail: Option.none(),
});

export interface TreeOptions<T> {
  readonly mode?: MatchMode;
  readonly makeDefault: LazyArg<T>;
}

/**
 * Create an empty tree (root with an empty prefix and no value).
 *
 * `mode` defaults to `"optimistic"`.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * import * as Aport from "./aport"
 *
 * const counts = Aport.makeTree({ mode: "exact", makeDefault: () => 0 })
 */
export const makeTree = <T>(options: TreeOptions<T>): AportTree<T> => ({
  root: makeNode<T>(NodeHandleSchema.make(0), new Uint8Array(0), Option.none()),
  length: 0,
  order: makeOrderIndex(),
  nextHandle: 1,
  mode: options.mode ?? "optimistic",
  makeDefault: options.makeDefault,
});

// ============================================================================
// ENTRY
// ============================================================================

/**
 * A (key, value) pair yielded by iteration. `value` reads and writes the
 * node's slot directly.
 *
 * @category Models
 * @since 0.1.0
 */
export class Entry<T> {
  constructor(
    readonly key: Uint8Array,
    private readonly node: AportNode<T>
  ) {}

  get text(): string {
    return textDecoder.decode(this.key);
  }

  get value(): T {
    return Option.getOrThrowWith(this.node.value, () => this.detached());
  }

  set value(value: T) {
    if (Option.isNone(this.node.value)) throw this.detached();
    this.node.value = Option.some(value);
  }

  private detached(): InvalidCursorError {
    return new InvalidCursorError({
      reason: `entry "${this.text}" was erased`,
    });
  }
}

// ============================================================================
// EQUIVALENCE
// ============================================================================

const keyId = (key: Uint8Array): string => key.join(",");

/**
 * Two trees are equivalent when they hold the same keys mapped to
 * equivalent values. Shape, handles, mode and iteration order are ignored.
 *
 * @category Equivalence
 * @since 0.1.0
 * @example
 * import * as Aport from "./aport"
 *
 * const same = Aport.ContentEquivalence<number>()(left, right)
 */
export const ContentEquivalence = <T>(
  values: Equivalence.Equivalence<T> = Equal.equivalence<T>()
): Equivalence.Equivalence<AportTree<T>> =>
  Equivalence.make((a, b) => {
    if (a.length !== b.length || a.order.links.size !== b.order.links.size)
      return false;

    const other = new Map<string, AportNode<T>>();
    for (const link of b.order.links.values())
      other.set(keyId(link.key), link.node);

    for (const link of a.order.links.values()) {
      const match = other.get(keyId(link.key));
      if (match === undefined) return false;
      if (!Option.getEquivalence(values)(link.node.value, match.value))
        return false;
    }

    return true;
  });
