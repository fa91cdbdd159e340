/**
 * APORT Tree Erase Capability
 *
 * Removal by key and by cursor, with the fuse/splice cleanup that keeps the
 * tree path-compressed.
 *
 * @module AportService/Erase
 * @since 0.1.0
 */

import { Context, Layer, Option } from "effect";
import * as Aport from "../../entities/aport";
import * as Internal from "./internal";
import * as Iterate from "./iterate";
import * as Tracking from "./tracking";

/**
 * Restore path compression around a non-root node whose value was just
 * cleared. `accessor` is the node's key in `parent.children`.
 */
const detach = <T>(
  node: Aport.AportNode<T>,
  parent: Aport.AportNode<T>,
  grandparent: Aport.AportNode<T> | undefined,
  accessor: number
): void => {
  switch (node.children.size) {
    case 0: {
      parent.children.delete(accessor);

      // fuse a valueless, now single-child parent into its child
      if (
        grandparent !== undefined &&
        Option.isNone(parent.value) &&
        parent.children.size === 1
      ) {
        const child = Internal.soleChild(parent);
        child.prefix = Internal.concatBytes(parent.prefix, child.prefix);
        grandparent.children.set(child.prefix[0], child);
      }
      return;
    }

    case 1: {
      // splice
      const child = Internal.soleChild(node);
      child.prefix = Internal.concatBytes(node.prefix, child.prefix);
      parent.children.set(accessor, child);
      return;
    }

    default:
      // still a disambiguation point
      return;
  }
};

/**
 * Remove the value stored under `key`. Absent keys are a no-op.
 */
export const erase = <T>(
  tree: Aport.AportTree<T>,
  input: Aport.KeyInput
): void => {
  const key = Internal.toBytes(input);
  let grandparent: Aport.AportNode<T> | undefined;
  let parent: Aport.AportNode<T> | undefined;
  let node = tree.root;
  let accessor = 0;
  let offset = 0;

  while (true) {
    const comparison = Internal.comparePrefixes(
      node.prefix,
      key.subarray(offset),
      "exact"
    );
    offset += comparison.matched;

    switch (comparison._tag) {
      case "NoMatch":
      case "PartialMatch":
        return;

      case "PrefixFullMatch": {
        accessor = key[offset];
        const child = node.children.get(accessor);
        if (child === undefined) return;
        grandparent = parent;
        parent = node;
        node = child;
        continue;
      }

      case "ExactMatch": {
        // a valueless node here is a branch point, not a stored key
        if (Option.isNone(node.value)) return;

        Tracking.untrack(tree.order, node);
        node.value = Option.none();
        tree.length -= 1;

        if (parent !== undefined)
          detach(node, parent, grandparent, accessor);
        return;
      }
    }
  }
};

/**
 * Erase the element under `cursor` and return a cursor to the element
 * after it.
 *
 * The next position is captured before erasing, since erasing by key
 * retires the link the cursor refers to.
 */
export const eraseAt = <T>(
  tree: Aport.AportTree<T>,
  cursor: Aport.Cursor
): Aport.Cursor => {
  const entry = Option.getOrThrowWith(
    Iterate.current(tree, cursor),
    () =>
      new Aport.InvalidCursorError({
        reason: "cannot erase through a cursor that is not bound to an element",
      })
  );
  const following = Iterate.next(tree, cursor);
  erase(tree, entry.key);
  return following;
};

/**
 * AportErase capability: removal by key and by cursor
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportErase extends Context.Tag("@services/aport/AportErase")<
  AportErase,
  {
    readonly erase: <T>(tree: Aport.AportTree<T>, key: Aport.KeyInput) => void;
    readonly eraseAt: <T>(
      tree: Aport.AportTree<T>,
      cursor: Aport.Cursor
    ) => Aport.Cursor;
  }
>() {}

export const AportEraseLive = Layer.succeed(
  AportErase,
  AportErase.of({
    erase,
    eraseAt,
  })
);
