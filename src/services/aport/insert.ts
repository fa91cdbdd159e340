/**
 * APORT Tree Insert Capability
 *
 * Upsert and get-or-create. Both always traverse with the exact discipline,
 * since they must decide where to create or split nodes.
 *
 * @module AportService/Insert
 * @since 0.1.0
 */

import { Context, Layer, Option } from "effect";
import * as Aport from "../../entities/aport";
import * as Internal from "./internal";
import * as Tracking from "./tracking";

/**
 * Walk to the node that owns `key`, creating or splitting nodes as needed,
 * then store `resolve(currentValue)` there and move it to the front of the
 * tracking index. Returns the node holding the value.
 * `resolve` runs before any node is created or reshaped.
 */
const upsert = <T>(
  tree: Aport.AportTree<T>,
  key: Uint8Array,
  resolve: (current: Option.Option<T>) => T
): Aport.AportNode<T> => {
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
        // children are selected by their first byte, so at least one byte matches
        return Internal.corrupted(
          `prefix of node ${node.handle} shares no byte with its accessor`
        );

      case "PrefixFullMatch": {
        accessor = key[offset];
        const child = node.children.get(accessor);
        if (child !== undefined) {
          parent = node;
          node = child;
          continue;
        }

        const value = resolve(Option.none());
        const leaf = Internal.spawnNode(
          tree,
          key.slice(offset),
          Option.some(value)
        );
        node.children.set(accessor, leaf);
        tree.length += 1;
        Tracking.track(tree.order, leaf, key);
        return leaf;
      }

      case "PartialMatch": {
        if (parent === undefined)
          return Internal.corrupted("the root prefix cannot be split");

        const value = resolve(Option.none());
        const intermediate = Internal.spawnNode<T>(
          tree,
          node.prefix.slice(0, comparison.matched),
          Option.none()
        );
        node.prefix = node.prefix.slice(comparison.matched);
        intermediate.children.set(node.prefix[0], node);

        let holder = intermediate;
        if (offset < key.length) {
          holder = Internal.spawnNode(
            tree,
            key.slice(offset),
            Option.some(value)
          );
          intermediate.children.set(holder.prefix[0], holder);
        } else {
          intermediate.value = Option.some(value);
        }

        parent.children.set(accessor, intermediate);
        tree.length += 1;
        Tracking.track(tree.order, holder, key);
        return holder;
      }

      case "ExactMatch": {
        const value = resolve(node.value);
        if (Option.isNone(node.value)) tree.length += 1;
        node.value = Option.some(value);
        Tracking.track(tree.order, node, key);
        return node;
      }
    }
  }
};

/**
 * Insert or overwrite the value stored under `key`.
 */
export const insert = <T>(
  tree: Aport.AportTree<T>,
  key: Aport.KeyInput,
  value: T
): void => {
  upsert(tree, Internal.toBytes(key), () => value);
};

/**
 * Entry for `key`, storing `tree.makeDefault()` first when there is none.
 * Writing `entry.value` updates the stored value:
 *
 * ```ts
 * getOrCreate(counts, "word").value += 1
 * ```
 */
export const getOrCreate = <T>(
  tree: Aport.AportTree<T>,
  key: Aport.KeyInput
): Aport.Entry<T> => {
  const bytes = Internal.toBytes(key);
  const node = upsert(tree, bytes, (current) =>
    Option.getOrElse(current, tree.makeDefault)
  );
  return new Aport.Entry(bytes.slice(), node);
};

/**
 * AportInsert capability: upserts and get-or-create
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportInsert extends Context.Tag("@services/aport/AportInsert")<
  AportInsert,
  {
    readonly insert: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput,
      value: T
    ) => void;
    readonly getOrCreate: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Aport.Entry<T>;
  }
>() {}

export const AportInsertLive = Layer.succeed(
  AportInsert,
  AportInsert.of({
    insert,
    getOrCreate,
  })
);
