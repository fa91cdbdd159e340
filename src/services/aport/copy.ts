/**
 * APORT Tree Copy Capability
 *
 * Deep copy, ownership transfer and reset of a tree's node graph together
 * with its tracking index.
 *
 * @module AportService/Copy
 * @since 0.1.0
 */

import { Context, Layer, Option } from "effect";
import { identity } from "effect/Function";
import * as Aport from "../../entities/aport";
import * as Internal from "./internal";
import * as Tracking from "./tracking";

export interface CloneOptions<T> {
  readonly cloneValue?: (value: T) => T;
}

/**
 * Deep-copy a tree.
 *
 * Nodes are copied in pre-order from an explicit work stack, so depth of a
 * skewed tree never reaches the call stack. The tracking index is rebuilt
 * from the source's, tail first, through an original-handle → clone map.
 */
export const clone = <T>(
  source: Aport.AportTree<T>,
  options: CloneOptions<T> = {}
): Aport.AportTree<T> => {
  const cloneValue = options.cloneValue ?? identity;
  const target = Aport.makeTree<T>({
    mode: source.mode,
    makeDefault: source.makeDefault,
  });
  const clones = new Map<Aport.NodeHandle, Aport.AportNode<T>>();

  // copies prefix and value, not children
  const shallowCopy = (original: Aport.AportNode<T>): Aport.AportNode<T> => {
    const copy = Internal.spawnNode(
      target,
      original.prefix.slice(),
      Option.map(original.value, cloneValue)
    );
    clones.set(original.handle, copy);
    return copy;
  };

  target.root = shallowCopy(source.root);

  const stack: Array<[Aport.AportNode<T>, Aport.AportNode<T>]> = [
    [target.root, source.root],
  ];
  while (stack.length > 0) {
    const [copy, original] = stack.pop() ?? Internal.corrupted("empty stack");
    for (const [byte, child] of original.children) {
      const childCopy = shallowCopy(child);
      stack.push([childCopy, child]);
      copy.children.set(byte, childCopy);
    }
  }

  let cursor = source.order.tail;
  while (Option.isSome(cursor)) {
    const link = Option.getOrThrowWith(
      Tracking.lookupLink(source.order, cursor.value),
      () => new Aport.CorruptedTreeError({ reason: "broken order chain" })
    );
    const copy =
      clones.get(link.node.handle) ??
      Internal.corrupted(`tracked node ${link.node.handle} is not in the tree`);
    Tracking.track(target.order, copy, link.key.slice());
    cursor = link.prev;
  }

  target.length = source.length;
  return target;
};

/**
 * Reset a tree to empty: fresh root, no entries.
 */
export const clear = <T>(tree: Aport.AportTree<T>): void => {
  tree.root = Internal.makeRoot(tree);
  tree.length = 0;
  tree.order = Aport.makeOrderIndex();
};

/**
 * Transfer the node graph and tracking index to a new tree. The source is
 * left empty and usable, with the same mode and default factory.
 */
export const move = <T>(source: Aport.AportTree<T>): Aport.AportTree<T> => {
  const target: Aport.AportTree<T> = {
    root: source.root,
    length: source.length,
    order: source.order,
    nextHandle: source.nextHandle,
    mode: source.mode,
    makeDefault: source.makeDefault,
  };
  clear(source);
  return target;
};

/**
 * AportCopy capability: deep copy, move and clear
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportCopy extends Context.Tag("@services/aport/AportCopy")<
  AportCopy,
  {
    readonly clone: <T>(
      source: Aport.AportTree<T>,
      options?: CloneOptions<T>
    ) => Aport.AportTree<T>;
    readonly move: <T>(source: Aport.AportTree<T>) => Aport.AportTree<T>;
    readonly clear: <T>(tree: Aport.AportTree<T>) => void;
  }
>() {}

export const AportCopyLive = Layer.succeed(
  AportCopy,
  AportCopy.of({
    clone,
    move,
    clear,
  })
);
