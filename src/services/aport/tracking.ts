/**
 * Order-Tracking Index
 *
 * Most-recent-first list of the valued nodes of a tree, threaded through a
 * handle table so links can be moved or removed in O(1).
 *
 * @module AportService/Tracking
 * @since 0.1.0
 * @internal
 */

import { Option } from "effect";
import * as Aport from "../../entities/aport";

const linkAt = <T>(
  index: Aport.OrderIndex<T>,
  handle: Aport.NodeHandle
): Aport.OrderLink<T> =>
  Option.getOrThrowWith(
    Option.fromNullable(index.links.get(handle)),
    () =>
      new Aport.CorruptedTreeError({
        reason: `order index has no link for node ${handle}`,
      })
  );

const unlink = <T>(index: Aport.OrderIndex<T>, link: Aport.OrderLink<T>) => {
  Option.match(link.prev, {
    onNone: () => {
      index.head = link.next;
    },
    onSome: (prev) => {
      linkAt(index, prev).next = link.next;
    },
  });
  Option.match(link.next, {
    onNone: () => {
      index.tail = link.prev;
    },
    onSome: (next) => {
      linkAt(index, next).prev = link.prev;
    },
  });
};

const pushFront = <T>(index: Aport.OrderIndex<T>, link: Aport.OrderLink<T>) => {
  const handle = link.node.handle;
  link.prev = Option.none();
  link.next = index.head;
  Option.match(index.head, {
    onNone: () => {
      index.tail = Option.some(handle);
    },
    onSome: (head) => {
      linkAt(index, head).prev = Option.some(handle);
    },
  });
  index.head = Option.some(handle);
};

/**
 * Record `node` as the most recently touched entry under `key`, moving its
 * link to the front if it is already tracked.
 */
export const track = <T>(
  index: Aport.OrderIndex<T>,
  node: Aport.AportNode<T>,
  key: Uint8Array
): void => {
  const existing = index.links.get(node.handle);

  if (existing !== undefined) {
    unlink(index, existing);
    existing.key = key;
    pushFront(index, existing);
    return;
  }

  const link: Aport.OrderLink<T> = {
    key,
    node,
    prev: Option.none(),
    next: Option.none(),
  };
  index.links.set(node.handle, link);
  pushFront(index, link);
};

export const untrack = <T>(
  index: Aport.OrderIndex<T>,
  node: Aport.AportNode<T>
): void => {
  const link = linkAt(index, node.handle);
  unlink(index, link);
  index.links.delete(node.handle);
};

export const lookupLink = <T>(
  index: Aport.OrderIndex<T>,
  handle: Aport.NodeHandle
): Option.Option<Aport.OrderLink<T>> =>
  Option.fromNullable(index.links.get(handle));
