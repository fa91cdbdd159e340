/**
 * APORT Tree Iteration Capability
 *
 * Cursor protocol over the order-tracking index (most recently inserted or
 * overwritten first). Cursors hold node handles, never node references, so
 * erasing during iteration cannot leave one dangling into the node graph.
 *
 * @module AportService/Iterate
 * @since 0.1.0
 */

import { Context, Layer, Option } from "effect";
import * as Aport from "../../entities/aport";
import * as Tracking from "./tracking";

export const begin = <T>(tree: Aport.AportTree<T>): Aport.Cursor =>
  tree.order.head;

export const end = (): Aport.Cursor => Option.none();

export const isEnd = (cursor: Aport.Cursor): boolean => Option.isNone(cursor);

/**
 * Entry under `cursor`, or `None` at the end or when its element is gone.
 */
export const current = <T>(
  tree: Aport.AportTree<T>,
  cursor: Aport.Cursor
): Option.Option<Aport.Entry<T>> =>
  Option.flatMap(cursor, (handle) =>
    Option.map(
      Tracking.lookupLink(tree.order, handle),
      (link) => new Aport.Entry(link.key.slice(), link.node)
    )
  );

export const next = <T>(
  tree: Aport.AportTree<T>,
  cursor: Aport.Cursor
): Aport.Cursor =>
  Option.flatMap(cursor, (handle) =>
    Option.flatMap(Tracking.lookupLink(tree.order, handle), (link) => link.next)
  );

/**
 * Iterate the entries present when iteration starts, in order. Entries
 * erased before they are reached are skipped, whichever entry erased them;
 * entries inserted during iteration are not visited.
 */
export function* entries<T>(
  tree: Aport.AportTree<T>
): Generator<Aport.Entry<T>, void, undefined> {
  const handles: Array<Aport.NodeHandle> = [];
  let cursor = begin(tree);
  while (Option.isSome(cursor)) {
    handles.push(cursor.value);
    cursor = next(tree, cursor);
  }

  for (const handle of handles) {
    const entry = current(tree, Option.some(handle));
    if (Option.isSome(entry)) yield entry.value;
  }
}

/**
 * AportIteration capability: cursor protocol and entry iteration
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportIteration extends Context.Tag(
  "@services/aport/AportIteration"
)<
  AportIteration,
  {
    readonly begin: <T>(tree: Aport.AportTree<T>) => Aport.Cursor;
    readonly end: () => Aport.Cursor;
    readonly isEnd: (cursor: Aport.Cursor) => boolean;
    readonly next: <T>(
      tree: Aport.AportTree<T>,
      cursor: Aport.Cursor
    ) => Aport.Cursor;
    readonly current: <T>(
      tree: Aport.AportTree<T>,
      cursor: Aport.Cursor
    ) => Option.Option<Aport.Entry<T>>;
    readonly entries: <T>(
      tree: Aport.AportTree<T>
    ) => Generator<Aport.Entry<T>, void, undefined>;
  }
>() {}

export const AportIterationLive = Layer.succeed(
  AportIteration,
  AportIteration.of({
    begin,
    end,
    isEnd,
    next,
    current,
    entries,
  })
);
