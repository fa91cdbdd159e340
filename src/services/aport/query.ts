/**
 * APORT Tree Query Capability
 *
 * Membership and retrieval. `contains` always verifies every byte; `get`,
 * `getEntry` and `modify` use the tree's configured match mode and may
 * therefore answer for a different key of the same length when the mode is
 * optimistic.
 *
 * @module AportService/Query
 * @since 0.1.0
 */

import { Context, Effect, Layer, Match, Option } from "effect";
import * as Aport from "../../entities/aport";
import * as Internal from "./internal";
import * as Tracking from "./tracking";

/**
 * Node reached by consuming the whole of `key` under `mode`, valued or not.
 */
export const lookupNode = <T>(
  tree: Aport.AportTree<T>,
  key: Uint8Array,
  mode: Aport.MatchMode
): Option.Option<Aport.AportNode<T>> => {
  let currentNode = tree.root;
  let offset = 0;

  type Step = Option.Option<Aport.AportNode<T>> | null;

  // null means "descend and compare again"
  const matcher = Match.typeTags<Aport.Comparison>()({
    NoMatch: (): Step => Option.none(),
    PartialMatch: (): Step => Option.none(),
    PrefixFullMatch: (): Step => {
      const child = currentNode.children.get(key[offset]);
      if (!child) return Option.none();

      currentNode = child;
      return null;
    },
    ExactMatch: (): Step => Option.some(currentNode),
  });

  while (true) {
    const comparison = Internal.comparePrefixes(
      currentNode.prefix,
      key.subarray(offset),
      mode
    );
    offset += comparison.matched;

    const result = matcher(comparison);
    if (result !== null) return result;
  }
};

/**
 * Exact membership test.
 */
export const contains = <T>(
  tree: Aport.AportTree<T>,
  key: Aport.KeyInput
): boolean =>
  Option.match(lookupNode(tree, Internal.toBytes(key), "exact"), {
    onNone: () => false,
    onSome: (node) => Option.isSome(node.value),
  });

/**
 * Retrieve under the tree's match mode.
 */
export const getOption = <T>(
  tree: Aport.AportTree<T>,
  key: Aport.KeyInput
): Option.Option<T> =>
  Option.flatMap(
    lookupNode(tree, Internal.toBytes(key), tree.mode),
    (node) => node.value
  );

export const get = <T>(
  tree: Aport.AportTree<T>,
  key: Aport.KeyInput
): Effect.Effect<T, Aport.KeyNotFoundError> =>
  Effect.suspend(() =>
    Option.match(getOption(tree, key), {
      onNone: () =>
        Effect.fail(Aport.makeKeyNotFoundError(Internal.toBytes(key))),
      onSome: Effect.succeed,
    })
  );

/**
 * Write-through entry under the tree's match mode. In optimistic mode the
 * entry may belong to a different key than the one asked for; `entry.key`
 * is always the stored key.
 */
export const getEntry = <T>(
  tree: Aport.AportTree<T>,
  key: Aport.KeyInput
): Effect.Effect<Aport.Entry<T>, Aport.KeyNotFoundError> =>
  Effect.suspend(() =>
    Option.match(
      lookupNode(tree, Internal.toBytes(key), tree.mode).pipe(
        Option.filter((node) => Option.isSome(node.value)),
        Option.flatMap((node) =>
          Option.map(
            Tracking.lookupLink(tree.order, node.handle),
            (link) => new Aport.Entry(link.key.slice(), node)
          )
        )
      ),
      {
        onNone: () =>
          Effect.fail(Aport.makeKeyNotFoundError(Internal.toBytes(key))),
        onSome: Effect.succeed,
      }
    )
  );

/**
 * Replace the value found under `key` with `f(value)` and return it.
 */
export const modify = <T>(
  tree: Aport.AportTree<T>,
  key: Aport.KeyInput,
  f: (value: T) => T
): Effect.Effect<T, Aport.KeyNotFoundError> =>
  Effect.map(getEntry(tree, key), (entry) => {
    entry.value = f(entry.value);
    return entry.value;
  });

/**
 * AportQuery capability: membership and retrieval
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportQuery extends Context.Tag("@services/aport/AportQuery")<
  AportQuery,
  {
    readonly contains: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => boolean;
    readonly getOption: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Option.Option<T>;
    readonly get: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Effect.Effect<T, Aport.KeyNotFoundError>;
    readonly getEntry: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Effect.Effect<Aport.Entry<T>, Aport.KeyNotFoundError>;
    readonly modify: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput,
      f: (value: T) => T
    ) => Effect.Effect<T, Aport.KeyNotFoundError>;
  }
>() {}

export const AportQueryLive = Layer.succeed(
  AportQuery,
  AportQuery.of({
    contains,
    getOption,
    get,
    getEntry,
    modify,
  })
);
