/**
 * APORT Tree Display Capability
 *
 * Read-only diagnostics: an indented dump of the node graph, a one-line
 * summary and shape statistics.
 *
 * @module AportService/Display
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option } from "effect";
import * as Aport from "../../entities/aport";
import * as Primitives from "../../entities/primitives";
import * as Internal from "./internal";

const textDecoder = new TextDecoder();

export interface TreeStats {
  readonly entries: Primitives.NonNegativeInt;
  readonly nodes: Primitives.NonNegativeInt;
  readonly maxDepth: Primitives.NonNegativeInt;
}

/**
 * Multi-line dump, one node per line in pre-order with children in
 * ascending byte order:
 *
 * ```text
 * `a`
 *  `l`: 0
 *  `rnold`: 1
 * ```
 *
 * The root is only printed when it holds a value.
 */
const displayTree = <T>(
  tree: Aport.AportTree<T>,
  formatValue: (value: T) => string = (value) => JSON.stringify(value)
): string => {
  const lines: Array<string> = [];
  const stack: Array<{ node: Aport.AportNode<T>; level: number }> = [
    { node: tree.root, level: -1 },
  ];

  while (stack.length > 0) {
    const { node, level } = stack.pop() ?? Internal.corrupted("empty stack");

    if (node.prefix.length > 0 || Option.isSome(node.value)) {
      const value = Option.match(node.value, {
        onNone: () => "",
        onSome: (v) => `: ${formatValue(v)}`,
      });
      lines.push(
        `${" ".repeat(Math.max(level, 0))}\`${textDecoder.decode(
          node.prefix
        )}\`${value}`
      );
    }

    const children = [...node.children.entries()].sort(([a], [b]) => b - a);
    for (const [, child] of children) {
      stack.push({ node: child, level: level + 1 });
    }
  }

  return lines.join("\n");
};

const collectStats = <T>(tree: Aport.AportTree<T>): TreeStats => {
  let nodes = 0;
  let entries = 0;
  let maxDepth = 0;
  const stack: Array<{ node: Aport.AportNode<T>; depth: number }> = [
    { node: tree.root, depth: 0 },
  ];

  while (stack.length > 0) {
    const { node, depth } = stack.pop() ?? Internal.corrupted("empty stack");
    nodes += 1;
    if (Option.isSome(node.value)) entries += 1;
    maxDepth = Math.max(maxDepth, depth);
    for (const child of node.children.values()) {
      stack.push({ node: child, depth: depth + 1 });
    }
  }

  return { entries, nodes, maxDepth };
};

/**
 * Compact single-line summary.
 * Format: "Tree(mode=optimistic, length=2, nodes=4)"
 */
const displayCompact = <T>(tree: Aport.AportTree<T>): string =>
  `Tree(mode=${tree.mode}, length=${tree.length}, nodes=${
    collectStats(tree).nodes
  })`;

const logStats = <T>(tree: Aport.AportTree<T>): Effect.Effect<void> =>
  Effect.gen(function* () {
    const stats = collectStats(tree);

    yield* Effect.logInfo("Aport Tree Statistics");
    yield* Effect.logInfo(`Match mode:    ${tree.mode}`);
    yield* Effect.logInfo(`Entries:       ${stats.entries}`);
    yield* Effect.logInfo(`Nodes:         ${stats.nodes}`);
    yield* Effect.logInfo(`Max depth:     ${stats.maxDepth}`);
  });

/**
 * AportDisplay capability: dumps and statistics for debugging
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportDisplay extends Context.Tag("@services/aport/AportDisplay")<
  AportDisplay,
  {
    readonly displayTree: <T>(
      tree: Aport.AportTree<T>,
      formatValue?: (value: T) => string
    ) => string;
    readonly displayCompact: <T>(tree: Aport.AportTree<T>) => string;
    readonly collectStats: <T>(tree: Aport.AportTree<T>) => TreeStats;
    readonly logStats: <T>(tree: Aport.AportTree<T>) => Effect.Effect<void>;
  }
>() {}

/**
 * Live implementation of AportDisplay
 *
 * @category Services
 * @since 0.1.0
 */
export const AportDisplayLive = Layer.succeed(
  AportDisplay,
  AportDisplay.of({
    displayTree,
    displayCompact,
    collectStats,
    logStats,
  })
);
