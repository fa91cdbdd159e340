import { Option } from "effect";
import * as Aport from "../../src/entities/aport";

/**
 * Walk a tree and list every structural rule it breaks; an empty list means
 * the tree is well-formed.
 */
export const findViolations = <T>(tree: Aport.AportTree<T>): string[] => {
  const violations: string[] = [];
  const handles = new Set<Aport.NodeHandle>();
  const valued = new Map<Aport.NodeHandle, string>();

  if (tree.root.prefix.length !== 0) violations.push("root has a prefix");

  const stack: Array<{ node: Aport.AportNode<T>; path: number[] }> = [
    { node: tree.root, path: [] },
  ];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;
    const { node, path } = frame;
    const isRoot = node === tree.root;

    if (handles.has(node.handle))
      violations.push(`handle ${node.handle} used twice`);
    handles.add(node.handle);

    if (!isRoot) {
      if (node.prefix.length === 0)
        violations.push(`node ${node.handle} has an empty prefix`);
      if (Option.isNone(node.value) && node.children.size === 0)
        violations.push(`node ${node.handle} is valueless and childless`);
      if (Option.isNone(node.value) && node.children.size === 1)
        violations.push(`node ${node.handle} is valueless with one child`);
    }

    if (Option.isSome(node.value)) valued.set(node.handle, path.join(","));

    for (const [byte, child] of node.children) {
      if (child.prefix[0] !== byte)
        violations.push(`child ${child.handle} is filed under the wrong byte`);
      stack.push({ node: child, path: [...path, ...child.prefix] });
    }
  }

  if (tree.length !== valued.size)
    violations.push(`length ${tree.length} != ${valued.size} valued nodes`);
  if (tree.order.links.size !== valued.size)
    violations.push(
      `${tree.order.links.size} tracked links != ${valued.size} valued nodes`
    );

  for (const [handle, link] of tree.order.links) {
    const path = valued.get(handle);
    if (path === undefined) {
      violations.push(`link ${handle} tracks a node without a value`);
    } else if (path !== link.key.join(",")) {
      violations.push(`link ${handle} holds a stale key`);
    }
  }

  // walk the chain both ways
  let forward = 0;
  let cursor = tree.order.head;
  while (Option.isSome(cursor) && forward <= tree.order.links.size) {
    forward += 1;
    const link = tree.order.links.get(cursor.value);
    cursor = link === undefined ? Option.none() : link.next;
  }
  let backward = 0;
  cursor = tree.order.tail;
  while (Option.isSome(cursor) && backward <= tree.order.links.size) {
    backward += 1;
    const link = tree.order.links.get(cursor.value);
    cursor = link === undefined ? Option.none() : link.prev;
  }
  if (forward !== tree.order.links.size || backward !== tree.order.links.size)
    violations.push("order chain does not cover every link");

  return violations;
};
