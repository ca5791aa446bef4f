/**
 * Unused private functions.
 *
 * Records `name/arity` of every `defp` the module never calls from outside
 * the function itself. The printer turns the list into a
 * `@compile {:nowarn_unused_function, ...}` attribute.
 */

import type { EModule, Node } from "../ast/elixir-ast";
import { forEachNode, rewrite, withMeta } from "../ast/traverse";
import type { Pass } from "./pass";

const key = (name: string, arity: number) => `${name}/${arity}`;

/** Local calls made under `node`, as name/arity keys */
function localCalls(node: Node, moduleName: string): Set<string> {
  const calls = new Set<string>();
  forEachNode(node, (n) => {
    if (n.tag === "call") calls.add(key(n.name, n.args.length));
    if (n.tag === "remoteCall" && n.module.tag === "alias" && n.module.name === moduleName) {
      calls.add(key(n.name, n.args.length));
    }
  });
  return calls;
}

export function findUnusedPrivateFunctions(module: EModule): string[] {
  const privates: string[] = [];
  for (const item of module.body) {
    if (item.tag === "defp") {
      const k = key(item.name, item.params.length);
      if (!privates.includes(k)) privates.push(k);
    }
  }

  return privates.filter((k) =>
    module.body.every((item) => {
      const self = (item.tag === "def" || item.tag === "defp") && key(item.name, item.params.length) === k;
      return self || !localCalls(item, module.name).has(k);
    })
  );
}

export const unusedPrivateFunctions: Pass = {
  name: "unused-private-functions",
  enabled: true,
  run: (root) =>
    rewrite(root, (node) => {
      if (node.tag !== "module") return node;
      const unused = findUnusedPrivateFunctions(node);
      return unused.length > 0 ? withMeta(node, { unusedPrivateFunctions: unused }) : node;
    }),
};
