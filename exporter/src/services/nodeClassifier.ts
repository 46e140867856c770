/** Maps concrete node types onto the closed node taxonomy. */

import type { GraphNode, NodeKind, NodeKindTag } from '../models/scriptAsset.js';

type TaxonomyTag = Exclude<NodeKindTag, 'Other'>;

/** Checked in order; the first entry whose root type the node descends from wins. */
const TAXONOMY: ReadonlyArray<{ tag: TaxonomyTag; roots: readonly string[] }> = [
  { tag: 'Event', roots: ['K2Node_Event'] },
  { tag: 'FunctionEntry', roots: ['K2Node_FunctionEntry'] },
  { tag: 'CallExternalFunction', roots: ['K2Node_CallFunction'] },
  { tag: 'VariableRead', roots: ['K2Node_VariableGet'] },
  { tag: 'VariableWrite', roots: ['K2Node_VariableSet'] },
];

function descendsFrom(node: GraphNode, roots: readonly string[]): boolean {
  return roots.includes(node.className) || node.lineage.some((ancestor) => roots.includes(ancestor));
}

export function classifyNode(node: GraphNode): NodeKind {
  for (const entry of TAXONOMY) {
    if (descendsFrom(node, entry.roots)) return { tag: entry.tag };
  }
  return { tag: 'Other', className: node.className };
}

/** The `type` string written for a node: its tag, or its concrete type name for `Other`. */
export function nodeTypeString(kind: NodeKind): string {
  return kind.tag === 'Other' ? kind.className : kind.tag;
}
