/** Collects the external types and objects a set of graphs refers to. */

import type { ScriptGraph } from '../models/scriptAsset.js';
import { OBJECT_CATEGORIES } from '../utils/constants.js';
import { classifyNode } from './nodeClassifier.js';

/**
 * Ordered, de-duplicated dependency paths.
 *
 * Graphs are walked in the given order and nodes within a graph in their own
 * order. A called function contributes the path of its owning type; an
 * object-typed port contributes the path of its default object. Empty paths
 * are skipped. Each path appears once, at its first occurrence.
 */
export function extractDependencies(graphs: readonly ScriptGraph[]): string[] {
  const seen = new Set<string>();
  const dependencies: string[] = [];

  const record = (path: string | undefined) => {
    if (!path || seen.has(path)) return;
    seen.add(path);
    dependencies.push(path);
  };

  for (const graph of graphs) {
    for (const node of graph.nodes) {
      if (classifyNode(node).tag === 'CallExternalFunction') {
        record(node.functionReference?.memberParent);
      }

      for (const portIndex of node.ports) {
        const port = graph.ports[portIndex];
        if (port && OBJECT_CATEGORIES.has(port.type.category.toLowerCase())) {
          record(port.defaultObject);
        }
      }
    }
  }

  return dependencies;
}
