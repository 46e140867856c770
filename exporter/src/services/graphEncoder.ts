/** Encodes arena graphs into document records: types, pins, nodes, graphs. */

import type { GraphRecord, NodeRecord, PinRecord } from '../models/document.js';
import type { GraphPort, ScriptGraph, TypeDescriptor } from '../models/scriptAsset.js';
import { classifyNode, nodeTypeString } from './nodeClassifier.js';

/** `Base`, `Base<Ref>`, wrapped in `Array<...>` for collections. */
export function typeToString(type: TypeDescriptor): string {
  let result = type.category;
  if (type.subCategoryObject) {
    result += `<${type.subCategoryObject}>`;
  }
  if (type.isArray) {
    result = `Array<${result}>`;
  }
  return result;
}

export function encodePort(port: GraphPort): PinRecord {
  const record: PinRecord = {
    name: port.id,
    display_name: port.displayName,
    direction: port.direction,
    type: typeToString(port.type),
  };
  // An empty default means "driven by a wire or the engine default", so it is omitted.
  if (port.defaultValue !== '') {
    record.default_value = port.defaultValue;
  }
  return record;
}

/** Target port indices per source port index. */
export function outgoingWires(graph: ScriptGraph): Map<number, number[]> {
  const outgoing = new Map<number, number[]>();
  for (const wire of graph.wires) {
    const targets = outgoing.get(wire.source);
    if (targets) targets.push(wire.target);
    else outgoing.set(wire.source, [wire.target]);
  }
  return outgoing;
}

/**
 * Ids of the nodes downstream of a node's output ports, first-seen order, no repeats.
 * Ports are visited in node order and each port's wires in graph order.
 */
export function connectedNodeIds(
  graph: ScriptGraph,
  nodeIndex: number,
  outgoing: Map<number, number[]> = outgoingWires(graph),
): string[] {
  const node = graph.nodes[nodeIndex];
  if (!node) return [];

  const seen = new Set<number>();
  const result: string[] = [];
  for (const portIndex of node.ports) {
    if (graph.ports[portIndex]?.direction !== 'output') continue;
    for (const targetPort of outgoing.get(portIndex) ?? []) {
      const owner = graph.ports[targetPort]?.owner;
      if (owner === undefined || seen.has(owner)) continue;
      const target = graph.nodes[owner];
      if (!target) continue;
      seen.add(owner);
      result.push(target.id);
    }
  }
  return result;
}

export function encodeNode(
  graph: ScriptGraph,
  nodeIndex: number,
  outgoing: Map<number, number[]> = outgoingWires(graph),
): NodeRecord {
  const node = graph.nodes[nodeIndex];
  if (!node) throw new RangeError(`Node index ${nodeIndex} out of range in graph "${graph.name}"`);

  const pins: PinRecord[] = [];
  for (const portIndex of node.ports) {
    const port = graph.ports[portIndex];
    if (port) pins.push(encodePort(port));
  }

  return {
    id: node.id,
    type: nodeTypeString(classifyNode(node)),
    title: node.title,
    category: node.menuCategory ?? '',
    position: { x: node.position.x, y: node.position.y },
    pins,
    connections: connectedNodeIds(graph, nodeIndex, outgoing),
  };
}

/** Nodes are encoded in the order the graph holds them; no ordering is imposed. */
export function encodeGraph(graph: ScriptGraph): GraphRecord {
  const outgoing = outgoingWires(graph);
  return {
    name: graph.name,
    nodes: graph.nodes.map((_, index) => encodeNode(graph, index, outgoing)),
  };
}
