/**
 * Builds ScriptAsset arenas from asset source files.
 *
 * Nodes and ports are stored in flat per-graph arrays; links between pins are
 * resolved to port-index wires. Structural problems (duplicate ids, links to
 * missing pins) are rejected; graph semantics are not checked.
 */

import fs from 'node:fs';
import type {
  ComponentDeclaration,
  GraphNode,
  GraphPort,
  ScriptAsset,
  ScriptGraph,
  TypeDescriptor,
  VariableDeclaration,
  Wire,
} from '../models/scriptAsset.js';
import { AssetSourceSchema, formatIssues } from '../utils/assetSchema.js';
import type { AssetSource, GraphSource, TypeDescriptorSource } from '../utils/assetSchema.js';
import { AssetFormatError } from '../utils/errors.js';
import { renderLiteral } from './literalRenderer.js';

function toTypeDescriptor(source: TypeDescriptorSource): TypeDescriptor {
  return {
    category: source.category,
    ...(source.sub_category_object ? { subCategoryObject: source.sub_category_object } : {}),
    isArray: source.is_array,
  };
}

function buildGraph(source: GraphSource, where: string, issues: string[]): ScriptGraph {
  const nodes: GraphNode[] = [];
  const ports: GraphPort[] = [];
  const nodeIndexById = new Map<string, number>();
  const portIndexByKey = new Map<string, number>();
  const portKey = (nodeId: string, pinId: string) => `${nodeId}\u0000${pinId}`;

  source.nodes.forEach((nodeSource, nodeIndex) => {
    if (nodeIndexById.has(nodeSource.id)) {
      issues.push(`${where}: duplicate node id "${nodeSource.id}"`);
    } else {
      nodeIndexById.set(nodeSource.id, nodeIndex);
    }

    const portIndices: number[] = [];
    const pinIds = new Set<string>();
    for (const pin of nodeSource.pins) {
      if (pinIds.has(pin.id)) {
        issues.push(`${where}: duplicate pin id "${pin.id}" on node "${nodeSource.id}"`);
      }
      pinIds.add(pin.id);

      const type = toTypeDescriptor(pin.type);
      const portIndex = ports.length;
      ports.push({
        id: pin.id,
        displayName: pin.display_name ?? pin.id,
        direction: pin.direction,
        type,
        defaultValue: renderLiteral(type, pin.default_value),
        ...(pin.default_object ? { defaultObject: pin.default_object } : {}),
        owner: nodeIndex,
      });
      portIndices.push(portIndex);
      if (!portIndexByKey.has(portKey(nodeSource.id, pin.id))) {
        portIndexByKey.set(portKey(nodeSource.id, pin.id), portIndex);
      }
    }

    nodes.push({
      id: nodeSource.id,
      className: nodeSource.class,
      lineage: nodeSource.lineage,
      title: nodeSource.title,
      ...(nodeSource.menu_category !== undefined ? { menuCategory: nodeSource.menu_category } : {}),
      position: { x: nodeSource.position.x, y: nodeSource.position.y },
      ports: portIndices,
      ...(nodeSource.function_reference
        ? {
            functionReference: {
              memberName: nodeSource.function_reference.member_name,
              ...(nodeSource.function_reference.member_parent
                ? { memberParent: nodeSource.function_reference.member_parent }
                : {}),
            },
          }
        : {}),
    });
  });

  // Second pass: every target must exist before links can be resolved.
  const wires: Wire[] = [];
  for (const nodeSource of source.nodes) {
    for (const pin of nodeSource.pins) {
      if (pin.links.length === 0) continue;
      if (pin.direction !== 'output') {
        issues.push(`${where}: input pin "${nodeSource.id}.${pin.id}" declares links`);
        continue;
      }
      const sourceIndex = portIndexByKey.get(portKey(nodeSource.id, pin.id));
      if (sourceIndex === undefined) continue;
      for (const link of pin.links) {
        const targetIndex = portIndexByKey.get(portKey(link.node, link.pin));
        if (targetIndex === undefined) {
          issues.push(`${where}: link from "${nodeSource.id}.${pin.id}" to missing pin "${link.node}.${link.pin}"`);
          continue;
        }
        if (ports[targetIndex]?.direction !== 'input') {
          issues.push(`${where}: link from "${nodeSource.id}.${pin.id}" targets output pin "${link.node}.${link.pin}"`);
          continue;
        }
        wires.push({ source: sourceIndex, target: targetIndex });
      }
    }
  }

  return { name: source.name, nodes, ports, wires };
}

function buildVariable(source: AssetSource['variables'][number]): VariableDeclaration {
  const type = toTypeDescriptor(source.type);
  return {
    name: source.name,
    type,
    category: source.category,
    isExposed: source.is_exposed,
    defaultValue: renderLiteral(type, source.default_value),
  };
}

function buildComponent(source: AssetSource['components'][number]): ComponentDeclaration {
  return {
    name: source.name,
    ...(source.template_class ? { templateClass: source.template_class } : {}),
  };
}

/** Validate raw JSON and build the asset arena. Throws AssetFormatError. */
export function parseAssetSource(raw: unknown, source: string): ScriptAsset {
  const parsed = AssetSourceSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AssetFormatError(source, formatIssues(parsed.error));
  }
  const data = parsed.data;

  const issues: string[] = [];
  const graphs = data.graphs.map((g, i) => buildGraph(g, `graphs[${i}] "${g.name}"`, issues));
  const functionGraphs = data.function_graphs.map((g, i) =>
    buildGraph(g, `function_graphs[${i}] "${g.name}"`, issues),
  );
  if (issues.length > 0) {
    throw new AssetFormatError(source, issues);
  }

  return {
    assetClass: data.asset_class,
    name: data.name,
    path: data.path,
    ...(data.parent_class ? { parentClass: data.parent_class } : {}),
    ...(data.generated_class ? { generatedClass: data.generated_class } : {}),
    graphs,
    functionGraphs,
    variables: data.variables.map(buildVariable),
    components: data.components.map(buildComponent),
  };
}

/** Read the `asset_class` of a source file without building it. Null when unreadable. */
export function readAssetClass(filePath: string): string | null {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (raw && typeof raw === 'object' && 'asset_class' in raw && typeof raw.asset_class === 'string') {
      return raw.asset_class;
    }
    return null;
  } catch {
    return null;
  }
}

/** Read and build an asset source file. Throws AssetFormatError on bad JSON or structure. */
export function loadAssetFile(filePath: string): ScriptAsset {
  const text = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new AssetFormatError(filePath, [`invalid JSON: ${(e as Error).message}`]);
  }
  return parseAssetSource(raw, filePath);
}
