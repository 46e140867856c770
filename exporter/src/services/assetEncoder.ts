/**
 * Top-level asset encoder.
 *
 * Produces one document per script asset: identity, inheritance, every graph
 * (top-level pages first, then function graphs), variables, function
 * signatures, components and dependencies. Function graphs are walked twice,
 * once for the embedded graph record and once for the parameter list, so the
 * two views always come from the same source.
 */

import type {
  AssetDocument,
  ComponentRecord,
  FunctionRecord,
  ParameterRecord,
  VariableRecord,
} from '../models/document.js';
import type { ComponentDeclaration, ScriptAsset, ScriptGraph, VariableDeclaration } from '../models/scriptAsset.js';
import { DOCUMENT_CLASS_TYPE, EXEC_CATEGORY, SCRIPT_ASSET_KIND } from '../utils/constants.js';
import { InputError } from '../utils/errors.js';
import { extractDependencies } from './dependencyExtractor.js';
import { encodeGraph, typeToString } from './graphEncoder.js';
import { classifyNode } from './nodeClassifier.js';

export type SerializeResult =
  | { ok: true; document: AssetDocument }
  | { ok: false; error: InputError };

/** Written in place of a document when the asset could not be serialized. */
export const EMPTY_DOCUMENT_JSON = '{}';

export function encodeVariable(variable: VariableDeclaration): VariableRecord {
  const record: VariableRecord = {
    name: variable.name,
    type: typeToString(variable.type),
    category: variable.category,
    is_exposed: variable.isExposed,
  };
  if (variable.defaultValue !== '') {
    record.default_value = variable.defaultValue;
  }
  return record;
}

/** Output, non-exec ports of the graph's entry nodes. */
export function functionParameters(graph: ScriptGraph): ParameterRecord[] {
  const parameters: ParameterRecord[] = [];
  for (const node of graph.nodes) {
    if (classifyNode(node).tag !== 'FunctionEntry') continue;
    for (const portIndex of node.ports) {
      const port = graph.ports[portIndex];
      if (!port || port.direction !== 'output') continue;
      if (port.type.category.toLowerCase() === EXEC_CATEGORY) continue;
      parameters.push({ name: port.id, type: typeToString(port.type) });
    }
  }
  return parameters;
}

export function encodeFunction(graph: ScriptGraph): FunctionRecord {
  return {
    name: graph.name,
    parameters: functionParameters(graph),
    graph: encodeGraph(graph),
  };
}

export function encodeComponents(components: readonly ComponentDeclaration[]): ComponentRecord[] {
  const records: ComponentRecord[] = [];
  for (const component of components) {
    if (component.templateClass) {
      records.push({ name: component.name, class: component.templateClass });
    }
  }
  return records;
}

/** Build the document for one asset. Fails with InputError when the asset is absent or not a script asset. */
export function serializeAsset(asset: ScriptAsset | null | undefined): SerializeResult {
  if (!asset) {
    return { ok: false, error: new InputError('serializeAsset: invalid script asset') };
  }
  if (asset.assetClass !== SCRIPT_ASSET_KIND) {
    return {
      ok: false,
      error: new InputError(`serializeAsset: "${asset.name}" is a ${asset.assetClass}, not a ${SCRIPT_ASSET_KIND}`),
    };
  }

  const document: AssetDocument = {
    name: asset.name,
    path: asset.path,
    class_type: DOCUMENT_CLASS_TYPE,
    ...(asset.parentClass ? { parent_class: asset.parentClass } : {}),
    ...(asset.generatedClass ? { generated_class: asset.generatedClass } : {}),
    graphs: [...asset.graphs, ...asset.functionGraphs].map(encodeGraph),
    variables: asset.variables.map(encodeVariable),
    functions: asset.functionGraphs.map(encodeFunction),
    components: encodeComponents(asset.components),
    dependencies: extractDependencies(asset.graphs),
  };

  return { ok: true, document };
}

/** Document text for an asset, or the empty placeholder when it cannot be serialized. */
export function documentToJson(result: SerializeResult, indent = 2): string {
  if (!result.ok) return EMPTY_DOCUMENT_JSON;
  return JSON.stringify(result.document, null, indent);
}
