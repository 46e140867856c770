/** Script asset data model: read-only arena views over one visual-programming asset. */

export type PortDirection = 'input' | 'output';

export interface TypeDescriptor {
  /** Base category, e.g. `exec`, `bool`, `object`, `struct`. */
  category: string;
  /** Referenced type name for object/struct-typed values. */
  subCategoryObject?: string;
  isArray: boolean;
}

export interface NodePosition {
  x: number;
  y: number;
}

export interface FunctionReference {
  memberName: string;
  /** Path of the type that owns the referenced function. */
  memberParent?: string;
}

export interface GraphNode {
  id: string;
  /** Concrete type name of the node. */
  className: string;
  /** Ancestor type names, most derived first. Does not repeat `className`. */
  lineage: string[];
  title: string;
  /** Present only for nodes that declare a menu category. */
  menuCategory?: string;
  position: NodePosition;
  /** Indices into the owning graph's `ports`, in node order. */
  ports: number[];
  functionReference?: FunctionReference;
}

export interface GraphPort {
  id: string;
  displayName: string;
  direction: PortDirection;
  type: TypeDescriptor;
  /** Rendered default literal. Empty when the port is wired or uses the engine default. */
  defaultValue: string;
  /** Path of a default object reference, for object-typed ports. */
  defaultObject?: string;
  /** Index of the owning node in the graph's `nodes`. */
  owner: number;
}

/** A directed link between two port indices of the same graph. */
export interface Wire {
  source: number;
  target: number;
}

export interface ScriptGraph {
  name: string;
  nodes: GraphNode[];
  ports: GraphPort[];
  wires: Wire[];
}

export interface VariableDeclaration {
  name: string;
  type: TypeDescriptor;
  category: string;
  isExposed: boolean;
  defaultValue: string;
}

export interface ComponentDeclaration {
  name: string;
  /** Concrete implementing type of the component template, when one exists. */
  templateClass?: string;
}

export interface ScriptAsset {
  /** Kind declared by the asset source. Only script assets can be encoded. */
  assetClass: string;
  name: string;
  path: string;
  parentClass?: string;
  generatedClass?: string;
  graphs: ScriptGraph[];
  functionGraphs: ScriptGraph[];
  variables: VariableDeclaration[];
  components: ComponentDeclaration[];
}

/** Closed node taxonomy. `Other` keeps the concrete type name. */
export type NodeKind =
  | { tag: 'Event' }
  | { tag: 'FunctionEntry' }
  | { tag: 'CallExternalFunction' }
  | { tag: 'VariableRead' }
  | { tag: 'VariableWrite' }
  | { tag: 'Other'; className: string };

export type NodeKindTag = NodeKind['tag'];
