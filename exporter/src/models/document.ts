/** Exported document shapes. Field names are the downstream wire contract. */

export interface PinRecord {
  name: string;
  display_name: string;
  direction: 'input' | 'output';
  type: string;
  default_value?: string;
}

export interface NodeRecord {
  id: string;
  type: string;
  title: string;
  category: string;
  position: { x: number; y: number };
  pins: PinRecord[];
  connections: string[];
}

export interface GraphRecord {
  name: string;
  nodes: NodeRecord[];
}

export interface VariableRecord {
  name: string;
  type: string;
  category: string;
  is_exposed: boolean;
  default_value?: string;
}

export interface ParameterRecord {
  name: string;
  type: string;
}

export interface FunctionRecord {
  name: string;
  parameters: ParameterRecord[];
  graph: GraphRecord;
}

export interface ComponentRecord {
  name: string;
  class: string;
}

export interface AssetDocument {
  name: string;
  path: string;
  class_type: 'Blueprint';
  parent_class?: string;
  generated_class?: string;
  graphs: GraphRecord[];
  variables: VariableRecord[];
  functions: FunctionRecord[];
  components: ComponentRecord[];
  dependencies: string[];
}
