/** Zod schema for reading exported documents back from disk. */

import { z } from 'zod';

const PinRecordSchema = z.object({
  name: z.string(),
  display_name: z.string().default(''),
  direction: z.enum(['input', 'output']),
  type: z.string(),
  default_value: z.string().optional(),
});

const NodeRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  title: z.string().default(''),
  category: z.string().default(''),
  position: z.object({ x: z.number(), y: z.number() }).default({ x: 0, y: 0 }),
  pins: z.array(PinRecordSchema).default([]),
  connections: z.array(z.string()).default([]),
});

const GraphRecordSchema = z.object({
  name: z.string(),
  nodes: z.array(NodeRecordSchema).default([]),
});

export const AssetDocumentSchema = z.object({
  name: z.string(),
  path: z.string(),
  class_type: z.literal('Blueprint'),
  parent_class: z.string().optional(),
  generated_class: z.string().optional(),
  graphs: z.array(GraphRecordSchema).default([]),
  variables: z.array(z.object({
    name: z.string(),
    type: z.string(),
    category: z.string().default(''),
    is_exposed: z.boolean().default(false),
    default_value: z.string().optional(),
  })).default([]),
  functions: z.array(z.object({
    name: z.string(),
    parameters: z.array(z.object({ name: z.string(), type: z.string() })).default([]),
    graph: GraphRecordSchema,
  })).default([]),
  components: z.array(z.object({ name: z.string(), class: z.string() })).default([]),
  dependencies: z.array(z.string()).default([]),
});
