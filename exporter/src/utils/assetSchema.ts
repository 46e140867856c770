/** Zod schema for asset source files. */

import { z } from 'zod';
import type { LiteralValue } from '../services/literalRenderer.js';

const LiteralValueSchema: z.ZodType<LiteralValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(LiteralValueSchema),
    z.record(z.string(), LiteralValueSchema),
  ]),
);

const TypeDescriptorSchema = z.object({
  category: z.string().max(100),
  sub_category_object: z.string().max(500).optional(),
  is_array: z.boolean().default(false),
}).strict();

const LinkSchema = z.object({
  node: z.string().min(1).max(500),
  pin: z.string().min(1).max(500),
}).strict();

const PinSchema = z.object({
  id: z.string().min(1).max(500),
  display_name: z.string().max(500).optional(),
  direction: z.enum(['input', 'output']),
  type: TypeDescriptorSchema,
  default_value: LiteralValueSchema.optional(),
  default_object: z.string().max(1000).optional(),
  links: z.array(LinkSchema).default([]),
}).strict();

const NodeSchema = z.object({
  id: z.string().min(1).max(500),
  class: z.string().min(1).max(200),
  lineage: z.array(z.string().max(200)).default([]),
  title: z.string().max(2000).default(''),
  menu_category: z.string().max(500).optional(),
  position: z.object({ x: z.number(), y: z.number() }).strict().default({ x: 0, y: 0 }),
  function_reference: z.object({
    member_name: z.string().max(500),
    member_parent: z.string().max(1000).optional(),
  }).strict().optional(),
  pins: z.array(PinSchema).default([]),
}).strict();

const GraphSchema = z.object({
  name: z.string().min(1).max(500),
  nodes: z.array(NodeSchema).default([]),
}).strict();

const VariableSchema = z.object({
  name: z.string().min(1).max(500),
  type: TypeDescriptorSchema,
  category: z.string().max(500).default(''),
  is_exposed: z.boolean().default(false),
  default_value: LiteralValueSchema.optional(),
}).strict();

const ComponentSchema = z.object({
  name: z.string().min(1).max(500),
  template_class: z.string().max(500).optional(),
}).strict();

export const AssetSourceSchema = z.object({
  asset_class: z.string().min(1).max(200),
  name: z.string().min(1).max(500),
  path: z.string().min(1).max(1000),
  parent_class: z.string().max(500).optional(),
  generated_class: z.string().max(500).optional(),
  graphs: z.array(GraphSchema).default([]),
  function_graphs: z.array(GraphSchema).default([]),
  variables: z.array(VariableSchema).default([]),
  components: z.array(ComponentSchema).default([]),
}).strict();

/** Inferred TypeScript type from the asset source Zod schema. */
export type AssetSource = z.infer<typeof AssetSourceSchema>;
export type GraphSource = z.infer<typeof GraphSchema>;
export type TypeDescriptorSource = z.infer<typeof TypeDescriptorSchema>;

/** Format Zod issues as `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
