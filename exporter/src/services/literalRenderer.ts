/**
 * Canonical rendering of default-value literals.
 *
 * Asset sources may carry defaults as typed JSON values; the exported
 * document always carries the string form produced here, so the same
 * source renders identically on every host.
 *
 *   bool                  true | false
 *   int, int64, byte      integer, truncated toward zero
 *   real, float, double   six decimals
 *   struct                (Key=value,...) in key order
 *   array                 (elem,elem,...) using the element type
 *   string values         passed through unchanged
 */

import type { TypeDescriptor } from '../models/scriptAsset.js';

export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | LiteralValue[]
  | { [key: string]: LiteralValue };

const INTEGER_CATEGORIES = new Set(['int', 'int64', 'byte']);
const REAL_CATEGORIES = new Set(['real', 'float', 'double']);

function renderNumber(category: string, value: number): string {
  if (INTEGER_CATEGORIES.has(category)) return String(Math.trunc(value));
  if (REAL_CATEGORIES.has(category)) return value.toFixed(6);
  return String(value);
}

/** Struct members have no declared type of their own; numbers use the real form. */
function renderMember(value: LiteralValue): string {
  if (value === null) return '';
  if (typeof value === 'number') return value.toFixed(6);
  if (typeof value === 'boolean' || typeof value === 'string') return String(value);
  if (Array.isArray(value)) return `(${value.map(renderMember).join(',')})`;
  return renderStruct(value);
}

function renderStruct(value: { [key: string]: LiteralValue }): string {
  const members = Object.entries(value).map(([key, member]) => `${key}=${renderMember(member)}`);
  return `(${members.join(',')})`;
}

function renderScalar(category: string, value: LiteralValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return renderNumber(category, value);
  if (Array.isArray(value)) return `(${value.map((v) => renderScalar(category, v)).join(',')})`;
  return renderStruct(value);
}

/** Render a raw default value for a port or variable of the given type. */
export function renderLiteral(type: TypeDescriptor, value: LiteralValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  const category = type.category.toLowerCase();
  if (Array.isArray(value)) {
    return `(${value.map((element) => renderScalar(category, element)).join(',')})`;
  }
  return renderScalar(category, value);
}
