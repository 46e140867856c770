import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { GraphNode, GraphPort, ScriptAsset } from '../models/scriptAsset.js';
import { parseAssetSource } from '../services/assetLoader.js';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

/** Raw JSON of a fixture asset source. */
export function fixtureSource(name: string): Record<string, unknown> {
  return JSON.parse(fs.readFileSync(fixturePath(name), 'utf-8'));
}

export function loadFixture(name: string): ScriptAsset {
  return parseAssetSource(fixtureSource(name), name);
}

export function makeNode(id: string, className: string, ports: number[], extra: Partial<GraphNode> = {}): GraphNode {
  return {
    id,
    className,
    lineage: [],
    title: id,
    position: { x: 0, y: 0 },
    ports,
    ...extra,
  };
}

export function makePort(
  id: string,
  direction: GraphPort['direction'],
  owner: number,
  category = 'exec',
  extra: Partial<GraphPort> = {},
): GraphPort {
  return {
    id,
    displayName: id,
    direction,
    type: { category, isArray: false },
    defaultValue: '',
    owner,
    ...extra,
  };
}
