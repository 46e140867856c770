/** Human-readable markdown pages for exported documents, plus the index page. */

import type { AssetDocument, GraphRecord, NodeRecord, PinRecord } from '../models/document.js';
import {
  EXEC_CATEGORY,
  EXECUTION_CHAIN_STEP_LIMIT,
  MARKDOWN_DEPENDENCY_LIMIT,
  MARKDOWN_FUNCTION_CALL_LIMIT,
} from '../utils/constants.js';

function oneLine(text: string, separator = ' → '): string {
  return text.replace(/\r?\n/g, separator);
}

function escapeCell(text: string): string {
  return oneLine(text, ' ').replace(/\|/g, '\\|');
}

function pinLabel(pin: PinRecord): string {
  return pin.display_name || pin.name;
}

function dataPins(node: NodeRecord, direction: PinRecord['direction']): PinRecord[] {
  return node.pins.filter((p) => p.direction === direction && p.type !== EXEC_CATEGORY);
}

function withDefault(text: string, pin: PinRecord): string {
  return pin.default_value ? `${text} = \`${pin.default_value}\`` : text;
}

/** Follow each node's first known connection from an event node. */
function renderExecutionChain(start: NodeRecord, lookup: Map<string, NodeRecord>): string[] {
  const lines = [`**${oneLine(start.title)}**`, ''];
  const visited = new Set<string>();
  let current: NodeRecord | undefined = start;
  let step = 1;

  while (current && !visited.has(current.id)) {
    visited.add(current.id);
    lines.push(`${step}. **${oneLine(current.title)}** \`[${current.type}]\``);

    const inputs = dataPins(current, 'input');
    if (inputs.length > 0) {
      lines.push('   - Inputs:');
      for (const pin of inputs) {
        lines.push(withDefault(`     - ${pinLabel(pin)}: \`${pin.type}\``, pin));
      }
    }
    const outputs = dataPins(current, 'output');
    if (outputs.length > 0) {
      lines.push('   - Outputs:');
      for (const pin of outputs) {
        lines.push(`     - ${pinLabel(pin)}: \`${pin.type}\``);
      }
    }
    lines.push('');

    const nextId: string | undefined = current.connections.find((id) => lookup.has(id));
    current = nextId === undefined ? undefined : lookup.get(nextId);
    step++;

    if (step > EXECUTION_CHAIN_STEP_LIMIT) {
      lines.push('   _(Execution chain continues...)_', '');
      break;
    }
  }
  return lines;
}

function renderFunctionCall(node: NodeRecord): string[] {
  const lines = [node.category ? `- **${oneLine(node.title)}** _${node.category}_` : `- **${oneLine(node.title)}**`];
  const inputs = dataPins(node, 'input');
  if (inputs.length > 0) {
    lines.push('  - Parameters:');
    for (const pin of inputs) {
      lines.push(withDefault(`    - \`${pinLabel(pin)}\`: ${pin.type}`, pin));
    }
  }
  const outputs = dataPins(node, 'output');
  if (outputs.length > 0) {
    lines.push('  - Returns:');
    for (const pin of outputs) {
      lines.push(`    - \`${pinLabel(pin)}\`: ${pin.type}`);
    }
  }
  return lines;
}

function renderNodeDetail(node: NodeRecord, index: number): string[] {
  const lines = [
    `**Node ${index}: ${oneLine(node.title)}**`,
    `- Type: \`${node.type}\``,
  ];
  if (node.category) lines.push(`- Category: \`${node.category}\``);
  lines.push(`- ID: \`${node.id}\``);
  lines.push(`- Position: (${node.position.x}, ${node.position.y})`);
  if (node.pins.length > 0) {
    lines.push('- Pins:');
    for (const pin of node.pins) {
      lines.push(withDefault(`  - [${pin.direction}] \`${pinLabel(pin)}\`: ${pin.type}`, pin));
    }
  }
  if (node.connections.length > 0) {
    lines.push(`- Connected to: ${node.connections.map((c) => `\`${c}\``).join(', ')}`);
  }
  lines.push('');
  return lines;
}

/** Execution flow, function calls, variable usage and per-node detail for one graph. */
export function renderGraphDetail(graph: GraphRecord): string[] {
  const nodes = graph.nodes;
  const lookup = new Map(nodes.map((n) => [n.id, n] as const));
  const events = nodes.filter((n) => n.type === 'Event');
  const calls = nodes.filter((n) => n.type === 'CallExternalFunction');
  const variables = nodes.filter((n) => n.type === 'VariableRead' || n.type === 'VariableWrite');
  const lines: string[] = [];

  if (events.length > 0) {
    lines.push('#### Execution Flow', '');
    for (const event of events) {
      lines.push(...renderExecutionChain(event, lookup));
    }
  }

  if (calls.length > 0) {
    lines.push('#### Function Calls', '');
    for (const call of calls.slice(0, MARKDOWN_FUNCTION_CALL_LIMIT)) {
      lines.push(...renderFunctionCall(call), '');
    }
    if (calls.length > MARKDOWN_FUNCTION_CALL_LIMIT) {
      lines.push(`_...and ${calls.length - MARKDOWN_FUNCTION_CALL_LIMIT} more_`, '');
    }
  }

  if (variables.length > 0) {
    lines.push('#### Variables Used', '');
    for (const variable of variables) {
      lines.push(`- **${oneLine(variable.title, ' ')}** (${variable.type})`);
    }
    lines.push('');
  }

  lines.push('#### All Nodes (Detailed)', '');
  nodes.forEach((node, i) => lines.push(...renderNodeDetail(node, i + 1)));
  return lines;
}

export function renderAssetMarkdown(document: AssetDocument): string {
  const lines = [
    `# ${document.name}`,
    '',
    `**Type:** ${document.class_type}`,
    `**Path:** \`${document.path}\``,
    `**Parent Class:** ${document.parent_class ?? 'None'}`,
    `**Generated Class:** ${document.generated_class ?? 'None'}`,
    '',
  ];

  if (document.components.length > 0) {
    lines.push('## Components', '');
    for (const component of document.components) {
      lines.push(`- **${component.name}** (${component.class})`);
    }
    lines.push('');
  }

  if (document.variables.length > 0) {
    lines.push('## Variables', '');
    lines.push('| Name | Type | Category | Exposed | Default |');
    lines.push('|------|------|----------|---------|---------|');
    for (const v of document.variables) {
      const cells = [v.name, v.type, v.category, String(v.is_exposed), v.default_value ?? ''].map(escapeCell);
      lines.push(`| ${cells.join(' | ')} |`);
    }
    lines.push('');
  }

  if (document.functions.length > 0) {
    lines.push('## Functions', '');
    for (const fn of document.functions) {
      const params = fn.parameters.map((p) => `${p.name}: ${p.type}`).join(', ');
      lines.push(`### ${fn.name}(${params})`, '');
    }
  }

  if (document.graphs.length > 0) {
    lines.push('## Graphs & Node Logic', '');
    for (const graph of document.graphs) {
      lines.push(`### ${graph.name}`, '', `**Total Nodes:** ${graph.nodes.length}`, '');
      if (graph.nodes.length > 0) {
        lines.push(...renderGraphDetail(graph));
      }
    }
  }

  if (document.dependencies.length > 0) {
    lines.push('## Dependencies', '');
    for (const dep of document.dependencies.slice(0, MARKDOWN_DEPENDENCY_LIMIT)) {
      lines.push(`- \`${dep}\``);
    }
    if (document.dependencies.length > MARKDOWN_DEPENDENCY_LIMIT) {
      lines.push('', `_...and ${document.dependencies.length - MARKDOWN_DEPENDENCY_LIMIT} more_`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Index of exported pages. `pages` are paths relative to the output directory,
 * with forward slashes; pages in sub-directories are grouped under their first segment.
 */
export function renderIndexMarkdown(pages: readonly string[], updatedAt: string): string {
  const sorted = [...pages].sort();
  const lines = [
    '# Asset Index',
    '',
    `**Total Assets:** ${sorted.length}`,
    `**Last Updated:** ${updatedAt}`,
    '',
    '## All Assets',
    '',
  ];

  let currentGroup: string | null = null;
  for (const page of sorted) {
    const parts = page.split('/');
    const group = parts.length > 1 ? parts[0] : null;
    if (group !== null && group !== currentGroup) {
      currentGroup = group;
      lines.push('', `### ${group}`, '');
    }
    const fileName = parts[parts.length - 1] ?? page;
    lines.push(`- [${fileName.replace(/\.md$/, '')}](${page})`);
  }
  lines.push('');
  return lines.join('\n');
}
