/**
 * Formats an annotated SnapshotNode tree into indented text for diagnostics.
 */
import type { SnapshotNode } from './types/snapshot.js';

export interface FormatSnapshotOptions {
  /** Keep only highlighted nodes, their ancestors and the text beneath them */
  interactiveOnly?: boolean;
}

/** Format a snapshot tree into compact text */
export function formatSnapshot(
  node: SnapshotNode,
  options: FormatSnapshotOptions = {},
  indent: number = 0
): string {
  const root = options.interactiveOnly ? pruneNonInteractive(node) : node;
  if (!root) return '';
  const lines: string[] = [];
  formatNode(root, indent, lines);
  return lines.join('\n');
}

function formatNode(node: SnapshotNode, indent: number, lines: string[]): void {
  const pad = '  '.repeat(indent);

  if (node.kind === 'text') {
    lines.push(`${pad}"${node.text}"`);
    return;
  }

  let line = pad;
  if (node.highlightIndex !== undefined) {
    line += `[${node.highlightIndex}] `;
  }
  line += `<${node.tag}`;
  const id = node.attributes.id;
  if (id) {
    line += ` id="${id}"`;
  }
  line += '>';

  if (node.boundary) {
    line += ` (${node.boundary})`;
  }

  if (!node.isVisible) {
    line += ' (hidden)';
  }

  lines.push(line);

  for (const child of node.children) {
    formatNode(child, indent + 1, lines);
  }
}

function hasHighlight(node: SnapshotNode): boolean {
  return node.kind === 'element' && node.highlightIndex !== undefined;
}

/**
 * Prune a snapshot tree to highlighted nodes and the elements leading to
 * them. Text directly under a highlighted node is kept as its label.
 */
function pruneNonInteractive(node: SnapshotNode): SnapshotNode | null {
  if (node.kind === 'text') return null;

  const kept: SnapshotNode[] = [];
  for (const child of node.children) {
    if (child.kind === 'text') {
      if (hasHighlight(node)) kept.push(child);
      continue;
    }
    const pruned = pruneNonInteractive(child);
    if (pruned) kept.push(pruned);
  }

  if (kept.length === 0 && !hasHighlight(node)) return null;
  return { ...node, children: kept };
}
