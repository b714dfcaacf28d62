/**
 * Snapshot walker.
 *
 * Walks the page tree in document order, across open shadow roots and
 * same-origin frames, and produces an annotated SnapshotNode mirror. Every
 * element that is interactive, visible and topmost takes the next highlight
 * index from a counter created for this walk alone.
 */
import { PerceptionError } from 'perception-shared';
import type { BoundaryKind, ElementSnapshotNode, SnapshotNode } from 'perception-shared';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { isInteractive } from './classifier';
import {
  isDenylisted,
  isDocument,
  isElement,
  isFrameElement,
  isText,
  tagOf,
} from './guards';
import { captureGeometry, isEditable, isTextVisible, isTopmost, isVisible } from './oracle';
import type { OracleContext } from './oracle';
import { boundaryScope, elementSegment, joinPath, positionalPath, scopeKey, textSegment } from './path';

export interface WalkOptions {
  highlight: boolean;
  focusHighlightIndex?: number;
  viewportExpansion: number;
  highlightFromIndex: number;
  logger?: Logger;
}

/** A highlighted element with the data identity assignment needs */
export interface HighlightedEntry {
  node: ElementSnapshotNode;
  element: Element;
  /** Scope-qualified positional path */
  key: string;
  highlightIndex: number;
}

export interface WalkResult {
  root: ElementSnapshotNode;
  /** Highlighted entries in traversal order */
  highlighted: HighlightedEntry[];
  nextHighlightIndex: number;
}

interface WalkContext extends OracleContext {
  scope: string;
  parentPath: string;
}

interface WalkState {
  counter: { next(): number; peek(): number };
  highlighted: HighlightedEntry[];
  options: WalkOptions;
  log: Logger;
}

/** Sequential highlight indices starting at `start` */
export function createHighlightCounter(start: number = 0): { next(): number; peek(): number } {
  let value = start;
  return {
    next() {
      return value++;
    },
    peek() {
      return value;
    },
  };
}

/** Walk `root` (a Document walks its body) and annotate every node */
export function walk(root: Document | Element, options: WalkOptions): WalkResult {
  const start = isDocument(root) ? (root.body ?? root.documentElement) : root;
  if (!start) {
    throw new PerceptionError('NO_ROOT', 'Document has neither a body nor a root element');
  }

  const state: WalkState = {
    counter: createHighlightCounter(options.highlightFromIndex),
    highlighted: [],
    options,
    log: options.logger ?? createLogger('walker'),
  };

  const context: WalkContext = {
    frame: null,
    frameOffset: { x: 0, y: 0 },
    viewportExpansion: options.viewportExpansion,
    scope: '',
    parentPath: start.parentElement ? positionalPath(start.parentElement) : '',
  };

  const tree = annotateElement(start, context, state);
  return {
    root: tree,
    highlighted: state.highlighted,
    nextHighlightIndex: state.counter.peek(),
  };
}

function walkNode(node: Node, context: WalkContext, state: WalkState): SnapshotNode[] {
  if (isText(node)) {
    const text = (node.textContent ?? '').trim();
    if (!text || !isTextVisible(node, context)) return [];
    return [{ kind: 'text', text, path: joinPath(context.parentPath, textSegment(node)) }];
  }

  if (!isElement(node)) return [];

  if (isDenylisted(node)) {
    // Excluded from output; element children are hoisted with their real paths
    const path = joinPath(context.parentPath, elementSegment(node));
    return walkChildren(node, { ...context, parentPath: path }, state, true);
  }

  return [annotateElement(node, context, state)];
}

function walkChildren(
  parent: Node,
  context: WalkContext,
  state: WalkState,
  elementsOnly = false
): SnapshotNode[] {
  const children: SnapshotNode[] = [];
  for (const child of parent.childNodes) {
    if (elementsOnly && !isElement(child)) continue;
    children.push(...walkNode(child, context, state));
  }
  return children;
}

function annotateElement(el: Element, context: WalkContext, state: WalkState): ElementSnapshotNode {
  const path = joinPath(context.parentPath, elementSegment(el));
  const key = scopeKey(context.scope, path);
  const visible = isVisible(el);

  const node: ElementSnapshotNode = {
    kind: 'element',
    tag: tagOf(el),
    attributes: copyAttributes(el),
    path,
    children: [],
    isInteractive: isInteractive(el),
    isVisible: visible,
    isTopmost: visible && isTopmost(el, context),
    isEditable: isEditable(el),
  };

  // Indices are taken before descending so they follow pre-order
  if (node.isInteractive && node.isVisible && node.isTopmost) {
    const index = state.counter.next();
    node.highlightIndex = index;
    const { highlight, focusHighlightIndex } = state.options;
    if (highlight && (focusHighlightIndex === undefined || focusHighlightIndex === index)) {
      node.geometry = captureGeometry(el, context);
    }
    state.highlighted.push({ node, element: el, key, highlightIndex: index });
  }

  node.children = walkChildren(el, { ...context, parentPath: path }, state);

  if (el.shadowRoot) {
    const shadowContext: WalkContext = {
      ...context,
      scope: boundaryScope(key, 'shadow'),
      parentPath: '',
    };
    node.children.push(...markBoundary(walkChildren(el.shadowRoot, shadowContext, state), 'shadow'));
  }

  if (isFrameElement(el)) {
    node.children.push(...markBoundary(walkFrame(el, context, key, state), 'frame'));
  }

  return node;
}

function walkFrame(
  frame: HTMLIFrameElement | HTMLFrameElement,
  context: WalkContext,
  key: string,
  state: WalkState
): SnapshotNode[] {
  const body = frameBody(frame, state.log);
  if (!body) return [];

  const rect = frame.getBoundingClientRect();
  const frameContext: WalkContext = {
    frame,
    frameOffset: { x: context.frameOffset.x + rect.left, y: context.frameOffset.y + rect.top },
    viewportExpansion: context.viewportExpansion,
    scope: boundaryScope(key, 'frame'),
    parentPath: body.parentElement ? positionalPath(body.parentElement) : '',
  };
  return [annotateElement(body, frameContext, state)];
}

/** Body of a frame's document, or null when it cannot be reached */
function frameBody(frame: HTMLIFrameElement | HTMLFrameElement, log: Logger): HTMLElement | null {
  const source = frame.getAttribute('src') ?? 'about:blank';
  try {
    const body = frame.contentDocument?.body ?? null;
    if (!body) log.debug(`Frame ${source} has no reachable body`);
    return body;
  } catch (err) {
    log.debug(`Frame ${source} is not accessible:`, err);
    return null;
  }
}

function markBoundary(nodes: SnapshotNode[], boundary: BoundaryKind): SnapshotNode[] {
  for (const node of nodes) {
    node.boundary = boundary;
  }
  return nodes;
}

function copyAttributes(el: Element): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const attr of el.attributes) {
    attributes[attr.name] = attr.value;
  }
  return attributes;
}
