/**
 * Geometry and visibility checks for a single node.
 *
 * Hit testing is best effort: when the runtime has no elementFromPoint, or
 * the query throws or lands outside the rendering surface, the element is
 * reported as topmost.
 */
import { UNBOUNDED_VIEWPORT } from 'perception-shared';
import type { Geometry, Point } from 'perception-shared';
import {
  isContentEditable,
  isShadowRoot,
  styleOf,
  tagOf,
} from './guards';

/** Rendering context threaded through the walk */
export interface OracleContext {
  /** Enclosing frame element, null in the top-level document */
  frame: Element | null;
  /** Offset of the enclosing frame's viewport within the top-level viewport */
  frameOffset: Point;
  viewportExpansion: number;
}

/** Non-zero box, not visibility:hidden, not display:none */
export function isVisible(el: Element): boolean {
  const rect = el.getBoundingClientRect();
  if (rect.width <= 0 || rect.height <= 0) return false;
  const style = styleOf(el);
  if (!style) return true;
  return style.visibility !== 'hidden' && style.display !== 'none';
}

/** Whether the element is the front-most hit at its own center */
export function isTopmost(el: Element, context: OracleContext): boolean {
  // Cross-frame point queries are not attempted
  if (context.frame) return true;

  const root = el.getRootNode();
  if (isShadowRoot(root)) {
    return hitTest(root, el, root);
  }

  if (context.viewportExpansion === UNBOUNDED_VIEWPORT) return true;

  const view = el.ownerDocument.defaultView;
  if (!view) return true;

  const rect = el.getBoundingClientRect();
  const margin = context.viewportExpansion;
  const top = rect.top + view.scrollY;
  const bottom = rect.bottom + view.scrollY;
  const left = rect.left + view.scrollX;
  const right = rect.right + view.scrollX;

  const outside =
    bottom < view.scrollY - margin ||
    top > view.scrollY + view.innerHeight + margin ||
    right < view.scrollX - margin ||
    left > view.scrollX + view.innerWidth + margin;
  if (outside) return false;

  return hitTest(el.ownerDocument, el, null);
}

function hitTest(surface: Document | ShadowRoot, el: Element, boundary: Node | null): boolean {
  if (typeof surface.elementFromPoint !== 'function') return true;

  const rect = el.getBoundingClientRect();
  const x = rect.left + rect.width / 2;
  const y = rect.top + rect.height / 2;

  let hit: Element | null;
  try {
    hit = surface.elementFromPoint(x, y);
  } catch {
    return true;
  }
  if (!hit) return true;

  let current: Element | null = hit;
  while (current && current !== boundary) {
    if (current === el) return true;
    current = current.parentElement;
  }
  return false;
}

/** Whether the element currently accepts user edits */
export function isEditable(el: Element): boolean {
  if (el.hasAttribute('disabled') || el.matches(':disabled')) return false;
  if (el.getAttribute('aria-disabled') === 'true') return false;

  const readonly = el.hasAttribute('readonly') || el.getAttribute('aria-readonly') === 'true';
  const tag = tagOf(el);
  if (tag === 'select' || tag === 'input' || tag === 'textarea') return !readonly;
  if (isContentEditable(el)) return !readonly;
  return false;
}

/**
 * Lightweight probe for text nodes: non-empty box, top inside the expanded
 * viewport, no hidden ancestor.
 */
export function isTextVisible(text: Text, context: OracleContext): boolean {
  const parent = text.parentElement ?? (isShadowRoot(text.parentNode) ? text.parentNode.host : null);
  if (!parent) return false;

  const rect = textRect(text) ?? parent.getBoundingClientRect();
  if (rect.width <= 0 || rect.height <= 0) return false;

  if (context.viewportExpansion !== UNBOUNDED_VIEWPORT) {
    const view = text.ownerDocument.defaultView;
    const margin = context.viewportExpansion;
    if (view && (rect.top < -margin || rect.top > view.innerHeight + margin)) return false;
  }

  return isAncestorChainVisible(parent);
}

/** Selection box of a text node, or null where Range geometry is unavailable */
function textRect(text: Text): DOMRect | null {
  const range = text.ownerDocument.createRange();
  if (typeof range.getBoundingClientRect !== 'function') return null;
  range.selectNodeContents(text);
  return range.getBoundingClientRect();
}

function isAncestorChainVisible(el: Element): boolean {
  if (styleOf(el)?.visibility === 'hidden') return false;
  let current: Element | null = el;
  while (current) {
    if (styleOf(current)?.display === 'none') return false;
    current = current.parentElement;
  }
  return true;
}

/** Capture the element box in top-level viewport coordinates */
export function captureGeometry(el: Element, context: OracleContext): Geometry {
  const rect = el.getBoundingClientRect();
  const view = el.ownerDocument.defaultView;
  return {
    rect: {
      x: rect.left + context.frameOffset.x,
      y: rect.top + context.frameOffset.y,
      width: rect.width,
      height: rect.height,
    },
    frameOffset: { ...context.frameOffset },
    scroll: { x: view?.scrollX ?? 0, y: view?.scrollY ?? 0 },
  };
}
