/**
 * Node type guards that work across frame realms.
 *
 * `instanceof HTMLElement` fails for nodes owned by another window, so every
 * check here goes through nodeType and tag names instead.
 */

import { DENYLISTED_TAGS } from 'perception-shared';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const DOCUMENT_NODE = 9;
const DOCUMENT_FRAGMENT_NODE = 11;

const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

export function isDocument(node: Node): node is Document {
  return node.nodeType === DOCUMENT_NODE;
}

export function isShadowRoot(node: Node | null): node is ShadowRoot {
  return node !== null && node.nodeType === DOCUMENT_FRAGMENT_NODE && 'host' in node;
}

/** Lower-case tag name */
export function tagOf(el: Element): string {
  return el.tagName.toLowerCase();
}

/** SVG content and non-rendered tags such as script and style */
export function isDenylisted(el: Element): boolean {
  return el.namespaceURI === SVG_NAMESPACE || DENYLISTED_TAGS.has(tagOf(el));
}

export function isSelect(el: Element): el is HTMLSelectElement {
  return tagOf(el) === 'select';
}

export function isInput(el: Element): el is HTMLInputElement {
  return tagOf(el) === 'input';
}

export function isTextArea(el: Element): el is HTMLTextAreaElement {
  return tagOf(el) === 'textarea';
}

export function isFrameElement(el: Element): el is HTMLIFrameElement | HTMLFrameElement {
  const tag = tagOf(el);
  return tag === 'iframe' || tag === 'frame';
}

/** Lower-case `type` attribute of an input, defaulting to text */
export function inputType(el: Element): string {
  return (el.getAttribute('type') ?? 'text').trim().toLowerCase() || 'text';
}

/** Explicit role from `role` or `aria-role`, lower-cased */
export function roleOf(el: Element): string {
  const role = el.getAttribute('role') ?? el.getAttribute('aria-role');
  return role ? role.trim().toLowerCase() : '';
}

/** Truthy contenteditable: "", "true" or "plaintext-only" */
export function isContentEditable(el: Element): boolean {
  const value = el.getAttribute('contenteditable');
  if (value === null) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '' || normalized === 'true' || normalized === 'plaintext-only';
}

/** Computed style through the element's own window, or null without one */
export function styleOf(el: Element): CSSStyleDeclaration | null {
  const view = el.ownerDocument.defaultView;
  return view ? view.getComputedStyle(el) : null;
}
