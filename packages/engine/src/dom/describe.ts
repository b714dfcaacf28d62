/**
 * Label lookup for affordances: what a person would read on or next to the
 * control.
 */
import { MAX_LABEL_LENGTH } from 'perception-shared';
import {
  isDenylisted,
  isDocument,
  isElement,
  isInput,
  isSelect,
  isShadowRoot,
  isText,
  isTextArea,
  inputType,
  styleOf,
  tagOf,
} from './guards';

/** Collapse whitespace the way normal flow renders it */
export function normalizeText(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

export function truncateLabel(label: string, max: number = MAX_LABEL_LENGTH): string {
  return label.length > max ? `${label.slice(0, max - 3)}...` : label;
}

function queryRoot(el: Element): Document | ShadowRoot {
  const root = el.getRootNode();
  if (isDocument(root) || isShadowRoot(root)) return root;
  return el.ownerDocument;
}

function isStyleHidden(el: Element): boolean {
  const style = styleOf(el);
  return style !== null && (style.display === 'none' || style.visibility === 'hidden');
}

/**
 * Text a reader sees inside `node`: script, style and SVG content and
 * subtrees hidden by display or visibility are left out.
 */
function renderedText(node: Node): string {
  if (isText(node)) return node.textContent ?? '';
  if (!isElement(node)) return '';
  if (isDenylisted(node) || isStyleHidden(node)) return '';
  let text = '';
  for (const child of node.childNodes) {
    text += renderedText(child);
  }
  return text;
}

/** Text of the element's own text-node children, ignoring `exclude` */
function directText(parent: Element, exclude?: Element): string {
  let text = '';
  for (const node of parent.childNodes) {
    if (node === exclude) continue;
    if (isText(node)) text += node.textContent ?? '';
  }
  return normalizeText(text);
}

function isFormField(el: Element): boolean {
  return isInput(el) || isSelect(el) || isTextArea(el);
}

/**
 * Accessible name, in accname order: aria-labelledby, aria-label, label
 * elements, placeholder, button value, own text, alt, title, name.
 */
export function accessibleLabel(el: Element): string {
  const root = queryRoot(el);

  const labelledBy = el.getAttribute('aria-labelledby');
  if (labelledBy) {
    const labels = labelledBy
      .split(/\s+/)
      .map((id) => normalizeText(root.getElementById(id)?.textContent))
      .filter(Boolean);
    if (labels.length) return labels.join(' ');
  }

  const ariaLabel = normalizeText(el.getAttribute('aria-label'));
  if (ariaLabel) return ariaLabel;

  if (isFormField(el)) {
    if (el.id) {
      const escapedId = el.id.replace(/["\\]/g, '\\$&');
      const label = root.querySelector(`label[for="${escapedId}"]`);
      const text = label ? normalizeText(renderedText(label)) : '';
      if (text) return text;
    }
    const parentLabel = el.closest('label');
    if (parentLabel) {
      const text = directText(parentLabel, el);
      if (text) return text;
    }
    const placeholder = normalizeText(el.getAttribute('placeholder'));
    if (placeholder) return placeholder;
    if (isInput(el) && ['submit', 'reset', 'button'].includes(inputType(el))) {
      const value = normalizeText(el.getAttribute('value'));
      if (value) return value;
    }
  } else {
    const text = normalizeText(renderedText(el));
    if (text) return text;
  }

  const alt = normalizeText(el.getAttribute('alt') ?? el.querySelector('img[alt]')?.getAttribute('alt'));
  if (alt) return alt;

  const title = normalizeText(el.getAttribute('title'));
  if (title) return title;

  return normalizeText(el.getAttribute('name'));
}

/** Closest visible wording around an unlabeled control */
export function nearbyText(el: Element): string {
  for (let sibling = el.previousSibling; sibling; sibling = sibling.previousSibling) {
    const text = normalizeText(renderedText(sibling));
    if (text) return text;
  }
  return el.parentElement && tagOf(el.parentElement) !== 'body' ? directText(el.parentElement, el) : '';
}
