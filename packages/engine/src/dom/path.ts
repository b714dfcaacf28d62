/**
 * Positional paths.
 *
 * A segment is the lower-case tag, suffixed with `[n]` when n - 1 same-tag
 * siblings precede the node. Only preceding siblings count, so appending a
 * same-tag sibling later in the document never changes an existing path:
 *
 *   <div><button/></div>             → div/button
 *   <div><button/><button/></div>    → div/button, div/button[2]
 *
 * Paths stop at the containing document or shadow root; scope keys chain
 * them across boundaries (`html/body/div#shadow/button`).
 */
import type { BoundaryKind } from 'perception-shared';
import { isText, tagOf } from './guards';

export function elementSegment(el: Element): string {
  const tag = tagOf(el);
  let index = 1;
  for (let sibling = el.previousElementSibling; sibling; sibling = sibling.previousElementSibling) {
    if (tagOf(sibling) === tag) index++;
  }
  return index > 1 ? `${tag}[${index}]` : tag;
}

export function textSegment(text: Text): string {
  let index = 1;
  for (let sibling = text.previousSibling; sibling; sibling = sibling.previousSibling) {
    if (isText(sibling)) index++;
  }
  return index > 1 ? `text()[${index}]` : 'text()';
}

export function joinPath(parent: string, segment: string): string {
  return parent ? `${parent}/${segment}` : segment;
}

/** Full path from the document or shadow root down to the element */
export function positionalPath(el: Element): string {
  const segments: string[] = [];
  for (let current: Element | null = el; current; current = current.parentElement) {
    segments.unshift(elementSegment(current));
  }
  return segments.join('/');
}

/** Qualify a local path with the scope of its boundary host */
export function scopeKey(scope: string, path: string): string {
  return scope ? `${scope}/${path}` : path;
}

export function boundaryScope(hostKey: string, kind: BoundaryKind): string {
  return `${hostKey}#${kind}`;
}
