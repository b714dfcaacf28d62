/**
 * Decides whether an element is an affordance. Any single signal suffices.
 */
import {
  ARIA_STATE_ATTRIBUTES,
  CLICK_EVENT_TYPES,
  CLICK_HANDLER_ATTRIBUTES,
  DROPDOWN_MARKERS,
  INTERACTIVE_CURSORS,
  INTERACTIVE_ROLES,
  INTERACTIVE_TAGS,
  NON_INTERACTIVE_CURSORS,
} from 'perception-shared';
import { roleOf, styleOf, tagOf } from './guards';

export function isInteractive(el: Element): boolean {
  return (
    hasInteractiveCursor(el) ||
    INTERACTIVE_TAGS.has(tagOf(el)) ||
    hasInteractiveRole(el) ||
    hasClickHandler(el) ||
    hasAriaState(el) ||
    el.getAttribute('draggable') === 'true'
  );
}

export function hasInteractiveCursor(el: Element): boolean {
  if (tagOf(el) === 'html') return false;
  const cursor = styleOf(el)?.cursor;
  if (!cursor || NON_INTERACTIVE_CURSORS.has(cursor)) return false;
  return INTERACTIVE_CURSORS.has(cursor);
}

/** ARIA role, focusable tabindex, or a dropdown library marker */
export function hasInteractiveRole(el: Element): boolean {
  const role = roleOf(el);
  if (role && INTERACTIVE_ROLES.has(role)) return true;

  const tabindex = el.getAttribute('tabindex');
  if (tabindex !== null && /^-?\d+$/.test(tabindex.trim()) && parseInt(tabindex, 10) >= 0) {
    return true;
  }

  for (const [attribute, values] of Object.entries(DROPDOWN_MARKERS)) {
    const value = el.getAttribute(attribute);
    if (value !== null && values.includes(value)) return true;
  }
  return false;
}

export function hasClickHandler(el: Element): boolean {
  if (CLICK_HANDLER_ATTRIBUTES.some((attribute) => el.hasAttribute(attribute))) return true;
  return hasClickListener(el);
}

/**
 * Listener introspection through `getEventListeners` where the runtime
 * exposes it (DevTools console, CDP-evaluated scripts); otherwise the legacy
 * `on<event>` properties.
 */
function hasClickListener(el: Element): boolean {
  const view = el.ownerDocument.defaultView;
  const introspect: unknown = view ? Reflect.get(view, 'getEventListeners') : undefined;
  if (typeof introspect === 'function') {
    try {
      const listeners: unknown = introspect.call(view, el);
      if (typeof listeners === 'object' && listeners !== null) {
        return CLICK_EVENT_TYPES.some((type) => {
          const entries: unknown = Reflect.get(listeners, type);
          return Array.isArray(entries) && entries.length > 0;
        });
      }
    } catch {
      return hasLegacyHandler(el);
    }
  }
  return hasLegacyHandler(el);
}

function hasLegacyHandler(el: Element): boolean {
  return CLICK_EVENT_TYPES.some((type) => typeof Reflect.get(el, `on${type}`) === 'function');
}

export function hasAriaState(el: Element): boolean {
  return ARIA_STATE_ATTRIBUTES.some((attribute) => el.hasAttribute(attribute));
}
