/**
 * Action space compiler: turns highlighted elements into categorized,
 * described, parametrized actions.
 */
import {
  ACTION_CATEGORIES,
  BUTTON_INPUT_TYPES,
  INPUT_ROLES,
  INTERACTIVE_ROLES,
  decodeActionId,
  roleForPrefix,
} from 'perception-shared';
import type {
  Action,
  ActionCategory,
  ActionParameter,
  ActionPrefix,
  ActionSpaceData,
  ParameterType,
} from 'perception-shared';
import { accessibleLabel, nearbyText, normalizeText, truncateLabel } from '../dom/describe';
import {
  inputType,
  isContentEditable,
  isDocument,
  isInput,
  isSelect,
  isShadowRoot,
  isTextArea,
  roleOf,
  tagOf,
} from '../dom/guards';
import type { HighlightedEntry } from '../dom/walker';
import { ActionSpace } from './action-space';
import type { IdAssignment } from './identity';

const DATE_INPUT_TYPES = new Set(['date', 'datetime-local', 'month', 'week', 'time']);
const NUMBER_INPUT_TYPES = new Set(['number', 'range']);
const BOOLEAN_INPUT_TYPES = new Set(['checkbox', 'radio']);
/** Input types whose value is never empty, even with no value attribute */
const IMPLICIT_VALUE_TYPES = new Set(['range', 'color']);
const BOOLEAN_ROLES = new Set(['checkbox', 'radio', 'switch', 'menuitemcheckbox', 'menuitemradio']);
const NUMBER_ROLES = new Set(['slider', 'spinbutton']);
const CHOICE_ROLES = new Set(['combobox', 'listbox']);

/** B, L or I from explicit role first, then tag */
export function prefixFor(el: Element): ActionPrefix {
  const role = roleOf(el);
  if (role === 'link') return 'L';
  if (INPUT_ROLES.has(role)) return 'I';
  if (INTERACTIVE_ROLES.has(role)) return 'B';

  const tag = tagOf(el);
  if (tag === 'a') return 'L';
  if (tag === 'select' || tag === 'textarea') return 'I';
  if (tag === 'input') return BUTTON_INPUT_TYPES.has(inputType(el)) ? 'B' : 'I';
  if (isContentEditable(el)) return 'I';
  return 'B';
}

function optionLabel(option: Element): string {
  return normalizeText(option.getAttribute('label') ?? option.textContent) || (option.getAttribute('value') ?? '');
}

/** Value shown by an input, when the page set one or the user typed one */
function explicitInputValue(el: HTMLInputElement): string | undefined {
  if (el.value === '') return undefined;
  if (el.hasAttribute('value')) return el.value;
  return IMPLICIT_VALUE_TYPES.has(inputType(el)) ? undefined : el.value;
}

function selectParameter(el: HTMLSelectElement): ActionParameter {
  const options = Array.from(el.options);
  const param: ActionParameter = { name: 'value', type: 'str' };
  if (options.length > 0) param.allowedValues = options.map(optionLabel);
  // Whatever option the select displays is its current value
  const selected = el.selectedIndex >= 0 ? options[el.selectedIndex] : undefined;
  if (selected) param.default = optionLabel(selected);
  return param;
}

function datalistValues(el: HTMLInputElement): string[] {
  const listId = el.getAttribute('list');
  if (!listId) return [];
  const root = el.getRootNode();
  const list = isDocument(root) || isShadowRoot(root) ? root.getElementById(listId) : null;
  if (!list) return [];
  return Array.from(list.querySelectorAll('option'))
    .map((option) => option.getAttribute('value') ?? normalizeText(option.textContent))
    .filter(Boolean);
}

function inputParameter(el: HTMLInputElement): ActionParameter {
  const type = inputType(el);

  if (BOOLEAN_INPUT_TYPES.has(type)) {
    return { name: 'value', type: 'boolean', default: String(el.checked) };
  }

  const paramType: ParameterType = NUMBER_INPUT_TYPES.has(type)
    ? 'number'
    : DATE_INPUT_TYPES.has(type)
      ? 'date'
      : 'str';
  const param: ActionParameter = { name: 'value', type: paramType };

  const suggestions = datalistValues(el);
  if (suggestions.length > 0) param.allowedValues = suggestions;

  if (type !== 'password') {
    const value = explicitInputValue(el);
    if (value !== undefined) param.default = value;
  }
  return param;
}

/** Options owned by, controlled by or nested in an ARIA combobox/listbox */
function ariaOptions(el: Element): Element[] {
  const ids = [el.getAttribute('aria-owns'), el.getAttribute('aria-controls')]
    .filter((value): value is string => value !== null)
    .flatMap((value) => value.split(/\s+/))
    .filter(Boolean);
  const containers = [el, ...ids.map((id) => el.ownerDocument.getElementById(id)).filter((c): c is HTMLElement => c !== null)];
  const seen = new Set<Element>();
  for (const container of containers) {
    for (const option of container.querySelectorAll('[role="option"]')) {
      seen.add(option);
    }
  }
  return [...seen];
}

function roleParameter(el: Element, role: string): ActionParameter {
  if (BOOLEAN_ROLES.has(role)) {
    const param: ActionParameter = { name: 'value', type: 'boolean' };
    const checked = el.getAttribute('aria-checked');
    if (checked === 'true' || checked === 'false') param.default = checked;
    return param;
  }

  if (NUMBER_ROLES.has(role)) {
    const param: ActionParameter = { name: 'value', type: 'number' };
    const now = el.getAttribute('aria-valuenow');
    if (now !== null && now.trim() !== '') param.default = now.trim();
    return param;
  }

  const param: ActionParameter = { name: 'value', type: 'str' };
  if (CHOICE_ROLES.has(role)) {
    const options = ariaOptions(el);
    if (options.length > 0) param.allowedValues = options.map(optionLabel);
    const selected = options.find((option) => option.getAttribute('aria-selected') === 'true');
    if (selected) param.default = optionLabel(selected);
  } else {
    const text = normalizeText(el.textContent);
    if (text) param.default = text;
  }
  return param;
}

/** One `value` parameter describing what the input accepts */
export function deriveParameters(el: Element): ActionParameter[] {
  if (isSelect(el)) return [selectParameter(el)];
  if (isInput(el)) return [inputParameter(el)];
  if (isTextArea(el)) {
    const param: ActionParameter = { name: 'value', type: 'str' };
    if (el.value !== '') param.default = el.value;
    return [param];
  }
  if (isContentEditable(el)) {
    const param: ActionParameter = { name: 'value', type: 'str' };
    const text = normalizeText(el.textContent);
    if (text) param.default = text;
    return [param];
  }
  return [roleParameter(el, roleOf(el))];
}

function hasRealHref(el: Element): boolean {
  const href = (el.getAttribute('href') ?? '').trim();
  return href !== '' && !href.startsWith('#') && !href.toLowerCase().startsWith('javascript:');
}

function isSearchContext(el: Element): boolean {
  if (roleOf(el) === 'searchbox') return true;
  if (isInput(el) && inputType(el) === 'search') return true;
  if (el.closest('search, [role="search"]')) return true;
  const hints = ['name', 'id', 'placeholder', 'aria-label']
    .map((attribute) => el.getAttribute(attribute) ?? '')
    .join(' ')
    .toLowerCase();
  return hints.includes('search');
}

export function categorize(
  el: Element,
  prefix: ActionPrefix,
  parameters: readonly ActionParameter[]
): ActionCategory {
  if (prefix === 'L') {
    if (tagOf(el) === 'a' && !hasRealHref(el)) return ACTION_CATEGORIES.pageControls;
    return ACTION_CATEGORIES.navigation;
  }

  if (prefix === 'I') {
    const finite = parameters.some((param) => param.allowedValues !== undefined && param.allowedValues.length > 0);
    return finite || isSearchContext(el) ? ACTION_CATEGORIES.searchAndInput : ACTION_CATEGORIES.formInput;
  }

  const role = roleOf(el);
  const tag = tagOf(el);
  if (role === 'tab' || role === 'menuitem' || el.closest('nav, [role="navigation"]')) {
    return ACTION_CATEGORIES.navigation;
  }
  if (el.hasAttribute('aria-expanded') || el.hasAttribute('aria-haspopup') || tag === 'summary' || tag === 'details') {
    return ACTION_CATEGORIES.menusAndToggles;
  }
  const type = (el.getAttribute('type') ?? '').toLowerCase();
  if (type === 'submit' || type === 'reset' || el.closest('form')) {
    return ACTION_CATEGORIES.formControls;
  }
  return ACTION_CATEGORIES.pageControls;
}

function inputNoun(el: Element): string {
  if (isInput(el)) return `${inputType(el)} field`;
  if (isTextArea(el)) return 'text area';
  if (isSelect(el)) return 'dropdown';
  const role = roleOf(el);
  return role ? role : 'field';
}

export function describeAction(
  el: Element,
  prefix: ActionPrefix,
  parameters: readonly ActionParameter[],
  label: string
): string {
  const quoted = label ? `"${truncateLabel(label)}"` : '';

  if (prefix === 'L') {
    if (quoted) return `Open ${quoted}`;
    const href = (el.getAttribute('href') ?? '').trim();
    return href ? `Open link to ${truncateLabel(href)}` : 'Open unlabeled link';
  }

  if (prefix === 'B') {
    return quoted ? `Click ${quoted}` : `Click unlabeled ${tagOf(el)}`;
  }

  const param = parameters[0];
  const verb = param?.allowedValues && param.allowedValues.length > 0
    ? 'Select'
    : param?.type === 'boolean'
      ? 'Toggle'
      : 'Fill';
  return quoted ? `${verb} ${quoted}` : `${verb} unlabeled ${inputNoun(el)}`;
}

/** 32-bit FNV-1a, hex encoded */
function hash(text: string): string {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return (h >>> 0).toString(16).padStart(8, '0');
}

export function fingerprint(
  node: { tag: string; attributes: Record<string, string> },
  label: string,
  parameters: readonly ActionParameter[]
): string {
  const attributes = Object.entries(node.attributes)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, value]) => `${name}=${value}`)
    .join('\u0000');
  const params = parameters
    .map((param) => [param.name, param.type, param.default ?? '', (param.allowedValues ?? []).join('\u0001')].join('\u0000'))
    .join('\u0002');
  return hash(`${node.tag}|${attributes}|${label}|${params}`);
}

/** Compile one highlighted element under the given ID */
export function compileAction(entry: HighlightedEntry, id: string): Action {
  const decoded = decodeActionId(id);
  const prefix = decoded ? decoded.prefix : prefixFor(entry.element);
  const el = entry.element;
  const label = accessibleLabel(el) || nearbyText(el);
  const parameters = prefix === 'I' ? deriveParameters(el) : [];

  const action: Action = {
    id,
    role: roleForPrefix(prefix),
    description: describeAction(el, prefix, parameters, label),
    category: categorize(el, prefix, parameters),
    tag: entry.node.tag,
    path: entry.key,
    fingerprint: fingerprint(entry.node, label, parameters),
  };
  if (prefix === 'I') action.parameters = parameters;
  return action;
}

export interface CompileInput {
  entries: readonly HighlightedEntry[];
  /** One assignment per entry, same order */
  assignments: readonly IdAssignment[];
  previous: ActionSpaceData | null;
  url: string;
  title: string;
}

/**
 * Build the action space. Reused actions keep their prior place and, when
 * their fingerprint is unchanged, their prior content verbatim; new actions
 * follow in traversal order.
 */
export function compileActionSpace(input: CompileInput): ActionSpace {
  const { entries, assignments, previous } = input;
  if (entries.length !== assignments.length) {
    throw new Error(`Expected ${entries.length} ID assignments, got ${assignments.length}`);
  }

  const reused = new Map<string, Action>();
  const added: Action[] = [];

  entries.forEach((entry, i) => {
    const { id, prior } = assignments[i];
    const compiled = compileAction(entry, id);
    if (prior) {
      reused.set(id, prior.fingerprint === compiled.fingerprint ? prior : compiled);
    } else {
      added.push(compiled);
    }
  });

  const retained: Action[] = [];
  for (const action of previous?.actions ?? []) {
    const kept = reused.get(action.id);
    if (kept) retained.push(kept);
  }

  return new ActionSpace([...retained, ...added], {
    url: input.url,
    title: input.title,
    counters: previous?.counters,
  });
}
