/**
 * Shared constants for the perception engine.
 */

/** Default viewport expansion in pixels for the topmost test */
export const DEFAULT_VIEWPORT_EXPANSION = 500;

/** Viewport expansion sentinel: every element is treated as topmost */
export const UNBOUNDED_VIEWPORT = -1;

/** Path scheme written into serialized action spaces */
export const PATH_SCHEME = 'positional-v1';

/** Environment variables read by configFromEnv */
export const ENV_VIEWPORT_EXPANSION = 'PERCEPTION_VIEWPORT_EXPANSION';
export const ENV_HIGHLIGHT = 'PERCEPTION_HIGHLIGHT';
export const ENV_VERBOSE = 'PERCEPTION_VERBOSE';

/** Longest label kept in an action description */
export const MAX_LABEL_LENGTH = 80;

/** Computed cursor values that signal an affordance */
export const INTERACTIVE_CURSORS: ReadonlySet<string> = new Set([
  'pointer',
  'move',
  'text',
  'vertical-text',
  'grab',
  'grabbing',
  'cell',
  'copy',
  'alias',
  'all-scroll',
  'crosshair',
  'help',
  'context-menu',
  'col-resize',
  'row-resize',
  'n-resize',
  'e-resize',
  's-resize',
  'w-resize',
  'ne-resize',
  'nw-resize',
  'se-resize',
  'sw-resize',
  'ew-resize',
  'ns-resize',
  'nesw-resize',
  'nwse-resize',
  'zoom-in',
  'zoom-out',
]);

/** Cursor values that never count, even if a stylesheet sets them on a control */
export const NON_INTERACTIVE_CURSORS: ReadonlySet<string> = new Set([
  'not-allowed',
  'no-drop',
  'wait',
  'progress',
  'initial',
  'inherit',
]);

/** Tags that are affordances on their own */
export const INTERACTIVE_TAGS: ReadonlySet<string> = new Set([
  'a',
  'button',
  'input',
  'select',
  'textarea',
  'details',
  'summary',
  'label',
  'menu',
  'menuitem',
  'object',
  'embed',
]);

/** ARIA roles that mark an affordance */
export const INTERACTIVE_ROLES: ReadonlySet<string> = new Set([
  'button',
  'link',
  'menu',
  'menuitem',
  'menuitemcheckbox',
  'menuitemradio',
  'checkbox',
  'radio',
  'switch',
  'slider',
  'spinbutton',
  'tab',
  'tabpanel',
  'textbox',
  'searchbox',
  'combobox',
  'listbox',
  'option',
  'grid',
  'gridcell',
  'tree',
  'treeitem',
  'scrollbar',
  'tooltip',
  'a-button-inner',
  'a-dropdown-button',
  'dropdown',
]);

/** Roles whose affordance is a value the caller fills or picks */
export const INPUT_ROLES: ReadonlySet<string> = new Set([
  'textbox',
  'searchbox',
  'combobox',
  'listbox',
  'checkbox',
  'radio',
  'switch',
  'slider',
  'spinbutton',
  'menuitemcheckbox',
  'menuitemradio',
]);

/** Input types that behave like buttons */
export const BUTTON_INPUT_TYPES: ReadonlySet<string> = new Set([
  'button',
  'submit',
  'reset',
  'image',
]);

/** Attribute → values used by dropdown widget libraries */
export const DROPDOWN_MARKERS: Readonly<Record<string, readonly string[]>> = {
  'data-action': ['a-dropdown-select', 'a-dropdown-button'],
  'data-toggle': ['dropdown'],
  'data-bs-toggle': ['dropdown'],
};

/** Inline handler and framework click-binding attributes */
export const CLICK_HANDLER_ATTRIBUTES: readonly string[] = [
  'onclick',
  'onmousedown',
  'onmouseup',
  'ondblclick',
  'ontouchstart',
  'ontouchend',
  'ng-click',
  'data-ng-click',
  '@click',
  'v-on:click',
  '(click)',
  'x-on:click',
  'hx-get',
  'hx-post',
];

/** Event types probed through listener introspection */
export const CLICK_EVENT_TYPES: readonly string[] = [
  'click',
  'mousedown',
  'mouseup',
  'dblclick',
  'touchstart',
  'touchend',
];

/** ARIA state attributes that imply the element reacts to input */
export const ARIA_STATE_ATTRIBUTES: readonly string[] = [
  'aria-expanded',
  'aria-pressed',
  'aria-selected',
  'aria-checked',
];

/** Elements dropped from the snapshot before classification */
export const DENYLISTED_TAGS: ReadonlySet<string> = new Set([
  'svg',
  'script',
  'style',
  'link',
  'meta',
  'noscript',
  'template',
]);

/** Category labels used by the compiler */
export const ACTION_CATEGORIES = {
  navigation: 'Navigation',
  searchAndInput: 'Search & Input',
  formInput: 'Form Input',
  formControls: 'Form Controls',
  menusAndToggles: 'Menus & Toggles',
  pageControls: 'Page Controls',
} as const;
