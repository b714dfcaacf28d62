/**
 * Renders actions as the grouped text listing handed to LLMs and humans.
 */
import { compareActionIds } from './action-id.js';
import type { Action, ActionParameter } from './types/action.js';

/** Format one parameter as `name: type = [a, b]; default: x` */
export function formatParameter(param: ActionParameter): string {
  let text = `${param.name}: ${param.type}`;
  if (param.allowedValues && param.allowedValues.length > 0) {
    text += ` = [${param.allowedValues.join(', ')}]`;
  }
  if (param.default !== undefined) {
    text += `; default: ${param.default}`;
  }
  return text;
}

/** Format a single action line */
export function formatAction(action: Action): string {
  let line = `* ${action.id}: ${action.description}`;
  if (action.parameters && action.parameters.length > 0) {
    line += ` (${action.parameters.map(formatParameter).join(', ')})`;
  }
  return line;
}

/**
 * Group actions by category (first-appearance order) and list each group
 * sorted by ID prefix then number.
 */
export function formatActionSpace(actions: readonly Action[]): string {
  const groups = new Map<string, Action[]>();
  for (const action of actions) {
    const group = groups.get(action.category);
    if (group) {
      group.push(action);
    } else {
      groups.set(action.category, [action]);
    }
  }

  const lines: string[] = [];
  for (const [category, group] of groups) {
    if (lines.length > 0) lines.push('');
    lines.push(`# ${category}`);
    const sorted = [...group].sort((a, b) => compareActionIds(a.id, b.id));
    for (const action of sorted) {
      lines.push(formatAction(action));
    }
  }
  return lines.join('\n');
}
