/**
 * Action ID encoding utilities.
 *
 * Every action gets an ID like B1, L4 or I2: a one-letter prefix for the
 * affordance family and a 1-based number counted separately per prefix.
 */
import type { ActionPrefix, ActionRole } from './types/action.js';

export const ACTION_PREFIXES: readonly ActionPrefix[] = ['B', 'L', 'I'];

const ACTION_ID_PATTERN = /^([BLI])([1-9]\d*)$/;

const PREFIX_ROLES: Record<ActionPrefix, ActionRole> = {
  B: 'button',
  L: 'link',
  I: 'input',
};

/** Generate an action ID from a prefix and a number (1-based) */
export function encodeActionId(prefix: ActionPrefix, index: number): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new Error(`Action index must be an integer >= 1, got ${index}`);
  }
  return `${prefix}${index}`;
}

/** Split an action ID into prefix and number, or null if invalid */
export function decodeActionId(id: string): { prefix: ActionPrefix; index: number } | null {
  const match = id.match(ACTION_ID_PATTERN);
  if (!match) return null;
  const prefix = ACTION_PREFIXES.find((p) => p === match[1]);
  if (!prefix) return null;
  return { prefix, index: parseInt(match[2], 10) };
}

/** Check if a string is a valid action ID */
export function isValidActionId(id: string): boolean {
  return ACTION_ID_PATTERN.test(id);
}

export function roleForPrefix(prefix: ActionPrefix): ActionRole {
  return PREFIX_ROLES[prefix];
}

/** Order action IDs by prefix (B, L, I) then number */
export function compareActionIds(a: string, b: string): number {
  const da = decodeActionId(a);
  const db = decodeActionId(b);
  if (!da || !db) return a < b ? -1 : a > b ? 1 : 0;
  const byPrefix = ACTION_PREFIXES.indexOf(da.prefix) - ACTION_PREFIXES.indexOf(db.prefix);
  return byPrefix !== 0 ? byPrefix : da.index - db.index;
}

/**
 * Highest number used per prefix among `ids`, never below `floor`. Invalid
 * IDs are ignored.
 */
export function highestIndices(
  ids: Iterable<string>,
  floor: Partial<Record<ActionPrefix, number>> = {}
): Record<ActionPrefix, number> {
  const highest: Record<ActionPrefix, number> = {
    B: floor.B ?? 0,
    L: floor.L ?? 0,
    I: floor.I ?? 0,
  };
  for (const id of ids) {
    const decoded = decodeActionId(id);
    if (decoded) highest[decoded.prefix] = Math.max(highest[decoded.prefix], decoded.index);
  }
  return highest;
}

export interface IdCounter {
  next(prefix: ActionPrefix): string;
  /** Highest number handed out (or seeded) for a prefix */
  count(prefix: ActionPrefix): number;
}

/**
 * Create per-prefix counters. A seed continues numbering after the highest
 * number already in use for that prefix.
 */
export function createIdCounter(seed: Partial<Record<ActionPrefix, number>> = {}): IdCounter {
  const counters: Record<ActionPrefix, number> = {
    B: seed.B ?? 0,
    L: seed.L ?? 0,
    I: seed.I ?? 0,
  };
  return {
    next(prefix) {
      counters[prefix]++;
      return encodeActionId(prefix, counters[prefix]);
    },
    count(prefix) {
      return counters[prefix];
    },
  };
}
