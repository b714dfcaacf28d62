/**
 * Action and action-space types.
 */
import type { ACTION_CATEGORIES, PATH_SCHEME } from '../constants.js';

/** ID prefix per affordance family */
export type ActionPrefix = 'B' | 'L' | 'I';

export type ActionRole = 'button' | 'link' | 'input';

export type ParameterType = 'str' | 'number' | 'date' | 'boolean';

export type ActionCategory = (typeof ACTION_CATEGORIES)[keyof typeof ACTION_CATEGORIES];

/** One controllable facet of an input-like action */
export interface ActionParameter {
  name: string;
  type: ParameterType;
  default?: string;
  allowedValues?: string[];
}

export interface Action {
  id: string;
  role: ActionRole;
  description: string;
  /** Usually one of ACTION_CATEGORIES; an external classifier may relabel it */
  category: string;
  /** Present for input-like actions only */
  parameters?: ActionParameter[];
  tag: string;
  /** Scope-qualified positional path of the element */
  path: string;
  /** Hash of tag, attributes, label and parameters; changes when the element does */
  fingerprint: string;
}

/** Serialized form of an action space */
export interface ActionSpaceData {
  pathScheme: typeof PATH_SCHEME;
  url: string;
  title: string;
  actions: Action[];
  /**
   * Highest number ever issued per prefix, including IDs of actions that
   * have since been dropped
   */
  counters?: Record<ActionPrefix, number>;
}

export interface ActionFilter {
  role?: ActionRole;
  category?: string;
}
