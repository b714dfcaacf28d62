/**
 * Stable identity assignment.
 *
 * IDs are numbered per prefix in traversal order. When a previous action
 * space of the same page is supplied, a candidate whose scope-qualified path,
 * tag and prefix match a prior action keeps that action's ID; everything else
 * continues after the highest number the previous space ever issued (its
 * stored counters, or its highest ID when it carries none). A number is never
 * handed out twice, even after its action was dropped.
 */
import {
  actionSpaceDataSchema,
  createIdCounter,
  decodeActionId,
  highestIndices,
} from 'perception-shared';
import type { Action, ActionPrefix, ActionSpaceData } from 'perception-shared';
import type { Logger } from '../logger';
import { ActionSpace } from './action-space';

export interface IdentityCandidate {
  key: string;
  tag: string;
  prefix: ActionPrefix;
}

export interface IdAssignment {
  id: string;
  /** Prior action whose ID was reused */
  prior?: Action;
}

export function assignIds(
  candidates: readonly IdentityCandidate[],
  previous: ActionSpaceData | null = null
): IdAssignment[] {
  const priorActions = previous?.actions ?? [];
  const priorByKey = new Map<string, Action>();
  for (const action of priorActions) {
    priorByKey.set(action.path, action);
  }

  const counter = createIdCounter(
    highestIndices(
      priorActions.map((action) => action.id),
      previous?.counters
    )
  );
  const claimed = new Set<string>();

  return candidates.map((candidate) => {
    const prior = priorByKey.get(candidate.key);
    if (
      prior &&
      prior.tag === candidate.tag &&
      decodeActionId(prior.id)?.prefix === candidate.prefix &&
      !claimed.has(prior.id)
    ) {
      claimed.add(prior.id);
      return { id: prior.id, prior };
    }
    return { id: counter.next(candidate.prefix) };
  });
}

/**
 * Accept a previous space for extension. Anything that does not validate
 * (unknown path scheme, malformed or duplicate IDs) yields null, and the
 * caller falls back to a fresh extraction.
 */
export function readPreviousSpace(previous: unknown, log: Logger): ActionSpaceData | null {
  if (previous === undefined || previous === null) return null;
  const data = previous instanceof ActionSpace ? previous.toJSON() : previous;
  const parsed = actionSpaceDataSchema.safeParse(data);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
    log.warn(`Ignoring previous action space, extracting fresh: ${reason}`);
    return null;
  }
  return parsed.data;
}
