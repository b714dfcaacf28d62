/**
 * Immutable, queryable collection of actions for one page state.
 */
import {
  PATH_SCHEME,
  PerceptionError,
  actionSpaceDataSchema,
  compareActionIds,
  formatActionSpace,
  highestIndices,
} from 'perception-shared';
import type { Action, ActionFilter, ActionPrefix, ActionSpaceData } from 'perception-shared';

function freezeAction(action: Action): Action {
  const copy: Action = { ...action };
  if (action.parameters) {
    copy.parameters = action.parameters.map((param) => {
      const paramCopy = { ...param };
      if (param.allowedValues) {
        paramCopy.allowedValues = [...param.allowedValues];
        Object.freeze(paramCopy.allowedValues);
      }
      return Object.freeze(paramCopy);
    });
    Object.freeze(copy.parameters);
  }
  return Object.freeze(copy);
}

function matches(action: Action, filter: ActionFilter): boolean {
  if (filter.role !== undefined && action.role !== filter.role) return false;
  if (filter.category !== undefined && action.category !== filter.category) return false;
  return true;
}

function describeFilter(filter: ActionFilter): string {
  const parts: string[] = [];
  if (filter.role !== undefined) parts.push(`role=${filter.role}`);
  if (filter.category !== undefined) parts.push(`category=${filter.category}`);
  return parts.length > 0 ? parts.join(', ') : 'no filter';
}

export interface ActionSpaceMeta {
  url: string;
  title: string;
  /** Numbers issued by earlier spaces of this page, per prefix */
  counters?: Partial<Record<ActionPrefix, number>>;
}

export class ActionSpace implements Iterable<Action> {
  readonly pathScheme = PATH_SCHEME;
  readonly url: string;
  readonly title: string;
  /** Highest number issued per prefix, dropped actions included */
  readonly counters: Readonly<Record<ActionPrefix, number>>;
  private readonly ordered: readonly Action[];
  private readonly byId: ReadonlyMap<string, Action>;

  constructor(actions: readonly Action[], meta: ActionSpaceMeta) {
    const byId = new Map<string, Action>();
    const ordered: Action[] = [];
    for (const action of actions) {
      if (byId.has(action.id)) {
        throw new PerceptionError('INVALID_ACTION_SPACE', `Duplicate action ID ${action.id}`);
      }
      const frozen = freezeAction(action);
      byId.set(action.id, frozen);
      ordered.push(frozen);
    }
    this.ordered = Object.freeze(ordered);
    this.byId = byId;
    this.url = meta.url;
    this.title = meta.title;
    this.counters = Object.freeze(highestIndices(byId.keys(), meta.counters));
  }

  /** Rebuild a space from serialized data */
  static fromData(data: unknown): ActionSpace {
    const parsed = actionSpaceDataSchema.safeParse(data);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
      throw new PerceptionError('INVALID_ACTION_SPACE', `Invalid action space data: ${reason}`);
    }
    const { actions, url, title, counters } = parsed.data;
    return new ActionSpace(actions, { url, title, counters });
  }

  get size(): number {
    return this.ordered.length;
  }

  ids(): string[] {
    return this.ordered.map((action) => action.id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  find(id: string): Action | undefined {
    return this.byId.get(id);
  }

  /** Look up an action; throws NOT_FOUND for an unknown ID */
  get(id: string): Action {
    const action = this.byId.get(id);
    if (!action) {
      throw new PerceptionError('NOT_FOUND', `Action ${id} not found`);
    }
    return action;
  }

  /** Actions in space order, optionally filtered by role and category */
  actions(filter: ActionFilter = {}): Action[] {
    return this.ordered.filter((action) => matches(action, filter));
  }

  /** Categories in first-appearance order */
  categories(): string[] {
    return [...new Set(this.ordered.map((action) => action.category))];
  }

  /** Actions ordered by ID prefix (B, L, I) then number */
  sorted(filter: ActionFilter = {}): Action[] {
    return this.actions(filter).sort((a, b) => compareActionIds(a.id, b.id));
  }

  /**
   * Pick one action uniformly at random among those matching `filter`.
   * Throws EMPTY_SPACE when nothing matches.
   */
  sample(filter: ActionFilter = {}, random: () => number = Math.random): Action {
    const candidates = this.actions(filter);
    if (candidates.length === 0) {
      throw new PerceptionError('EMPTY_SPACE', `No action matches ${describeFilter(filter)}`);
    }
    const index = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
    return candidates[index];
  }

  /** Grouped text listing, one line per action */
  render(): string {
    return formatActionSpace(this.ordered);
  }

  toJSON(): ActionSpaceData {
    return {
      pathScheme: this.pathScheme,
      url: this.url,
      title: this.title,
      actions: [...this.ordered],
      counters: { ...this.counters },
    };
  }

  [Symbol.iterator](): Iterator<Action> {
    return this.ordered[Symbol.iterator]();
  }
}
