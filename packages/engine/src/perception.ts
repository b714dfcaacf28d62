/**
 * Extraction entry points.
 *
 * `extractActionSpace` is a single stateless call; `PerceptionSession` keeps
 * the last action space and the ID → element map for one page.
 */
import { formatSnapshot } from 'perception-shared';
import type {
  ActionSpaceData,
  ElementSnapshotNode,
  ExtractionOptions,
  HighlightGeometry,
} from 'perception-shared';
import { mergeOptions, resolveOptions } from './config';
import { isDocument } from './dom/guards';
import { walk } from './dom/walker';
import { createLogger } from './logger';
import type { ActionSpace } from './space/action-space';
import { compileActionSpace, prefixFor } from './space/compiler';
import { assignIds, readPreviousSpace } from './space/identity';

export interface Extraction {
  space: ActionSpace;
  tree: ElementSnapshotNode | null;
  highlights: HighlightGeometry[];
  snapshotId: string;
  url: string;
  title: string;
  timestamp: number;
  /** Whether a previous action space was honoured */
  incremental: boolean;
}

interface ExtractionResult {
  extraction: Extraction;
  elements: Map<string, Element>;
}

function generateSnapshotId(): string {
  return `snap-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

function pageOf(root: Document | Element): { url: string; title: string } {
  const doc = isDocument(root) ? root : root.ownerDocument;
  return { url: doc.URL, title: doc.title };
}

function run(
  root: Document | Element,
  options: ExtractionOptions,
  previous: ActionSpace | ActionSpaceData | null | undefined
): ExtractionResult {
  const resolved = resolveOptions(options);
  const log = createLogger('extract', resolved.verbose);
  const prior = readPreviousSpace(previous, log);

  const walked = walk(root, {
    highlight: resolved.highlight,
    focusHighlightIndex: resolved.focusHighlightIndex,
    viewportExpansion: resolved.viewportExpansion,
    highlightFromIndex: resolved.highlightFromIndex,
    logger: createLogger('walker', resolved.verbose),
  });

  const entries = walked.highlighted;
  const assignments = assignIds(
    entries.map((entry) => ({ key: entry.key, tag: entry.node.tag, prefix: prefixFor(entry.element) })),
    prior
  );

  const { url, title } = pageOf(root);
  const space = compileActionSpace({ entries, assignments, previous: prior, url, title });

  const elements = new Map<string, Element>();
  const highlights: HighlightGeometry[] = entries.map((entry, i) => {
    const actionId = assignments[i].id;
    elements.set(actionId, entry.element);
    const highlight: HighlightGeometry = { highlightIndex: entry.highlightIndex, actionId };
    if (entry.node.geometry) highlight.geometry = entry.node.geometry;
    return highlight;
  });

  const reused = assignments.filter((assignment) => assignment.prior).length;
  log.debug(
    `${entries.length} affordances, ${reused} reused, ${space.size} actions` +
      (prior ? ` (extending ${prior.actions.length})` : '')
  );
  if (resolved.verbose) {
    log.debug(`Interactive tree:\n${formatSnapshot(walked.root, { interactiveOnly: true })}`);
  }

  return {
    extraction: {
      space,
      tree: walked.root,
      highlights,
      snapshotId: generateSnapshotId(),
      url,
      title,
      timestamp: Date.now(),
      incremental: prior !== null,
    },
    elements,
  };
}

/**
 * Extract the action space of `root`. When `previous` is given and valid,
 * known affordances keep their IDs and new ones are appended.
 */
export function extractActionSpace(
  root: Document | Element,
  options: ExtractionOptions = {},
  previous?: ActionSpace | ActionSpaceData | null
): Extraction {
  return run(root, options, previous).extraction;
}

/** Per-page extraction state */
export class PerceptionSession {
  private last: ActionSpace | null = null;
  private elements = new Map<string, Element>();

  constructor(
    private readonly root: Document | Element,
    private readonly defaults: ExtractionOptions = {}
  ) {}

  /** Last compiled space, or null before the first snapshot */
  get current(): ActionSpace | null {
    return this.last;
  }

  /** Fresh extraction; previous IDs are forgotten */
  snapshot(options: ExtractionOptions = {}): Extraction {
    return this.record(run(this.root, mergeOptions(this.defaults, options), null));
  }

  /** Incremental extraction against the last space */
  extend(options: ExtractionOptions = {}): Extraction {
    return this.record(run(this.root, mergeOptions(this.defaults, options), this.last));
  }

  /** Element behind an action ID, or null if unknown or detached */
  resolve(id: string): Element | null {
    const element = this.elements.get(id);
    return element && element.isConnected ? element : null;
  }

  reset(): void {
    this.last = null;
    this.elements.clear();
  }

  private record(result: ExtractionResult): Extraction {
    this.last = result.extraction.space;
    this.elements = result.elements;
    return result.extraction;
  }
}
