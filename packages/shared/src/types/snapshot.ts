/**
 * Annotated page-tree snapshot types.
 */

/** Kind of boundary crossed by the edge from a node to its parent */
export type BoundaryKind = 'shadow' | 'frame';

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Position data captured for a highlighted element */
export interface Geometry {
  /** Box relative to the top-level viewport, enclosing frame offset included */
  rect: Rect;
  frameOffset: Point;
  scroll: Point;
}

export interface TextSnapshotNode {
  kind: 'text';
  text: string;
  path: string;
  boundary?: BoundaryKind;
}

export interface ElementSnapshotNode {
  kind: 'element';
  tag: string;
  attributes: Record<string, string>;
  path: string;
  children: SnapshotNode[];
  isInteractive: boolean;
  isVisible: boolean;
  isTopmost: boolean;
  isEditable: boolean;
  highlightIndex?: number;
  geometry?: Geometry;
  boundary?: BoundaryKind;
}

/** A node in the annotated snapshot tree */
export type SnapshotNode = TextSnapshotNode | ElementSnapshotNode;

/** Geometry handed to an overlay renderer, one per highlighted node */
export interface HighlightGeometry {
  highlightIndex: number;
  actionId: string;
  geometry?: Geometry;
}

/** Options accepted by an extraction call */
export interface ExtractionOptions {
  /** Capture geometry for highlighted nodes (default: false) */
  highlight?: boolean;
  /** Capture geometry for this highlight index only */
  focusHighlightIndex?: number;
  /** Pixels added around the viewport for the topmost test; -1 treats everything as topmost */
  viewportExpansion?: number;
  /** First highlight index handed out by the walker (default: 0) */
  highlightFromIndex?: number;
  /** Log diagnostics to the console */
  verbose?: boolean;
}

export type ResolvedExtractionOptions = Required<Omit<ExtractionOptions, 'focusHighlightIndex'>> &
  Pick<ExtractionOptions, 'focusHighlightIndex'>;
