export { extractActionSpace, PerceptionSession } from './perception';
export type { Extraction } from './perception';
export { ActionSpace } from './space/action-space';
export type { ActionSpaceMeta } from './space/action-space';
export { assignIds, readPreviousSpace } from './space/identity';
export type { IdAssignment, IdentityCandidate } from './space/identity';
export { compileAction, compileActionSpace, categorize, deriveParameters, describeAction, prefixFor } from './space/compiler';
export type { CompileInput } from './space/compiler';
export { walk, createHighlightCounter } from './dom/walker';
export type { HighlightedEntry, WalkOptions, WalkResult } from './dom/walker';
export { captureGeometry, isEditable, isTextVisible, isTopmost, isVisible } from './dom/oracle';
export type { OracleContext } from './dom/oracle';
export { isInteractive } from './dom/classifier';
export { positionalPath } from './dom/path';
export { accessibleLabel, nearbyText } from './dom/describe';
export { configFromEnv, mergeOptions, resolveOptions } from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';
export * from 'perception-shared';
