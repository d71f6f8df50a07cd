// Core type definitions for Preflight

// Construct kinds recognized by the matcher
export type ConstructKind = 'function' | 'class' | 'registration' | 'inclusion';

// Check item kinds
export type CheckItemKind = 'function' | 'class' | 'registration' | 'literal' | 'inclusion' | 'pattern';

// Outcome of a single check item
export type ItemOutcome = 'passed' | 'failed' | 'skipped';

// Lifecycle of one component validation
export type ComponentState =
  | 'NOT_STARTED'
  | 'ARTIFACT_CHECKED'
  | 'SHORT_CIRCUITED'
  | 'CONTENT_CHECKED'
  | 'DONE';
