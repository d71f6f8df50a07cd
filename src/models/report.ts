// Validation result types

import { CheckItemKind, ComponentState, ItemOutcome } from './types.js';

/**
 * Outcome of one evaluated (or skipped) check
 */
export interface ItemResult {
  kind: CheckItemKind | 'artifact';
  label: string;
  /** Artifact the item was checked against */
  path: string;
  outcome: ItemOutcome;
}

/**
 * Verdict of one component
 */
export interface ComponentResult {
  name: string;
  title: string;
  passed: boolean;
  /** Final state of the component state machine */
  state: ComponentState;
  /** Whether the component stopped before evaluating every item */
  shortCircuited: boolean;
  items: ItemResult[];
}

/**
 * Results of one run, in component order
 */
export interface ValidationReport {
  manifest: string;
  root: string;
  components: ComponentResult[];
  /** Logical AND of every component verdict */
  passed: boolean;
  /** Capability bullets from the manifest */
  summary: string[];
}
