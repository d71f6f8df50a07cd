// Check specification models

import { CheckItemKind } from './types.js';

interface BaseCheckItem {
  kind: CheckItemKind;
  /** Human-readable label printed beside the ✓/✗ marker */
  label: string;
  /** When false the item passes only if the construct is absent */
  expected: boolean;
  /** A failed blocking item ends the component */
  blocking: boolean;
}

export interface FunctionCheckItem extends BaseCheckItem {
  kind: 'function';
  name: string;
}

export interface ClassCheckItem extends BaseCheckItem {
  kind: 'class';
  name: string;
}

export interface RegistrationCheckItem extends BaseCheckItem {
  kind: 'registration';
  name: string;
}

export interface LiteralCheckItem extends BaseCheckItem {
  kind: 'literal';
  /** Alternative substrings; any one present satisfies the item */
  anyOf: string[];
}

export interface InclusionCheckItem extends BaseCheckItem {
  kind: 'inclusion';
  module: string;
}

export interface PatternCheckItem extends BaseCheckItem {
  kind: 'pattern';
  /** Regular expression source searched anywhere in the text */
  pattern: string;
}

export type CheckItem =
  | FunctionCheckItem
  | ClassCheckItem
  | RegistrationCheckItem
  | LiteralCheckItem
  | InclusionCheckItem
  | PatternCheckItem;

/**
 * One artifact and the items that must hold inside it
 */
export interface CheckTarget {
  path: string;
  label: string;
  items: CheckItem[];
}

/**
 * A named group of checks producing one verdict
 */
export interface CheckSpec {
  name: string;
  title: string;
  /** Stop the component at the first missing artifact */
  shortCircuit: boolean;
  targets: CheckTarget[];
}

/**
 * Surface forms substituted into the registration and inclusion templates
 */
export interface SyntaxConfig {
  registrationCall: string;
  classNamespace: string;
  inclusionCall: string;
  moduleNamespace: string;
}

/**
 * A complete set of components to validate
 */
export interface Manifest {
  name: string;
  syntax: SyntaxConfig;
  components: CheckSpec[];
  /** Capability bullets printed when every component passes */
  summary: string[];
  /** Where the manifest was loaded from */
  source: string;
}
