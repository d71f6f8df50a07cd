// Construct matcher - presence detection of named definitions in artifact text

import { SyntaxConfig } from '../../models/check.js';
import { ConstructKind } from '../../models/types.js';
import { getLogger } from '../../core/logger.js';
import {
  CLASS_PATTERNS,
  FUNCTION_PATTERNS,
  INCLUSION_PATTERNS,
  REGISTRATION_PATTERNS,
  PatternSet,
  TemplateValues,
  compileTemplate
} from './pattern-set.js';

/**
 * Decides whether a construct is present in a text.
 *
 * Validators depend only on this interface, so the heuristic
 * implementation below can be replaced by a real parser.
 */
export interface ConstructMatcher {
  containsFunction(text: string, name: string): boolean;
  containsClass(text: string, name: string): boolean;
  /** Namespaced class-registration call carrying the name as a string literal */
  containsRegistration(text: string, name: string): boolean;
  /** Module-inclusion statement naming the namespaced module */
  containsInclusion(text: string, moduleName: string): boolean;
  /** Raw regular expression search */
  matchesPattern(text: string, source: string): boolean;
}

/**
 * The template that matched, for diagnostics
 */
export interface ConstructMatch {
  kind: ConstructKind;
  template: string;
  index: number;
}

export const DEFAULT_SYNTAX: SyntaxConfig = {
  registrationCall: 'torch.class',
  classNamespace: 'nn',
  inclusionCall: 'require',
  moduleNamespace: 'nngraph'
};

/**
 * Unanchored, ordered template search. Matches inside comments or string
 * literals count; surface forms outside the templates are missed.
 */
export class PatternConstructMatcher implements ConstructMatcher {
  private syntax: SyntaxConfig;

  constructor(syntax: Partial<SyntaxConfig> = {}) {
    this.syntax = { ...DEFAULT_SYNTAX, ...syntax };
  }

  /**
   * First template of the set found anywhere in the text
   */
  find(set: PatternSet, text: string, values: TemplateValues): ConstructMatch | null {
    for (const template of set.templates) {
      const match = compileTemplate(template, values).exec(text);
      if (match) {
        getLogger().debug('Construct matched', { kind: set.kind, name: values.name, template: template.id });
        return { kind: set.kind, template: template.id, index: match.index };
      }
    }
    return null;
  }

  findFunction(text: string, name: string): ConstructMatch | null {
    return this.find(FUNCTION_PATTERNS, text, { name });
  }

  findClass(text: string, name: string): ConstructMatch | null {
    return this.find(CLASS_PATTERNS, text, this.registrationValues(name));
  }

  containsFunction(text: string, name: string): boolean {
    return this.findFunction(text, name) !== null;
  }

  containsClass(text: string, name: string): boolean {
    return this.findClass(text, name) !== null;
  }

  containsRegistration(text: string, name: string): boolean {
    return this.find(REGISTRATION_PATTERNS, text, this.registrationValues(name)) !== null;
  }

  containsInclusion(text: string, moduleName: string): boolean {
    return this.find(INCLUSION_PATTERNS, text, {
      name: moduleName,
      call: this.syntax.inclusionCall,
      ns: this.syntax.moduleNamespace
    }) !== null;
  }

  matchesPattern(text: string, source: string): boolean {
    try {
      return new RegExp(source).test(text);
    } catch (error) {
      getLogger().warn('Invalid pattern treated as no match', {
        pattern: source,
        reason: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  private registrationValues(name: string): TemplateValues {
    return { name, call: this.syntax.registrationCall, ns: this.syntax.classNamespace };
  }
}
