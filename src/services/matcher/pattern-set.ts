// Surface-pattern templates for construct detection

import { ConstructKind } from '../../models/types.js';

/**
 * One surface form. `source` is a regular expression with `{name}`,
 * `{call}` and `{ns}` placeholders; substituted values are escaped.
 */
export interface PatternTemplate {
  id: string;
  source: string;
}

/**
 * Ordered templates for one construct kind
 */
export interface PatternSet {
  kind: ConstructKind;
  templates: readonly PatternTemplate[];
}

export interface TemplateValues {
  name: string;
  call?: string;
  ns?: string;
}

export const FUNCTION_PATTERNS: PatternSet = {
  kind: 'function',
  templates: [
    { id: 'bare', source: 'function {name}' },
    { id: 'local', source: 'local function {name}' },
    { id: 'method', source: 'function[^\\n]*:{name}' },
    { id: 'namespaced', source: 'function[^\\n]*\\.{name}' },
    { id: 'assigned', source: '{name}\\s*=\\s*function' },
    { id: 'loose', source: 'function[^\\n]*{name}' }
  ]
};

export const REGISTRATION_PATTERNS: PatternSet = {
  kind: 'registration',
  templates: [
    { id: 'registration', source: '{call}\\(\\s*([\'"])(?:{ns}\\.)?{name}\\1' }
  ]
};

export const CLASS_PATTERNS: PatternSet = {
  kind: 'class',
  templates: [
    { id: 'local', source: 'local {name}' },
    { id: 'record', source: '{name}\\s*=\\s*\\{\\s*\\}' },
    ...REGISTRATION_PATTERNS.templates
  ]
};

export const INCLUSION_PATTERNS: PatternSet = {
  kind: 'inclusion',
  templates: [
    { id: 'inclusion', source: '{call}\\s*\\(?\\s*([\'"]){ns}\\.{name}\\1' }
  ]
};

/**
 * Escape a literal for use inside a regular expression
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Substitute escaped values into a template and compile it
 */
export function compileTemplate(template: PatternTemplate, values: TemplateValues): RegExp {
  const source = template.source.replace(/\{(name|call|ns)\}/g, (_match, key: keyof TemplateValues) => {
    const value = values[key];
    return value === undefined ? '' : escapeRegExp(value);
  });
  return new RegExp(source);
}
