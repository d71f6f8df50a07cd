// Component validator - runs one check spec against the probe and matcher

import { CheckItem, CheckSpec, CheckTarget } from '../../models/check.js';
import { ComponentResult, ItemResult } from '../../models/report.js';
import { ArtifactSource } from '../probe/artifact-probe.js';
import { ConstructMatcher } from '../matcher/construct-matcher.js';
import { LineWriter, stdoutWriter } from '../report/output.js';
import { ComponentStateMachine } from './component-state.js';

export interface ComponentValidatorOptions {
  source: ArtifactSource;
  matcher: ConstructMatcher;
  write?: LineWriter;
}

/**
 * Validates one component.
 *
 * A missing artifact ends the component when `shortCircuit` is set, as does
 * a failed blocking item. Everything not evaluated is recorded as skipped,
 * and a skipped item fails the component.
 */
export class ComponentValidator {
  private source: ArtifactSource;
  private matcher: ConstructMatcher;
  private write: LineWriter;

  constructor(private spec: CheckSpec, options: ComponentValidatorOptions) {
    this.source = options.source;
    this.matcher = options.matcher;
    this.write = options.write ?? stdoutWriter;
  }

  validate(): ComponentResult {
    const machine = new ComponentStateMachine();
    const results: ItemResult[] = [];
    const { targets } = this.spec;

    this.write('');
    this.write(`=== Validating ${this.spec.title} ===`);

    for (let index = 0; index < targets.length; index++) {
      const target = targets[index];
      machine.transition('ARTIFACT_CHECKED');

      if (!this.source.exists(target.path)) {
        this.write(`✗ ${target.label} NOT FOUND: ${target.path}`);
        results.push(this.artifactResult(target, 'failed'));

        if (this.spec.shortCircuit) {
          results.push(...this.skip(target, target.items));
          for (const later of targets.slice(index + 1)) {
            results.push(this.artifactResult(later, 'skipped'), ...this.skip(later, later.items));
          }
          machine.transition('SHORT_CIRCUITED');
          break;
        }

        results.push(...this.skip(target, target.items));
        continue;
      }

      this.write(`✓ ${target.label}: ${target.path}`);
      results.push(this.artifactResult(target, 'passed'));

      const blocked = this.checkContent(target, results);
      if (blocked !== null) {
        results.push(...this.skip(target, target.items.slice(blocked + 1)));
        for (const later of targets.slice(index + 1)) {
          results.push(this.artifactResult(later, 'skipped'), ...this.skip(later, later.items));
        }
        machine.transition('SHORT_CIRCUITED');
        break;
      }

      machine.transition('CONTENT_CHECKED');
    }

    machine.transition('DONE');

    const skipped = results.filter(result => result.outcome === 'skipped').length;
    if (skipped > 0) {
      this.write(`  - ${skipped} remaining check(s) skipped`);
    }

    return {
      name: this.spec.name,
      title: this.spec.title,
      passed: results.every(result => result.outcome === 'passed'),
      state: machine.state,
      shortCircuited: machine.shortCircuited,
      items: results
    };
  }

  /**
   * Evaluates every item of a present target.
   * Returns the index of a failed blocking item, or null.
   */
  private checkContent(target: CheckTarget, results: ItemResult[]): number | null {
    const text = this.source.read(target.path);

    for (let index = 0; index < target.items.length; index++) {
      const item = target.items[index];
      const found = text !== null && this.detect(item, text);
      const passed = found === item.expected;

      if (passed) {
        this.write(`  ✓ ${item.label}`);
      } else {
        this.write(`  ✗ ${item.label} (${item.expected ? 'missing' : 'unexpectedly present'})`);
      }
      results.push({ kind: item.kind, label: item.label, path: target.path, outcome: passed ? 'passed' : 'failed' });

      if (!passed && item.blocking) {
        return index;
      }
    }

    return null;
  }

  private detect(item: CheckItem, text: string): boolean {
    switch (item.kind) {
      case 'function':
        return this.matcher.containsFunction(text, item.name);
      case 'class':
        return this.matcher.containsClass(text, item.name);
      case 'registration':
        return this.matcher.containsRegistration(text, item.name);
      case 'inclusion':
        return this.matcher.containsInclusion(text, item.module);
      case 'pattern':
        return this.matcher.matchesPattern(text, item.pattern);
      case 'literal':
        return item.anyOf.some(literal => text.includes(literal));
    }
  }

  private artifactResult(target: CheckTarget, outcome: ItemResult['outcome']): ItemResult {
    return { kind: 'artifact', label: target.label, path: target.path, outcome };
  }

  private skip(target: CheckTarget, items: CheckItem[]): ItemResult[] {
    return items.map(item => ({ kind: item.kind, label: item.label, path: target.path, outcome: 'skipped' as const }));
  }
}
