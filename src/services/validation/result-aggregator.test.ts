// Tests for ResultAggregator

import { describe, it, expect, vi } from 'vitest';
import { ResultAggregator } from './result-aggregator.js';
import { ConstructMatcher, DEFAULT_SYNTAX, PatternConstructMatcher } from '../matcher/construct-matcher.js';
import { BufferedOutput } from '../report/output.js';
import { MemorySource } from '../../test-utils/fixture-tree.js';
import { CheckSpec, Manifest } from '../../models/check.js';

function component(name: string, path: string, marker: string): CheckSpec {
  return {
    name,
    title: name,
    shortCircuit: true,
    targets: [{ path, label: path, items: [{ kind: 'literal', anyOf: [marker], label: marker, expected: true, blocking: false }] }]
  };
}

function manifest(components: CheckSpec[], overrides: Partial<Manifest> = {}): Manifest {
  return {
    name: 'Sample',
    syntax: DEFAULT_SYNTAX,
    components,
    summary: ['Sample capability'],
    source: 'inline',
    ...overrides
  };
}

describe('ResultAggregator', () => {
  const components = [
    component('First', 'first.txt', 'one'),
    component('Second', 'second.txt', 'two'),
    component('Third', 'third.txt', 'three')
  ];

  it('should report components in declared order', () => {
    const source = new MemorySource({ 'first.txt': 'one', 'second.txt': 'two', 'third.txt': 'three' });
    const report = new ResultAggregator(manifest(components), { source, write: new BufferedOutput().write }).runAll();

    expect(report.components.map(c => c.name)).toEqual(['First', 'Second', 'Third']);
    expect(report.passed).toBe(true);
    expect(report.manifest).toBe('Sample');
    expect(report.root).toBe('/virtual');
    expect(report.summary).toEqual(['Sample capability']);
  });

  it('should run every component even when an earlier one fails', () => {
    const source = new MemorySource({ 'second.txt': 'two', 'third.txt': 'three' });
    const report = new ResultAggregator(manifest(components), { source, write: new BufferedOutput().write }).runAll();

    expect(report.components.map(c => c.passed)).toEqual([false, true, true]);
    expect(report.components[2].items.every(item => item.outcome === 'passed')).toBe(true);
    expect(report.passed).toBe(false);
  });

  it('should flip the overall verdict when exactly one component fails', () => {
    const files = { 'first.txt': 'one', 'second.txt': 'two', 'third.txt': 'three' };
    const passing = new ResultAggregator(manifest(components), { source: new MemorySource(files), write: new BufferedOutput().write }).runAll();
    const failing = new ResultAggregator(manifest(components), {
      source: new MemorySource({ ...files, 'second.txt': 'changed' }),
      write: new BufferedOutput().write
    }).runAll();

    expect(passing.passed).toBe(true);
    expect(failing.passed).toBe(false);
    expect(failing.components.map(c => c.passed)).toEqual([true, false, true]);
  });

  it('should configure the default matcher from the manifest syntax', () => {
    const registration: CheckSpec = {
      name: 'Widget',
      title: 'Widget',
      shortCircuit: true,
      targets: [{
        path: 'widget.lua',
        label: 'widget.lua',
        items: [{ kind: 'registration', name: 'Widget', label: 'Registration', expected: true, blocking: false }]
      }]
    };
    const custom = manifest([registration], {
      syntax: { ...DEFAULT_SYNTAX, registrationCall: 'class', classNamespace: 'ui' }
    });
    const source = new MemorySource({ 'widget.lua': "local Widget = class('ui.Widget')" });

    expect(new ResultAggregator(custom, { source, write: new BufferedOutput().write }).runAll().passed).toBe(true);
  });

  it('should route construct checks through an injected matcher', () => {
    const fake: ConstructMatcher = {
      containsFunction: vi.fn(() => true),
      containsClass: vi.fn(() => true),
      containsRegistration: vi.fn(() => true),
      containsInclusion: vi.fn(() => true),
      matchesPattern: vi.fn(() => true)
    };
    const functions: CheckSpec = {
      name: 'Functions',
      title: 'Functions',
      shortCircuit: true,
      targets: [{
        path: 'code.lua',
        label: 'code.lua',
        items: [{ kind: 'function', name: 'anything', label: 'anything', expected: true, blocking: false }]
      }]
    };

    const report = new ResultAggregator(manifest([functions]), {
      source: new MemorySource({ 'code.lua': '' }),
      matcher: fake,
      write: new BufferedOutput().write
    }).runAll();

    expect(report.passed).toBe(true);
    expect(fake.containsFunction).toHaveBeenCalledWith('', 'anything');
  });

  it('should produce identical reports for an unchanged tree', () => {
    const source = new MemorySource({ 'first.txt': 'one' });
    const first = new BufferedOutput();
    const second = new BufferedOutput();

    const a = new ResultAggregator(manifest(components), { source, matcher: new PatternConstructMatcher(), write: first.write }).runAll();
    const b = new ResultAggregator(manifest(components), { source, matcher: new PatternConstructMatcher(), write: second.write }).runAll();

    expect(a).toEqual(b);
    expect(first.toString()).toBe(second.toString());
  });
});
