// Result aggregator - runs every component validator in manifest order

import { Manifest } from '../../models/check.js';
import { ComponentResult, ValidationReport } from '../../models/report.js';
import { getLogger } from '../../core/logger.js';
import { ArtifactSource } from '../probe/artifact-probe.js';
import { ConstructMatcher, PatternConstructMatcher } from '../matcher/construct-matcher.js';
import { LineWriter, stdoutWriter } from '../report/output.js';
import { ComponentValidator } from './component-validator.js';

export interface ResultAggregatorOptions {
  source: ArtifactSource;
  /** Defaults to a pattern matcher configured from the manifest syntax */
  matcher?: ConstructMatcher;
  write?: LineWriter;
}

export class ResultAggregator {
  private validators: ComponentValidator[];
  private source: ArtifactSource;

  constructor(private manifest: Manifest, options: ResultAggregatorOptions) {
    this.source = options.source;
    const matcher = options.matcher ?? new PatternConstructMatcher(manifest.syntax);
    const write = options.write ?? stdoutWriter;

    this.validators = manifest.components.map(
      spec => new ComponentValidator(spec, { source: options.source, matcher, write })
    );
  }

  /**
   * Runs each validator exactly once. A failing component never stops the others.
   */
  runAll(): ValidationReport {
    const components: ComponentResult[] = [];

    for (const validator of this.validators) {
      const result = validator.validate();
      getLogger().debug('Component validated', { component: result.name, passed: result.passed, state: result.state });
      components.push(result);
    }

    return {
      manifest: this.manifest.name,
      root: this.source.root,
      components,
      passed: components.every(component => component.passed),
      summary: this.manifest.summary
    };
  }
}
