// Check service - loads a manifest, validates the tree, renders the report

import * as fs from 'fs';
import * as path from 'path';
import { ValidationError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { Manifest } from '../../models/check.js';
import { ValidationReport } from '../../models/report.js';
import { ArtifactProbe } from '../probe/artifact-probe.js';
import { ConstructMatcher } from '../matcher/construct-matcher.js';
import { ManifestService } from '../config/manifest-service.js';
import { ResultAggregator } from '../validation/result-aggregator.js';
import { ReportPrinter } from '../report/report-printer.js';
import { LineWriter, nullWriter, stdoutWriter } from '../report/output.js';

export type OutputFormat = 'text' | 'json';

export interface CheckOptions {
  /** Root of the tree to validate */
  root: string;
  /** Bundled manifest name or manifest path */
  manifest?: string;
  format?: OutputFormat;
  write?: LineWriter;
  /** Replaces the manifest-configured pattern matcher */
  matcher?: ConstructMatcher;
  manifestService?: ManifestService;
}

export interface CheckOutcome {
  manifest: Manifest;
  report: ValidationReport;
  exitCode: number;
}

/**
 * Runs one complete validation.
 *
 * Problems in the inspected tree only ever produce failed items; errors are
 * raised only for a root that is not a directory or a bad manifest.
 */
export function runCheck(options: CheckOptions): CheckOutcome {
  const root = path.resolve(options.root);
  if (!isDirectory(root)) {
    throw new ValidationError(`Root is not a directory: ${root}`, 'root');
  }

  const format = options.format ?? 'text';
  const write = options.write ?? stdoutWriter;
  const manifests = options.manifestService ?? new ManifestService({ root });

  const manifest = manifests.load(options.manifest);
  const printer = new ReportPrinter(write);

  if (format === 'text') {
    printer.header(manifest.name);
  }

  const aggregator = new ResultAggregator(manifest, {
    source: new ArtifactProbe(root),
    matcher: options.matcher,
    write: format === 'text' ? write : nullWriter
  });
  const report = aggregator.runAll();

  const exitCode = format === 'json' ? printer.renderJson(report) : printer.render(report);
  getLogger().info('Validation finished', { manifest: manifest.name, passed: report.passed, exitCode });
  return { manifest, report, exitCode };
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}
