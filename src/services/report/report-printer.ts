// Report printer - summary table, verdict block and exit code

import { ValidationReport } from '../../models/report.js';
import { LineWriter, stdoutWriter } from './output.js';

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;

const RULE = '='.repeat(60);
const LABEL_WIDTH = 20;

/**
 * Exit code for a report
 */
export function exitCodeFor(report: ValidationReport): number {
  return report.passed ? EXIT_PASS : EXIT_FAIL;
}

export class ReportPrinter {
  private write: LineWriter;

  constructor(write: LineWriter = stdoutWriter) {
    this.write = write;
  }

  /**
   * Prints the run banner
   */
  header(title: string): void {
    this.write(RULE);
    this.write(`${title} Validation`);
    this.write(RULE);
  }

  /**
   * Prints one PASS/FAIL row per component and the overall verdict.
   * Knows nothing about why a component failed.
   */
  render(report: ValidationReport): number {
    const passed = report.components.every(component => component.passed);

    this.write('');
    this.write(RULE);
    this.write('Validation Summary');
    this.write(RULE);

    for (const component of report.components) {
      const status = component.passed ? '✓ PASS' : '✗ FAIL';
      this.write(`${component.name.padEnd(LABEL_WIDTH)}: ${status}`);
    }

    this.write(RULE);
    this.write('');

    if (passed) {
      this.write('✓ All validation checks passed!');
      if (report.summary.length > 0) {
        this.write('');
        this.write(`The ${report.manifest} implementation includes:`);
        for (const capability of report.summary) {
          this.write(`  • ${capability}`);
        }
      }
      return EXIT_PASS;
    }

    this.write('✗ Some validation checks failed.');
    this.write('Please review the failed checks above.');
    return EXIT_FAIL;
  }

  /**
   * Writes the report as JSON
   */
  renderJson(report: ValidationReport): number {
    this.write(JSON.stringify(report, null, 2));
    return exitCodeFor(report);
  }
}
