// Public API for Preflight

export * from './models/index.js';
export * from './core/errors.js';
export { Logger, LogLevel, getLogger } from './core/logger.js';
export { ManifestSchema, CheckItemSchema } from './core/schemas.js';
export { ArtifactProbe, type ArtifactSource } from './services/probe/artifact-probe.js';
export {
  PatternConstructMatcher,
  DEFAULT_SYNTAX,
  type ConstructMatcher,
  type ConstructMatch
} from './services/matcher/construct-matcher.js';
export { ComponentValidator } from './services/validation/component-validator.js';
export { ComponentStateMachine } from './services/validation/component-state.js';
export { ResultAggregator } from './services/validation/result-aggregator.js';
export { ReportPrinter, exitCodeFor, EXIT_PASS, EXIT_FAIL } from './services/report/report-printer.js';
export { BufferedOutput, stdoutWriter, nullWriter, type LineWriter } from './services/report/output.js';
export { ManifestService, DEFAULT_MANIFEST, PROJECT_MANIFEST } from './services/config/manifest-service.js';
export { runCheck, type CheckOptions, type CheckOutcome, type OutputFormat } from './services/check/check-service.js';
