/**
 * Manifest Service
 *
 * Locates, parses and validates the YAML manifest that lists the components
 * to check. A project-level `preflight.yaml` in the root takes precedence over
 * the bundled default manifest.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'yaml';
import { CheckItem, CheckSpec, Manifest, SyntaxConfig } from '../../models/check.js';
import { CheckItemInput, ManifestInput, ManifestSchema, formatIssues } from '../../core/schemas.js';
import { ManifestError, NotFoundError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';

export const PROJECT_MANIFEST = 'preflight.yaml';
export const DEFAULT_MANIFEST = 'rooted-hypershell';

const BUNDLED_DIR = fileURLToPath(new URL('../../../manifests/', import.meta.url));
const MANIFEST_EXTENSION = '.yaml';

export interface ManifestServiceOptions {
  /** Root of the tree being validated */
  root: string;
  /** Directory holding bundled manifests */
  bundledDir?: string;
  /** Base for relative manifest paths given on the command line */
  cwd?: string;
}

export class ManifestService {
  private root: string;
  private bundledDir: string;
  private cwd: string;

  constructor(options: ManifestServiceOptions) {
    this.root = path.resolve(options.root);
    this.bundledDir = options.bundledDir ?? BUNDLED_DIR;
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Names of the bundled manifests, sorted
   */
  listBundled(): string[] {
    try {
      return fs.readdirSync(this.bundledDir)
        .filter(file => file.endsWith(MANIFEST_EXTENSION))
        .map(file => file.slice(0, -MANIFEST_EXTENSION.length))
        .sort();
    } catch (error) {
      getLogger().error('Bundled manifests unreadable', {
        dir: this.bundledDir,
        reason: error instanceof Error ? error.message : String(error)
      });
      return [];
    }
  }

  /**
   * Resolve a manifest reference to a file path.
   *
   * No reference: the project manifest if present, else the default bundle.
   * A bundled name wins over a same-named relative path.
   */
  resolve(ref?: string): string {
    if (ref === undefined) {
      const projectManifest = path.join(this.root, PROJECT_MANIFEST);
      if (isFile(projectManifest)) {
        return projectManifest;
      }
      return this.bundledPath(DEFAULT_MANIFEST);
    }

    if (this.listBundled().includes(ref)) {
      return this.bundledPath(ref);
    }

    const candidate = path.resolve(this.cwd, ref);
    if (isFile(candidate)) {
      return candidate;
    }

    throw new NotFoundError('Manifest', ref);
  }

  /**
   * Load and validate a manifest
   */
  load(ref?: string): Manifest {
    const file = this.resolve(ref);
    getLogger().debug('Loading manifest', { file });

    let content: string;
    try {
      content = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      throw new ManifestError(
        `Cannot read manifest: ${error instanceof Error ? error.message : String(error)}`,
        file
      );
    }

    return this.parse(content, file);
  }

  /**
   * Parse manifest text
   */
  parse(content: string, source: string): Manifest {
    let raw: unknown;
    try {
      raw = yaml.parse(content);
    } catch (error) {
      throw new ManifestError(
        `Manifest is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
        source
      );
    }

    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ManifestError('Manifest failed validation', source, formatIssues(parsed.error));
    }

    return normalizeManifest(parsed.data, source);
  }

  private bundledPath(name: string): string {
    return path.join(this.bundledDir, `${name}${MANIFEST_EXTENSION}`);
  }
}

function isFile(file: string): boolean {
  try {
    return fs.statSync(file).isFile();
  } catch {
    return false;
  }
}

/**
 * Fill in labels and titles left out of the manifest
 */
export function normalizeManifest(input: ManifestInput, source: string): Manifest {
  const syntax: SyntaxConfig = input.syntax;

  const components: CheckSpec[] = input.components.map(component => ({
    name: component.name,
    title: component.title ?? component.name,
    shortCircuit: component.shortCircuit,
    targets: component.targets.map(target => ({
      path: target.path,
      label: target.label ?? target.path,
      items: target.items.map(item => normalizeItem(item, syntax))
    }))
  }));

  return {
    name: input.name,
    syntax,
    components,
    summary: input.summary,
    source
  };
}

function normalizeItem(item: CheckItemInput, syntax: SyntaxConfig): CheckItem {
  const common = { expected: item.expected, blocking: item.blocking };

  switch (item.kind) {
    case 'function':
      return { ...common, kind: 'function', name: item.name, label: item.label ?? `Function: ${item.name}` };
    case 'class':
      return { ...common, kind: 'class', name: item.name, label: item.label ?? `Class: ${item.name}` };
    case 'registration':
      return {
        ...common,
        kind: 'registration',
        name: item.name,
        label: item.label ?? `Class registration: ${syntax.classNamespace}.${item.name}`
      };
    case 'literal':
      return { ...common, kind: 'literal', anyOf: item.anyOf, label: item.label ?? `Text: ${item.anyOf.join(' | ')}` };
    case 'inclusion':
      return { ...common, kind: 'inclusion', module: item.module, label: item.label ?? `Module required: ${item.module}` };
    case 'pattern':
      return { ...common, kind: 'pattern', pattern: item.pattern, label: item.label ?? `Pattern: ${item.pattern}` };
  }
}
