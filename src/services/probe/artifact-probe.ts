// Artifact probe - read-only file presence and content access under a fixed root

import * as fs from 'fs';
import * as path from 'path';
import { getLogger } from '../../core/logger.js';

/**
 * Presence and text access for artifacts relative to a root directory
 */
export interface ArtifactSource {
  readonly root: string;
  exists(artifactPath: string): boolean;
  read(artifactPath: string): string | null;
}

/**
 * Filesystem-backed artifact probe
 *
 * Every call stats or reads the file afresh; nothing is cached, so files
 * created during a run are seen by the next call.
 */
export class ArtifactProbe implements ArtifactSource {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Absolute location of an artifact
   */
  resolve(artifactPath: string): string {
    return path.resolve(this.root, artifactPath);
  }

  /**
   * True iff a regular file exists at the path
   */
  exists(artifactPath: string): boolean {
    try {
      return fs.statSync(this.resolve(artifactPath)).isFile();
    } catch {
      return false;
    }
  }

  /**
   * File text, or null when it cannot be read
   */
  read(artifactPath: string): string | null {
    try {
      return fs.readFileSync(this.resolve(artifactPath), 'utf-8');
    } catch (error) {
      getLogger().debug('Artifact unreadable', {
        path: artifactPath,
        reason: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }
}
