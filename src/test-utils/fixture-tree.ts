// Temporary directory trees for tests

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ArtifactSource } from '../services/probe/artifact-probe.js';

/**
 * Creates a temp directory holding the given files (path -> content)
 */
export function createTree(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'preflight-test-'));
  writeFiles(root, files);
  return root;
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf-8');
  }
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

/**
 * In-memory artifact source. A null entry exists but cannot be read.
 */
export class MemorySource implements ArtifactSource {
  readonly root = '/virtual';

  constructor(private files: Record<string, string | null>) {}

  exists(artifactPath: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.files, artifactPath);
  }

  read(artifactPath: string): string | null {
    return this.files[artifactPath] ?? null;
  }
}

/**
 * A tree satisfying every component of the rooted-hypershell manifest
 */
export function completeHypershellTree(): Record<string, string> {
  return {
    'rooted_tree.lua': [
      'local RootedTree = {}',
      'function RootedTree.new(value) end',
      'function RootedTree:addChild(child) end',
      'function RootedTree:getNodesAtDepth(depth) end',
      'function RootedTree:traverseDFS(visit) end',
      'function RootedTree:traverseBFS(visit) end',
      'function RootedTree:getLeaves() end',
      'local function countRootedTrees(n) end',
      '-- OEIS A000081',
      'function RootedTree.getA000081Sequence(n) end',
      'return RootedTree'
    ].join('\n'),
    'hypershell.lua': [
      'local Hypershell = {}',
      'function Hypershell.new(tree) end',
      'function Hypershell:buildShells() end',
      'function Hypershell:getShell(index) end',
      'function Hypershell:getNodeDepth(node) end',
      'function Hypershell:propagateOutward(signal) end',
      'function Hypershell:propagateInward(signal) end',
      'function Hypershell:spreadAttention(source) end',
      'return Hypershell'
    ].join('\n'),
    'rooted_hypershell.lua': [
      "local RootedHypershell, parent = torch.class('nn.RootedHypershell', 'nn.Module')",
      'function RootedHypershell:updateOutput(input) end',
      'function RootedHypershell:updateGradInput(input, gradOutput) end',
      'function RootedHypershell:buildTreeFromShells() end',
      'function RootedHypershell:spreadAttention(source) end',
      'function RootedHypershell:hierarchicalInference(query) end',
      'function RootedHypershell:getRelevantNodes(query) end'
    ].join('\n'),
    'test/test_rooted_hypershell.lua': [
      'local function testRootedTreeBasics() end',
      'local function testRootedTreeTraversal() end',
      'local function testA000081Sequence() end',
      'local function testHypershellCreation() end',
      'local function testRootedHypershell() end'
    ].join('\n'),
    'examples/rooted_hypershell_example.lua': [
      "local RootedTree = require('nngraph.rooted_tree')",
      "local Hypershell = require('nngraph.hypershell')",
      'local model = nn.RootedHypershell(space, root)',
      'print(RootedTree.getA000081Sequence(8)) -- A000081',
      'model:spreadAttention(root)'
    ].join('\n'),
    'doc/ROOTED_HYPERSHELL.md': '# Rooted Hypershell\n\nRootedTree enumerates A000081. Hypershell groups nodes by depth.\n',
    'README.md': '# nngraph\n\nIncludes the Rooted Hypershell architecture.\n',
    'init.lua': [
      "require('nngraph.rooted_tree')",
      'require("nngraph.hypershell")',
      "require('nngraph.rooted_hypershell')"
    ].join('\n')
  };
}
