/**
 * ProjectSnapshot - read-only views of the target directory
 *
 * - takeFileTreeSnapshot: files, directories and well-known key files
 * - getFileTreeWithContents: structure plus source/config contents for the debugger
 * - detectEnvironment / detectProjectType: what kind of project this is and
 *   what still needs setting up
 */

import fs from 'fs';
import path from 'path';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { TEXT_LIMITS } from './constants/Timeouts';
import type { EnvInfo, FileTreeSnapshot, FileTreeWithContents, ProjectType } from './types/ExecutionTypes';

export const KEY_FILES: ReadonlySet<string> = new Set([
  'package.json',
  'requirements.txt',
  'Pipfile',
  'pyproject.toml',
  '.env',
  '.env.example',
  'Dockerfile',
  'docker-compose.yml',
  'README.md',
  'Makefile',
]);

const SNAPSHOT_IGNORED = new Set(['node_modules', '__pycache__', 'venv', 'env', '.git']);

const DEBUG_IGNORED = new Set(['venv', 'env', '__pycache__', 'node_modules']);

const DEBUG_EXTENSIONS = new Set(['.py', '.js', '.jsx', '.ts', '.tsx', '.json', '.yaml', '.yml', '.ini', '.cfg', '.toml']);

export interface TreeEntry {
  /** Relative path with forward slashes */
  relativePath: string;
  absolutePath: string;
  name: string;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * Depth-first walk in name order. A skipped directory is not descended into.
 */
export function walkTree(root: string, skip: (name: string) => boolean): TreeEntry[] {
  const entries: TreeEntry[] = [];

  const visit = (dir: string, prefix: string) => {
    let children: fs.Dirent[];
    try {
      children = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      Logger.debug(`[ProjectSnapshot] Cannot read ${dir}: ${getErrorMessage(error)}`);
      return;
    }

    children.sort((a, b) => a.name.localeCompare(b.name));
    for (const child of children) {
      if (skip(child.name)) continue;

      const relativePath = prefix ? `${prefix}/${child.name}` : child.name;
      const absolutePath = path.join(dir, child.name);
      const isDirectory = child.isDirectory();
      entries.push({ relativePath, absolutePath, name: child.name, isFile: child.isFile(), isDirectory });

      if (isDirectory) {
        visit(absolutePath, relativePath);
      }
    }
  };

  visit(root, '');
  return entries;
}

/**
 * Absolute path of a collaborator-supplied relative path
 * @throws when the path resolves outside `root`
 */
export function resolveInProject(root: string, relativePath: string): string {
  const resolved = path.resolve(root, relativePath);
  const relative = path.relative(path.resolve(root), resolved);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new Error(`Path escapes the project directory: ${relativePath}`);
  }
  return resolved;
}

export function takeFileTreeSnapshot(targetDir: string): FileTreeSnapshot {
  const snapshot: FileTreeSnapshot = { files: [], directories: [], keyFiles: {} };

  for (const entry of walkTree(targetDir, (name) => name.startsWith('.') || SNAPSHOT_IGNORED.has(name))) {
    if (entry.isFile) {
      snapshot.files.push(entry.relativePath);
      if (KEY_FILES.has(entry.name) && !(entry.name in snapshot.keyFiles)) {
        snapshot.keyFiles[entry.name] = entry.relativePath;
      }
    } else if (entry.isDirectory) {
      snapshot.directories.push(entry.relativePath);
    }
  }

  // Hidden key files (.env, .env.example) only count at the top level
  for (const name of ['.env', '.env.example']) {
    if (fs.existsSync(path.join(targetDir, name))) {
      snapshot.keyFiles[name] = name;
    }
  }

  Logger.info(`✓ Found ${snapshot.files.length} files and ${snapshot.directories.length} directories`, {
    keyFiles: Object.keys(snapshot.keyFiles),
  });

  return snapshot;
}

export function getFileTreeWithContents(
  targetDir: string,
  maxFiles: number = TEXT_LIMITS.DEBUG_MAX_FILES
): FileTreeWithContents {
  const tree: FileTreeWithContents = { structure: [], files: {} };

  for (const entry of walkTree(targetDir, (name) => name.startsWith('.') || DEBUG_IGNORED.has(name))) {
    tree.structure.push(entry.relativePath);

    if (!entry.isFile || Object.keys(tree.files).length >= maxFiles) continue;
    if (!DEBUG_EXTENSIONS.has(path.extname(entry.name))) continue;

    try {
      tree.files[entry.relativePath] = fs.readFileSync(entry.absolutePath, 'utf-8').substring(0, TEXT_LIMITS.DEBUG_FILE_CHARS);
    } catch (error) {
      Logger.debug(`[ProjectSnapshot] Skipping unreadable ${entry.relativePath}: ${getErrorMessage(error)}`);
    }
  }

  return tree;
}

export function detectEnvironment(snapshot: FileTreeSnapshot, targetDir: string): EnvInfo {
  const envInfo: EnvInfo = {
    projectType: 'unknown',
    hasEnvFile: false,
    needsSetup: [],
    detectedDependencies: [],
  };
  const keyFiles = snapshot.keyFiles;

  if ('package.json' in keyFiles) {
    envInfo.projectType = 'node';
    envInfo.detectedDependencies.push('npm/yarn');
    if (!fs.existsSync(path.join(targetDir, 'node_modules'))) {
      envInfo.needsSetup.push('npm install');
    }
  }

  if ('requirements.txt' in keyFiles || 'pyproject.toml' in keyFiles || 'Pipfile' in keyFiles) {
    envInfo.projectType = 'python';
    envInfo.detectedDependencies.push('pip/poetry');
    if (!['venv', 'env', '.venv'].some((dir) => fs.existsSync(path.join(targetDir, dir)))) {
      envInfo.needsSetup.push('python virtual environment');
    }
  }

  if ('.env' in keyFiles) {
    envInfo.hasEnvFile = true;
  } else if ('.env.example' in keyFiles) {
    envInfo.needsSetup.push('copy .env.example to .env');
  } else {
    envInfo.needsSetup.push('create .env file');
  }

  if ('Dockerfile' in keyFiles || 'docker-compose.yml' in keyFiles) {
    envInfo.detectedDependencies.push('docker');
  }

  Logger.info(`✓ Project type: ${envInfo.projectType}`, { needsSetup: envInfo.needsSetup });
  return envInfo;
}

/**
 * Quick check on marker files at the top level
 */
export function detectProjectType(targetDir: string): ProjectType {
  if (fs.existsSync(path.join(targetDir, 'package.json'))) {
    return 'node';
  }
  if (['requirements.txt', 'pyproject.toml'].some((file) => fs.existsSync(path.join(targetDir, file)))) {
    return 'python';
  }
  return 'unknown';
}

/**
 * package.json scripts, or an empty map when missing or unreadable
 */
export function readPackageScripts(projectDir: string): Record<string, string> {
  const packageJsonPath = path.join(projectDir, 'package.json');
  if (!fs.existsSync(packageJsonPath)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || !('scripts' in parsed)) {
      return {};
    }
    const scripts = parsed.scripts;
    if (typeof scripts !== 'object' || scripts === null) {
      return {};
    }
    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(scripts)) {
      if (typeof value === 'string') {
        result[name] = value;
      }
    }
    return result;
  } catch (error) {
    Logger.debug(`[ProjectSnapshot] Unreadable ${packageJsonPath}: ${getErrorMessage(error)}`);
    return {};
  }
}
