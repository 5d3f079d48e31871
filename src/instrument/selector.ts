/**
 * Inclusion policy: which source files belong to the traced project.
 *
 * Rules are checked in order and the first one that matches decides:
 *   1. the file must resolve to a path inside the project root;
 *   2. no directory between the file and the root may be an isolated
 *      environment (virtualenv, conda env, package-manager store);
 *   3. the path must not pass through a third-party package directory;
 *   4. the path must not lie in the running Node.js installation's own
 *      directories under its prefix.
 */

import * as fs from 'fs';
import * as path from 'path';

export type ExclusionReason =
  | 'outside-project'
  | 'isolated-environment'
  | 'third-party-directory'
  | 'runtime-installation';

export type InclusionDecision = { include: true } | { include: false; reason: ExclusionReason };

export interface SelectorOptions {
  /** Installation prefix of the runtime (default: derived from process.execPath) */
  runtimePrefix?: string;
}

/** Files whose presence marks a directory as an environment root. */
export const ENVIRONMENT_MARKER_FILES = [
  'pyvenv.cfg',
  '.package-lock.json',
  '.modules.yaml',
  '.yarn-state.yml',
  '.yarn-integrity',
];

/** Directories whose presence marks a directory as an environment root. */
export const ENVIRONMENT_MARKER_DIRS = ['conda-meta', '.pnpm'];

export const THIRD_PARTY_DIRS = [
  'node_modules',
  'bower_components',
  'jspm_packages',
  'site-packages',
  'dist-packages',
];

export function defaultRuntimePrefix(): string {
  // <prefix>/bin/node
  return path.dirname(path.dirname(process.execPath));
}

/**
 * Directories a Node.js installation owns under its prefix. The prefix
 * itself is often shared (`/usr`, `/usr/local`) and may hold projects.
 */
export function runtimeDirectories(prefix: string): string[] {
  return [
    path.join(prefix, 'bin'),
    path.join(prefix, 'lib', 'node_modules'),
    path.join(prefix, 'include', 'node'),
    path.join(prefix, 'share', 'doc', 'node'),
  ];
}

function realpath(p: string): string {
  try {
    return fs.realpathSync(p);
  } catch {
    return path.resolve(p);
  }
}

export function isInside(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

function isEnvironmentRoot(dir: string): boolean {
  for (const marker of ENVIRONMENT_MARKER_FILES) {
    if (fs.existsSync(path.join(dir, marker))) {
      return true;
    }
  }
  for (const marker of ENVIRONMENT_MARKER_DIRS) {
    try {
      if (fs.statSync(path.join(dir, marker)).isDirectory()) {
        return true;
      }
    } catch {
      // marker absent
    }
  }
  return false;
}

/**
 * Decide whether `filename` should be instrumented for the project at
 * `projectRoot`.
 */
export function shouldInstrument(
  projectRoot: string,
  filename: string,
  options: SelectorOptions = {}
): InclusionDecision {
  const root = realpath(projectRoot);
  const file = realpath(filename);

  if (!isInside(root, file)) {
    return { include: false, reason: 'outside-project' };
  }

  for (let dir = path.dirname(file); dir !== root && isInside(root, dir); dir = path.dirname(dir)) {
    if (isEnvironmentRoot(dir)) {
      return { include: false, reason: 'isolated-environment' };
    }
  }

  const segments = path.relative(root, file).split(path.sep);
  if (segments.some((segment) => THIRD_PARTY_DIRS.includes(segment))) {
    return { include: false, reason: 'third-party-directory' };
  }

  const prefix = realpath(options.runtimePrefix ?? defaultRuntimePrefix());
  if (runtimeDirectories(prefix).some((dir) => isInside(dir, file))) {
    return { include: false, reason: 'runtime-installation' };
  }

  return { include: true };
}

/**
 * Dotted module name of `filename` relative to the project root, e.g.
 * `src/lib/math.ts` → `src.lib.math`. Files outside the root use their
 * base name.
 */
export function moduleName(projectRoot: string, filename: string): string {
  const rel = path.relative(projectRoot, filename);
  const inside = rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
  const target = inside ? rel : path.basename(filename);
  const ext = path.extname(target);
  const stem = ext ? target.slice(0, -ext.length) : target;
  return stem.split(path.sep).join('.');
}
