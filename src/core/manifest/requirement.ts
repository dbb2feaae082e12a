/**
 * Requirement parsing
 *
 * A requirement names exactly one source: a registry selector, a git URL
 * (`git+<url>[@<ref>]`), or a filesystem path (directory or archive).
 * Requirements are parsed once and never mutated afterwards.
 */

import { isAbsolute } from 'path';
import type {
  DependencySpec,
  GitRequirement,
  PathRequirement,
  RegistryRequirement,
  Requirement,
  RequirementObject
} from '../../types/index.js';
import { ARCHIVE_EXTENSIONS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { isValidSelector } from './selector.js';

export const PACKAGE_NAME_REGEX = /^(?:@[A-Za-z0-9][\w.-]*\/)?[A-Za-z0-9][\w.-]*$/;

const GIT_PREFIX = 'git+';
const FILE_PREFIX = 'file:';

export interface RequirementFlagsInput {
  internal?: boolean;
  pure?: boolean;
  link?: boolean;
  recursive?: boolean;
}

export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME_REGEX.test(name);
}

export function isArchivePath(path: string): boolean {
  const lower = path.toLowerCase();
  return ARCHIVE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

function looksLikePath(spec: string): boolean {
  return (
    spec === '.' ||
    spec === '..' ||
    spec.startsWith('./') ||
    spec.startsWith('../') ||
    spec.startsWith('.\\') ||
    spec.startsWith('..\\') ||
    spec.startsWith('~/') ||
    spec.startsWith(FILE_PREFIX) ||
    isAbsolute(spec) ||
    isArchivePath(spec)
  );
}

/**
 * Split an optional `@ref` (or `#ref`) suffix from a git URL.
 * Only an `@` after the last `/` counts, so `git@host:owner/repo` keeps its user part.
 */
export function splitGitRef(spec: string): { url: string; ref?: string } {
  const hashIndex = spec.indexOf('#');
  if (hashIndex !== -1) {
    const ref = spec.slice(hashIndex + 1);
    return { url: spec.slice(0, hashIndex), ...(ref ? { ref } : {}) };
  }

  const atIndex = spec.lastIndexOf('@');
  const slashIndex = spec.lastIndexOf('/');
  if (atIndex > slashIndex && atIndex > 0) {
    const ref = spec.slice(atIndex + 1);
    return { url: spec.slice(0, atIndex), ...(ref ? { ref } : {}) };
  }
  return { url: spec };
}

function gitRequirement(name: string | undefined, rest: string, flags: RequirementFlagsInput): GitRequirement {
  const { url, ref } = splitGitRef(rest);
  if (!url) {
    throw new ValidationError(`Missing URL in git requirement 'git+${rest}'`);
  }
  return {
    type: 'git',
    ...(name ? { name } : {}),
    url,
    ...(ref ? { ref } : {}),
    recursive: flags.recursive ?? false,
    internal: flags.internal ?? false,
    pure: flags.pure ?? false
  };
}

function pathRequirement(name: string | undefined, path: string, flags: RequirementFlagsInput): PathRequirement {
  const cleaned = path.startsWith(FILE_PREFIX) ? path.slice(FILE_PREFIX.length) : path;
  if (!cleaned) {
    throw new ValidationError(`Empty path requirement '${path}'`);
  }
  return {
    type: 'path',
    ...(name ? { name } : {}),
    path: cleaned,
    link: flags.link ?? false,
    internal: flags.internal ?? false,
    pure: flags.pure ?? false
  };
}

function registryRequirement(name: string, selector: string, flags: RequirementFlagsInput): RegistryRequirement {
  if (!isValidPackageName(name)) {
    throw new ValidationError(`Invalid package name '${name}'`);
  }
  const normalizedSelector = selector.trim() || '*';
  if (!isValidSelector(normalizedSelector)) {
    throw new ValidationError(`Invalid version selector '${selector}' for package '${name}'`);
  }
  return {
    type: 'registry',
    name,
    selector: normalizedSelector,
    internal: flags.internal ?? false,
    pure: flags.pure ?? false
  };
}

/**
 * Parse a full command-line specifier:
 *   [@scope/]name[@selector] | git+<url>[@ref] | <path> | <archive>
 */
export function parseRequirement(spec: string, flags: RequirementFlagsInput = {}): Requirement {
  const trimmed = spec.trim();
  if (!trimmed) {
    throw new ValidationError('Empty requirement');
  }

  if (trimmed.startsWith(GIT_PREFIX)) {
    return gitRequirement(undefined, trimmed.slice(GIT_PREFIX.length), flags);
  }
  if (looksLikePath(trimmed)) {
    return pathRequirement(undefined, trimmed, flags);
  }

  // Scoped names start with '@', the selector separator is the next '@'
  const atIndex = trimmed.indexOf('@', trimmed.startsWith('@') ? 1 : 0);
  if (atIndex === -1) {
    return registryRequirement(trimmed, '*', flags);
  }
  return registryRequirement(trimmed.slice(0, atIndex), trimmed.slice(atIndex + 1), flags);
}

/**
 * Parse the value side of a `dependencies` entry in modpm.yml.
 * A string is a selector, a `git+` URL or a path; an object names its source explicitly.
 */
export function parseDependencySpec(name: string, spec: DependencySpec): Requirement {
  if (!isValidPackageName(name)) {
    throw new ValidationError(`Invalid dependency name '${name}'`);
  }

  if (typeof spec === 'string') {
    const trimmed = spec.trim();
    if (trimmed.startsWith(GIT_PREFIX)) {
      return gitRequirement(name, trimmed.slice(GIT_PREFIX.length), {});
    }
    if (looksLikePath(trimmed)) {
      return pathRequirement(name, trimmed, {});
    }
    return registryRequirement(name, trimmed, {});
  }

  return requirementFromObject(name, spec);
}

function requirementFromObject(name: string, spec: RequirementObject): Requirement {
  const sources = [spec.version, spec.git, spec.path].filter(value => value !== undefined);
  if (sources.length !== 1) {
    throw new ValidationError(
      `Dependency '${name}' must specify exactly one source: version, git, or path`
    );
  }
  if (spec.ref !== undefined && spec.git === undefined) {
    throw new ValidationError(`Dependency '${name}' has ref but no git source`);
  }

  const flags: RequirementFlagsInput = {
    internal: spec.internal,
    pure: spec.pure,
    link: spec.link,
    recursive: spec.recursive
  };

  if (spec.git !== undefined) {
    const gitSpec = spec.ref !== undefined ? `${spec.git}@${spec.ref}` : spec.git;
    const stripped = gitSpec.startsWith(GIT_PREFIX) ? gitSpec.slice(GIT_PREFIX.length) : gitSpec;
    return gitRequirement(name, stripped, flags);
  }
  if (spec.path !== undefined) {
    return pathRequirement(name, spec.path, flags);
  }
  return registryRequirement(name, spec.version ?? '*', flags);
}

/**
 * Render a requirement back to the string form accepted by parseDependencySpec.
 */
export function formatRequirement(req: Requirement): string {
  switch (req.type) {
    case 'registry':
      return req.selector;
    case 'git':
      return `${GIT_PREFIX}${req.url}${req.ref ? `@${req.ref}` : ''}`;
    case 'path':
      return req.path;
  }
}

/**
 * Whether a requirement needs the object form in modpm.yml to keep its flags.
 */
export function hasRequirementFlags(req: Requirement): boolean {
  return req.internal || req.pure || (req.type === 'path' && req.link) || (req.type === 'git' && req.recursive);
}

/**
 * Render a requirement for saving into modpm.yml, using the object form only when flags need it.
 */
export function toDependencySpec(req: Requirement): DependencySpec {
  if (!hasRequirementFlags(req)) {
    return formatRequirement(req);
  }

  const spec: RequirementObject = {};
  switch (req.type) {
    case 'registry':
      spec.version = req.selector;
      break;
    case 'git':
      spec.git = req.url;
      if (req.ref) spec.ref = req.ref;
      if (req.recursive) spec.recursive = true;
      break;
    case 'path':
      spec.path = req.path;
      if (req.link) spec.link = true;
      break;
  }
  if (req.internal) spec.internal = true;
  if (req.pure) spec.pure = true;
  return spec;
}

/**
 * Human readable source label used in progress messages.
 */
export function describeRequirementSource(req: Requirement): string {
  switch (req.type) {
    case 'registry':
      return `${req.name}@${req.selector}`;
    case 'git':
      return `${req.url}${req.ref ? `@${req.ref}` : ''}`;
    case 'path':
      return req.path;
  }
}
