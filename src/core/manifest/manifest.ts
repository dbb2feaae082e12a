/**
 * Package manifest model (modpm.yml)
 *
 * A manifest is loaded once per package directory per operation and is
 * read-only afterwards.
 */

import { dirname, join, resolve } from 'path';
import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import * as semver from 'semver';

import type { DependencySpec, ManifestData, ManifestDist, Requirement } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { InvalidManifestError, NoManifestError, FileSystemError } from '../../utils/errors.js';
import { getErrorCode, writeTextFile } from '../../utils/fs.js';
import { isValidPackageName, parseDependencySpec } from './requirement.js';

export interface EvalContext {
  dev?: boolean;
}

type DependencyMapField = 'dependencies' | 'dev-dependencies';
type PipDependencyMapField = 'pip-dependencies' | 'dev-pip-dependencies';

export class PackageManifest {
  readonly name: string;
  readonly version: string;
  /** Absolute path of the manifest file that was read */
  readonly filename: string;
  /** Directory the package lives in (the install directory for linked installs) */
  readonly directory: string;
  readonly dependencies: ReadonlyMap<string, Requirement>;
  readonly devDependencies: ReadonlyMap<string, Requirement>;
  readonly pipDependencies: Readonly<Record<string, string>>;
  readonly devPipDependencies: Readonly<Record<string, string>>;
  readonly bin: Readonly<Record<string, string>>;
  readonly scripts: Readonly<Record<string, string>>;
  readonly dist: Required<ManifestDist>;
  readonly resolveRoot?: string;

  private readonly data: Readonly<ManifestData>;

  constructor(data: ManifestData, filename: string, directory: string) {
    this.data = data;
    this.filename = filename;
    this.directory = directory;
    this.name = data.name;
    this.version = data.version;
    this.dependencies = parseDependencyMap(data.dependencies, filename, 'dependencies');
    this.devDependencies = parseDependencyMap(data['dev-dependencies'], filename, 'dev-dependencies');
    this.pipDependencies = { ...(data['pip-dependencies'] ?? {}) };
    this.devPipDependencies = { ...(data['dev-pip-dependencies'] ?? {}) };
    this.bin = { ...(data.bin ?? {}) };
    this.scripts = { ...(data.scripts ?? {}) };
    this.dist = {
      include: [...(data.dist?.include ?? [])],
      exclude: [...(data.dist?.exclude ?? [])]
    };
    this.resolveRoot = data['resolve-root'];
  }

  get identifier(): string {
    return `${this.name}@${this.version}`;
  }

  /**
   * Raw field access with a default for absent fields.
   */
  get(field: string, defaultValue?: unknown): unknown {
    const value = this.data[field];
    return value === undefined ? defaultValue : value;
  }

  /**
   * Evaluate a context-conditional dependency field: `dev-<field>` entries
   * are merged over `<field>` when the context is a dev install.
   */
  evalFields(context: EvalContext, field: 'dependencies'): Map<string, Requirement>;
  evalFields(context: EvalContext, field: 'pip-dependencies'): Record<string, string>;
  evalFields(
    context: EvalContext,
    field: 'dependencies' | 'pip-dependencies'
  ): Map<string, Requirement> | Record<string, string> {
    if (field === 'dependencies') {
      const deps = new Map(this.dependencies);
      if (context.dev) {
        for (const [name, req] of this.devDependencies) {
          deps.set(name, req);
        }
      }
      return deps;
    }

    return context.dev
      ? { ...this.pipDependencies, ...this.devPipDependencies }
      : { ...this.pipDependencies };
  }

  /** Plain copy of the underlying manifest data, for rewriting the file. */
  toData(): ManifestData {
    return structuredClone(this.data);
  }
}

function parseDependencyMap(
  raw: Record<string, DependencySpec> | undefined,
  filename: string,
  field: DependencyMapField
): Map<string, Requirement> {
  const deps = new Map<string, Requirement>();
  for (const [name, spec] of Object.entries(raw ?? {})) {
    try {
      deps.set(name, parseDependencySpec(name, spec));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidManifestError(filename, `${field}: ${reason}`);
    }
  }
  return deps;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertStringMap(
  value: unknown,
  filename: string,
  field: PipDependencyMapField | 'bin' | 'scripts'
): asserts value is Record<string, string> | undefined {
  if (value === undefined) return;
  if (!isRecord(value) || Object.values(value).some(v => typeof v !== 'string')) {
    throw new InvalidManifestError(filename, `${field} must be a mapping of strings`);
  }
}

function assertDependencyMap(
  value: unknown,
  filename: string,
  field: DependencyMapField
): asserts value is Record<string, DependencySpec> | undefined {
  if (value === undefined) return;
  if (!isRecord(value) || Object.values(value).some(v => typeof v !== 'string' && !isRecord(v))) {
    throw new InvalidManifestError(filename, `${field} must map names to specifiers`);
  }
}

function assertStringList(value: unknown, filename: string, field: string): asserts value is string[] | undefined {
  if (value === undefined) return;
  if (!Array.isArray(value) || value.some(v => typeof v !== 'string')) {
    throw new InvalidManifestError(filename, `${field} must be a list of strings`);
  }
}

const KNOWN_FIELDS = new Set([
  'name',
  'version',
  'description',
  'author',
  'license',
  'dependencies',
  'dev-dependencies',
  'pip-dependencies',
  'dev-pip-dependencies',
  'bin',
  'scripts',
  'dist',
  'resolve-root'
]);

/**
 * Validate raw YAML content into ManifestData
 */
export function validateManifestData(raw: unknown, filename: string): ManifestData {
  if (!isRecord(raw)) {
    throw new InvalidManifestError(filename, 'manifest must be a mapping');
  }

  const { name, version } = raw;
  if (typeof name !== 'string' || !name) {
    throw new InvalidManifestError(filename, 'missing name field');
  }
  if (!isValidPackageName(name)) {
    throw new InvalidManifestError(filename, `invalid package name '${name}'`);
  }
  if (typeof version !== 'string' && typeof version !== 'number') {
    throw new InvalidManifestError(filename, 'missing version field');
  }
  const versionString = String(version);
  const normalizedVersion = semver.valid(versionString);
  if (normalizedVersion === null) {
    throw new InvalidManifestError(filename, `invalid version '${versionString}'`);
  }

  const dependencies = raw.dependencies;
  const devDependencies = raw['dev-dependencies'];
  const pipDependencies = raw['pip-dependencies'];
  const devPipDependencies = raw['dev-pip-dependencies'];
  const bin = raw.bin;
  const scripts = raw.scripts;
  assertDependencyMap(dependencies, filename, 'dependencies');
  assertDependencyMap(devDependencies, filename, 'dev-dependencies');
  assertStringMap(pipDependencies, filename, 'pip-dependencies');
  assertStringMap(devPipDependencies, filename, 'dev-pip-dependencies');
  assertStringMap(bin, filename, 'bin');
  assertStringMap(scripts, filename, 'scripts');

  let dist: ManifestDist | undefined;
  const rawDist = raw.dist;
  if (rawDist !== undefined) {
    if (!isRecord(rawDist)) {
      throw new InvalidManifestError(filename, 'dist must be a mapping');
    }
    const { include, exclude } = rawDist;
    assertStringList(include, filename, 'dist.include');
    assertStringList(exclude, filename, 'dist.exclude');
    dist = {};
    if (include !== undefined) dist.include = include;
    if (exclude !== undefined) dist.exclude = exclude;
  }

  const resolveRoot = raw['resolve-root'];
  if (resolveRoot !== undefined && typeof resolveRoot !== 'string') {
    throw new InvalidManifestError(filename, 'resolve-root must be a string');
  }

  const data: ManifestData = { name, version: normalizedVersion };
  for (const key of ['description', 'author', 'license'] as const) {
    const value = raw[key];
    if (value !== undefined) {
      if (typeof value !== 'string') {
        throw new InvalidManifestError(filename, `${key} must be a string`);
      }
      data[key] = value;
    }
  }
  // Unknown fields are kept as they are; absent optional fields stay absent
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_FIELDS.has(key)) {
      data[key] = value;
    }
  }
  if (dependencies !== undefined) data.dependencies = dependencies;
  if (devDependencies !== undefined) data['dev-dependencies'] = devDependencies;
  if (pipDependencies !== undefined) data['pip-dependencies'] = pipDependencies;
  if (devPipDependencies !== undefined) data['dev-pip-dependencies'] = devPipDependencies;
  if (bin !== undefined) data.bin = bin;
  if (scripts !== undefined) data.scripts = scripts;
  if (dist !== undefined) data.dist = dist;
  if (resolveRoot !== undefined) data['resolve-root'] = resolveRoot;
  return data;
}

/**
 * Parse manifest text. `directory` defaults to the manifest's own directory.
 */
export function parseManifest(content: string, filename: string, directory?: string): PackageManifest {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidManifestError(filename, reason);
  }
  const data = validateManifestData(raw, filename);
  return new PackageManifest(data, filename, directory ?? dirname(filename));
}

/**
 * Load a manifest file.
 * Fails with NoManifestError when the file is absent and InvalidManifestError when malformed.
 */
export async function loadManifest(filename: string, options: { directory?: string } = {}): Promise<PackageManifest> {
  const absolute = resolve(filename);
  let content: string;
  try {
    content = await fs.readFile(absolute, 'utf8');
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new NoManifestError(dirname(absolute));
    }
    throw new FileSystemError(`Failed to read manifest: ${absolute}`, { error });
  }
  return parseManifest(content, absolute, options.directory ? resolve(options.directory) : undefined);
}

export function getManifestPath(directory: string): string {
  return join(directory, FILE_PATTERNS.MANIFEST);
}

/**
 * Serialize manifest data with consistent formatting
 */
export function serializeManifest(data: ManifestData): string {
  return yaml.dump(data, {
    indent: 2,
    noArrayIndent: true,
    sortKeys: false,
    quotingType: '"'
  });
}

export async function writeManifest(filename: string, data: ManifestData): Promise<void> {
  await writeTextFile(filename, serializeManifest(data));
}
