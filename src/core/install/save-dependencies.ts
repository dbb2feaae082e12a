/**
 * Writes installed requirements back into the current package's modpm.yml
 * (`install --save` / `--save-dev`).
 */

import type { DependencySpec, ManifestData, PackageIdentity, Requirement } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { getManifestPath, loadManifest, writeManifest } from '../manifest/manifest.js';
import { toDependencySpec } from '../manifest/requirement.js';
import type { OutputPort } from '../ports/output.js';

export interface SavedDependencies {
  /** Native dependencies by package name */
  native: Map<string, DependencySpec>;
  /** pip dependencies by distribution name */
  pip: Record<string, string>;
}

/**
 * Registry installs pin to a tilde range of the version that was installed;
 * other sources are saved as requested.
 */
export function specForSave(req: Requirement, installed?: PackageIdentity): DependencySpec {
  if (req.type === 'registry' && installed) {
    return toDependencySpec({ ...req, selector: `~${installed.version}` });
  }
  return toDependencySpec(req);
}

/**
 * `>=<version>` of an installed pip distribution, or an empty specifier
 * when its metadata could not be read.
 */
export function pipSpecForSave(name: string, installed: PackageIdentity | null | undefined, output: OutputPort): string {
  if (!installed) {
    output.warn(`Warning: could not determine the installed version of "${name}", saving without a version`);
    return '';
  }
  return `>=${installed.version}`;
}

/**
 * Merge `saved` into the manifest of `packageDir` and rewrite it.
 * Existing entries with the same name are replaced.
 */
export async function saveDependencies(
  packageDir: string,
  saved: SavedDependencies,
  options: { dev: boolean }
): Promise<ManifestData> {
  const manifestPath = getManifestPath(packageDir);
  const data = (await loadManifest(manifestPath)).toData();
  const field = options.dev ? 'dev-dependencies' : 'dependencies';
  const pipField = options.dev ? 'dev-pip-dependencies' : 'pip-dependencies';

  if (saved.native.size > 0) {
    const deps = { ...(data[field] ?? {}) };
    for (const [name, spec] of saved.native) {
      deps[name] = spec;
    }
    data[field] = deps;
  }
  if (Object.keys(saved.pip).length > 0) {
    data[pipField] = { ...(data[pipField] ?? {}), ...saved.pip };
  }

  await writeManifest(manifestPath, data);
  logger.debug(`Saved ${saved.native.size + Object.keys(saved.pip).length} dependencies to ${manifestPath}`);
  return data;
}
