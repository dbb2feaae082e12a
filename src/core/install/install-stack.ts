import type { PackageManifest } from '../manifest/manifest.js';

export interface InstallStackEntry {
  manifest: PackageManifest;
  /** Install directory of the package */
  directory: string;
}

/**
 * Chain of packages currently being installed, innermost last. Internal
 * dependencies resolve into the nested scope of the innermost entry.
 *
 * One stack belongs to one top-level install call and is passed down the
 * call chain explicitly.
 */
export class InstallStack {
  private readonly entries: InstallStackEntry[] = [];

  top(): InstallStackEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  /**
   * Run `fn` with the package pushed; the entry is popped when `fn` settles.
   */
  async withEntry<T>(manifest: PackageManifest, directory: string, fn: () => Promise<T>): Promise<T> {
    this.entries.push({ manifest, directory });
    try {
      return await fn();
    } finally {
      this.entries.pop();
    }
  }
}
