import { mkdtemp, mkdir, realpath, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

import type { InterpreterInfo } from '../../src/types/index.js';

export async function makeTempDir(prefix = 'modpm-test-'): Promise<string> {
  // realpath: /tmp is a symlink on some systems
  return realpath(await mkdtemp(join(tmpdir(), prefix)));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write files below `root`; keys are forward-slash relative paths.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, ...relativePath.split('/'));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function fakeInterpreter(prefix: string, overrides: Partial<InterpreterInfo> = {}): InterpreterInfo {
  return {
    executable: 'python3',
    version: [3, 11, 4],
    prefix,
    basePrefix: prefix,
    inVirtualEnv: false,
    ...overrides
  };
}
