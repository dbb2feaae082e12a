import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';

import { writeLedger } from '../../../src/core/install/ledger.js';
import type { LifecycleFactory } from '../../../src/core/lifecycle/package-lifecycle.js';
import { uninstallDirectory } from '../../../src/core/uninstall/uninstaller.js';
import { HookFailedError, InvalidManifestError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { makeTempDir, removeTempDir, writeFiles } from '../../helpers/fixtures.js';
import { RecordingOutput } from '../../helpers/recording-output.js';

const noHooks: LifecycleFactory = () => ({ run: async () => false });

describe('uninstallDirectory', () => {
  let root: string;
  let pkg: string;
  let output: RecordingOutput;

  beforeEach(async () => {
    root = await makeTempDir();
    pkg = join(root, 'modpm_modules', 'app');
    output = new RecordingOutput();
    await writeFiles(pkg, { 'modpm.yml': 'name: app\nversion: 1.0.0\n', 'main.py': '' });
    await writeFiles(root, { 'bin/app': '' });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('removes every ledger entry and the directory', async () => {
    await writeLedger(pkg, [join(pkg, 'main.py'), join(root, 'bin', 'app')]);

    const result = await uninstallDirectory(pkg, { output, lifecycle: noHooks });
    assert.equal(result.success, true);
    assert.equal(await exists(pkg), false);
    assert.equal(await exists(join(root, 'bin', 'app')), false);
    assert.deepEqual(output.texts('info'), [
      `Uninstalling "app@1.0.0" from "${pkg}"...`,
      `  Removed "${join(pkg, 'main.py')}"...`,
      `  Removed "${join(root, 'bin', 'app')}"...`
    ]);
  });

  it('warns about entries that are already gone', async () => {
    const missing = join(root, 'bin', 'gone');
    await writeLedger(pkg, [missing]);

    const result = await uninstallDirectory(pkg, { output, lifecycle: noHooks });
    assert.equal(result.success, true);
    const [warning] = output.texts('warn');
    assert.ok(warning?.startsWith(`  "${missing}": ENOENT`));
  });

  it('warns when there is no ledger', async () => {
    const result = await uninstallDirectory(pkg, { output, lifecycle: noHooks });
    assert.equal(result.success, true);
    assert.deepEqual(output.texts('warn'), ['  Warning: No `installed-files.txt` found in package directory']);
    assert.equal(await exists(pkg), false);
  });

  it('keeps the package when pre-uninstall fails', async () => {
    const failing: LifecycleFactory = manifest => ({
      run: async hook => {
        throw new HookFailedError(hook, manifest.identifier, new Error('exit code 2'));
      }
    });

    const result = await uninstallDirectory(pkg, { output, lifecycle: failing });
    assert.equal(result.success, false);
    assert.ok(result.error instanceof HookFailedError);
    assert.equal(await exists(join(pkg, 'main.py')), true);
    assert.equal(output.texts('error').at(-1), 'Error: pre-uninstall script failed.');
  });

  it('refuses an invalid manifest', async () => {
    await writeFiles(pkg, { 'modpm.yml': 'name: app\n' });

    const result = await uninstallDirectory(pkg, { output, lifecycle: noHooks, force: true });
    assert.equal(result.success, false);
    assert.ok(result.error instanceof InvalidManifestError);
    assert.equal(await exists(pkg), true);
  });
});
