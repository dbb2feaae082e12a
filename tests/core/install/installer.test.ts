import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { createReadStream } from 'fs';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import * as tar from 'tar';

import { Installer, type InstallerCollaborators } from '../../../src/core/install/installer.js';
import { readLedger } from '../../../src/core/install/ledger.js';
import type { Lifecycle, LifecycleFactory } from '../../../src/core/lifecycle/package-lifecycle.js';
import { parseRequirement } from '../../../src/core/manifest/requirement.js';
import { selectVersion, type VersionSelector } from '../../../src/core/manifest/selector.js';
import type { RegistryClient } from '../../../src/core/registry/registry-client.js';
import { ScriptMaker } from '../../../src/core/scripts/script-maker.js';
import type { InstallerOptions } from '../../../src/types/index.js';
import {
  BridgeInstallFailedError,
  CloneFailedError,
  HookFailedError,
  NoManifestError,
  PackageNotFoundError,
  UninstallFailedError
} from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import type { GitCloneOptions } from '../../../src/utils/git-clone.js';
import { fakeInterpreter, makeTempDir, removeTempDir, writeFiles } from '../../helpers/fixtures.js';
import { RecordingOutput } from '../../helpers/recording-output.js';

interface HookCall {
  hook: string;
  identifier: string;
}

function recordingLifecycle(calls: HookCall[], failing?: string): LifecycleFactory {
  return (manifest): Lifecycle => ({
    async run(hook) {
      calls.push({ hook, identifier: manifest.identifier });
      if (hook === failing) {
        throw new Error('exit code 1');
      }
      return manifest.scripts[hook] !== undefined;
    }
  });
}

describe('Installer', () => {
  let root: string;
  let project: string;
  let modules: string;
  let output: RecordingOutput;
  let hooks: HookCall[];

  function createInstaller(options: InstallerOptions = {}, overrides: Partial<InstallerCollaborators> = {}): Installer {
    return new Installer(
      {
        interpreter: fakeInterpreter('/opt/py'),
        cwd: project,
        output,
        modpmHome: join(root, 'home'),
        scriptMaker: new ScriptMaker({ directory: join(modules, '.bin'), runtimeCommand: 'modpy', platform: 'linux' }),
        lifecycle: recordingLifecycle(hooks),
        gitClone: async () => {
          throw new Error('unexpected clone');
        },
        pipRunner: async () => 0,
        ...overrides
      },
      options
    );
  }

  async function packRegistryArchive(name: string, version: string): Promise<string> {
    const staging = join(root, 'staging');
    await writeFiles(staging, {
      [`${name}-${version}/modpm.yml`]: `name: ${name}\nversion: ${version}\n`,
      [`${name}-${version}/${name}.py`]: ''
    });
    const archive = join(root, `${name}-${version}.tar.gz`);
    await tar.c({ gzip: true, file: archive, cwd: staging }, [`${name}-${version}`]);
    return archive;
  }

  function fakeRegistry(versions: string[], archive: string, downloads: string[]): RegistryClient {
    return {
      name: 'test',
      baseUrl: 'https://registry.example.com',
      async findPackage(name: string, selector: VersionSelector) {
        const version = selectVersion(versions, selector);
        return version === null ? null : { name, version };
      },
      async download(name: string, version: string) {
        downloads.push(`${name}@${version}`);
        return { filename: `${name}-${version}.tar.gz`, stream: createReadStream(archive) };
      }
    };
  }

  beforeEach(async () => {
    root = await makeTempDir();
    project = join(root, 'project');
    modules = join(project, 'modpm_modules');
    output = new RecordingOutput();
    hooks = [];
    await writeFiles(join(root, 'src', 'app'), {
      'modpm.yml': 'name: app\nversion: 1.0.0\nbin:\n  app: main.py\n',
      'main.py': 'print("app")\n',
      'notes.pyc': ''
    });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('installFromDirectory', () => {
    it('copies the package files and writes the ledger', async () => {
      const result = await createInstaller().installFromDirectory(join(root, 'src', 'app'));

      assert.equal(result.success, true);
      assert.equal(result.manifest?.identifier, 'app@1.0.0');
      const target = join(modules, 'app');
      assert.deepEqual((await readdir(target)).sort(), ['installed-files.txt', 'main.py', 'modpm.yml']);
      assert.deepEqual(await readLedger(target), [
        join(target, 'main.py'),
        join(target, 'modpm.yml'),
        join(modules, '.bin', 'app')
      ]);
      const script = await readFile(join(modules, '.bin', 'app'), 'utf8');
      assert.equal(script.split('\n').at(-2), `exec 'modpy' '${join(target, 'main.py')}' "$@"`);
      assert.deepEqual(hooks, [
        { hook: 'pre-install', identifier: 'app@1.0.0' },
        { hook: 'post-install', identifier: 'app@1.0.0' }
      ]);
    });

    it('leaves an existing install alone without upgrade', async () => {
      const installer = createInstaller();
      await installer.installFromDirectory(join(root, 'src', 'app'));
      await writeFiles(join(root, 'src', 'app'), { 'modpm.yml': 'name: app\nversion: 1.1.0\n' });

      const result = await installer.installFromDirectory(join(root, 'src', 'app'));
      assert.equal(result.success, true);
      assert.equal(result.manifest?.version, '1.0.0');
      assert.equal(
        output.texts('info').at(-1),
        `  Note: install directory "${join(modules, 'app')}" already exists, specify --upgrade`
      );
    });

    it('replaces an existing install when upgrading', async () => {
      await createInstaller().installFromDirectory(join(root, 'src', 'app'));
      await writeFiles(join(root, 'src', 'app'), { 'modpm.yml': 'name: app\nversion: 1.1.0\n' });

      const result = await createInstaller({ upgrade: true }).installFromDirectory(join(root, 'src', 'app'));
      assert.equal(result.success, true);
      assert.equal(result.manifest?.version, '1.1.0');
      assert.equal(await exists(join(modules, '.bin', 'app')), false);
      assert.ok(output.texts('info').includes(`Uninstalling "app@1.0.0" from "${join(modules, 'app')}" before upgrade...`));
    });

    it('installs internal dependencies into the nested scope of their dependent', async () => {
      await writeFiles(join(root, 'src'), {
        'outer/modpm.yml': 'name: outer\nversion: 1.0.0\ndependencies:\n  inner:\n    path: ../inner\n    internal: true\n',
        'inner/modpm.yml': 'name: inner\nversion: 0.1.0\n'
      });

      const result = await createInstaller().installFromDirectory(join(root, 'src', 'outer'));
      assert.equal(result.success, true);
      assert.equal(await exists(join(modules, 'outer', 'modpm_modules', 'inner', 'modpm.yml')), true);
      assert.equal(await exists(join(modules, 'inner')), false);
      assert.ok(output.texts('info').includes('Installing "inner@0.1.0" as internal dependency of "outer@1.0.0"...'));
      assert.deepEqual(hooks.map(call => `${call.hook} ${call.identifier}`), [
        'pre-install outer@1.0.0',
        'pre-install inner@0.1.0',
        'post-install inner@0.1.0',
        'post-install outer@1.0.0'
      ]);
    });

    it('links a develop install to its source', async () => {
      const source = join(root, 'src', 'app');
      const result = await createInstaller().installFromDirectory(source, { develop: true });

      assert.equal(result.success, true);
      const target = join(modules, 'app');
      assert.deepEqual((await readdir(target)).sort(), ['.modpm-link', 'installed-files.txt']);
      assert.equal(await readFile(join(target, '.modpm-link'), 'utf8'), `${source}\n`);
      const script = await readFile(join(modules, '.bin', 'app'), 'utf8');
      assert.equal(script.split('\n').at(-2), `exec 'modpy' '${join(source, 'main.py')}' "$@"`);

      const found = await createInstaller().findPackage('app');
      assert.equal(found.status, 'found');
      assert.equal(found.status === 'found' && found.manifest.directory, target);
    });

    it('leaves nothing behind when pre-install fails', async () => {
      const installer = createInstaller({}, { lifecycle: recordingLifecycle(hooks, 'pre-install') });
      const result = await installer.installFromDirectory(join(root, 'src', 'app'));

      assert.equal(result.success, false);
      assert.ok(result.error instanceof HookFailedError);
      assert.equal(result.error.details?.filesPersisted, undefined);
      assert.equal(await exists(join(modules, 'app')), false);
      assert.equal(output.texts('error').at(-1), 'Error: pre-install script failed.');
    });

    it('keeps the installed files when post-install fails', async () => {
      const installer = createInstaller({}, { lifecycle: recordingLifecycle(hooks, 'post-install') });
      const result = await installer.installFromDirectory(join(root, 'src', 'app'));

      assert.equal(result.success, false);
      assert.ok(result.error instanceof HookFailedError);
      assert.equal(result.error.details?.filesPersisted, true);
      assert.equal(await exists(join(modules, 'app', 'installed-files.txt')), true);
      assert.equal(output.texts('error').at(-1), 'Error: post-install script failed.');
    });

    it('removes the target when one of its dependencies fails', async () => {
      await writeFiles(join(root, 'src'), {
        'outer/modpm.yml': [
          'name: outer',
          'version: 1.0.0',
          'dependencies:',
          '  inner:',
          '    path: ../inner',
          '    internal: true',
          '  broken:',
          '    path: ../missing',
          '    internal: true',
          ''
        ].join('\n'),
        'inner/modpm.yml': 'name: inner\nversion: 0.1.0\n'
      });
      const installer = createInstaller();

      const first = await installer.installFromDirectory(join(root, 'src', 'outer'));
      assert.equal(first.success, false);
      assert.equal(await exists(join(modules, 'outer')), false);
      assert.equal(hooks.some(call => call.identifier === 'outer@1.0.0' && call.hook === 'post-install'), false);

      await writeFiles(join(root, 'src'), { 'missing/modpm.yml': 'name: broken\nversion: 1.0.0\n' });
      const second = await installer.installFromDirectory(join(root, 'src', 'outer'));
      assert.equal(second.success, true);
      assert.equal(await exists(join(modules, 'outer', 'installed-files.txt')), true);
      assert.equal(await exists(join(modules, 'outer', 'modpm_modules', 'inner', 'modpm.yml')), true);
      assert.equal(await exists(join(modules, 'outer', 'modpm_modules', 'broken', 'modpm.yml')), true);
    });

    it('does not report a leftover directory without a manifest as installed', async () => {
      await writeFiles(join(modules, 'app', 'modpm_modules', 'dep'), { 'modpm.yml': 'name: dep\nversion: 1.0.0\n' });

      const result = await createInstaller().installFromDirectory(join(root, 'src', 'app'));
      assert.equal(result.success, false);
      assert.ok(result.error instanceof NoManifestError);
      assert.equal(
        output.texts('error').at(-1),
        `Error: Directory "${join(modules, 'app')}" contains no package manifest, specify --upgrade --force to replace it`
      );
      assert.deepEqual(hooks, []);
    });

    it('checks the expected identity against the normalized version', async () => {
      await writeFiles(join(root, 'src', 'tagged'), { 'modpm.yml': 'name: tagged\nversion: v1.0.0\n' });

      const result = await createInstaller().installFromDirectory(join(root, 'src', 'tagged'), {
        expect: { name: 'tagged', version: '1.0.0' }
      });
      assert.equal(result.success, true);
      assert.equal(result.manifest?.identifier, 'tagged@1.0.0');
    });

    it('rejects a directory without a manifest', async () => {
      const result = await createInstaller().installFromDirectory(join(root, 'empty'));
      assert.equal(result.success, false);
      assert.equal(output.texts('error').length, 1);
    });
  });

  describe('installDependencies', () => {
    it('stops at the first failing dependency and keeps the ones before it', async () => {
      await writeFiles(join(root, 'src'), {
        'a/modpm.yml': 'name: a\nversion: 1.0.0\n',
        'c/modpm.yml': 'name: c\nversion: 1.0.0\n'
      });
      const deps = new Map([
        ['a', parseRequirement(join(root, 'src', 'a'))],
        ['b', parseRequirement(join(root, 'src', 'b'))],
        ['c', parseRequirement(join(root, 'src', 'c'))]
      ]);

      const result = await createInstaller().installDependencies(deps, project);
      assert.equal(result.success, false);
      assert.equal(await exists(join(modules, 'a', 'installed-files.txt')), true);
      assert.equal(await exists(join(modules, 'c')), false);
      assert.deepEqual(hooks.map(call => `${call.hook} ${call.identifier}`), ['pre-install a@1.0.0', 'post-install a@1.0.0']);
    });

    it('warns about a present registry dependency that does not match', async () => {
      const downloads: string[] = [];
      const archive = await packRegistryArchive('foo', '1.2.0');
      const installer = createInstaller({}, { registries: [fakeRegistry(['1.2.0'], archive, downloads)] });
      assert.equal((await installer.installFromRegistry('foo', '^1.0.0')).success, true);

      const result = await installer.installDependencies(new Map([['foo', parseRequirement('foo@^2.0.0')]]), project);
      assert.equal(result.success, true);
      assert.equal(output.texts('warn').at(-1), '  Warning: Dependency "foo@^2.0.0" unsatisfied, have "foo@1.2.0" installed');
      assert.deepEqual(downloads, ['foo@1.2.0']);
    });

    it('re-checks the dependencies of present packages only when recursive', async () => {
      const lib = join(root, 'src', 'lib');
      const tool = join(root, 'src', 'tool');
      await writeFiles(join(root, 'src'), {
        'lib/modpm.yml': 'name: lib\nversion: 1.0.0\n',
        'tool/modpm.yml': `name: tool\nversion: 1.0.0\ndependencies:\n  lib: ${lib}\n`
      });
      assert.equal((await createInstaller().installFromDirectory(tool)).success, true);
      await removeTempDir(join(modules, 'lib'));
      const deps = new Map([['tool', parseRequirement(tool)]]);

      assert.equal((await createInstaller().installDependencies(deps, project)).success, true);
      assert.equal(output.texts('info').at(-1), `  Skipping dependency "tool" from "${tool}", have "tool@1.0.0" installed`);
      assert.equal(await exists(join(modules, 'lib')), false);

      assert.equal((await createInstaller({ recursive: true }).installDependencies(deps, project)).success, true);
      assert.equal(await exists(join(modules, 'lib', 'installed-files.txt')), true);
    });
  });

  describe('installFromRequirement', () => {
    it('installs a local archive', async () => {
      const archive = await packRegistryArchive('foo', '1.2.0');

      const result = await createInstaller().installFromRequirement(parseRequirement(archive));
      assert.equal(result.success, true);
      assert.deepEqual(result.identity, { name: 'foo', version: '1.2.0' });
      const target = join(modules, 'foo');
      assert.deepEqual(await readLedger(target), [join(target, 'foo.py'), join(target, 'modpm.yml')]);
    });
  });

  describe('uninstall', () => {
    it('removes what the install wrote', async () => {
      await createInstaller().installFromDirectory(join(root, 'src', 'app'));

      const result = await createInstaller().uninstall('app');
      assert.equal(result.success, true);
      assert.equal(await exists(join(modules, 'app')), false);
      assert.equal(await exists(join(modules, '.bin', 'app')), false);
      assert.equal(await exists(join(root, 'src', 'app', 'main.py')), true);
    });

    it('reports a package that is not installed', async () => {
      const installer = createInstaller();
      await installer.installFromDirectory(join(root, 'src', 'app'));
      assert.equal((await installer.uninstall('app')).success, true);

      const again = await installer.uninstall('app');
      assert.equal(again.success, false);
      assert.ok(again.error instanceof PackageNotFoundError);
      assert.equal(output.texts('info').at(-1), 'Package "app" not installed');
    });

    it('refuses a directory without a manifest unless forced', async () => {
      await writeFiles(join(modules, 'stray'), { 'file.txt': '' });

      assert.equal((await createInstaller().uninstall('stray')).success, false);
      assert.equal(output.texts('info').at(-1), 'Package "stray" not installed');

      const refused = await createInstaller().uninstallDirectory(join(modules, 'stray'));
      assert.equal(refused.success, false);
      assert.ok(refused.error instanceof UninstallFailedError);
      assert.equal(await exists(join(modules, 'stray')), true);

      const forced = await createInstaller({ force: true }).uninstallDirectory(join(modules, 'stray'));
      assert.equal(forced.success, true);
      assert.equal(await exists(join(modules, 'stray')), false);
    });

    it('keeps the source of a develop install', async () => {
      const source = join(root, 'src', 'app');
      await createInstaller().installFromDirectory(source, { develop: true });

      assert.equal((await createInstaller().uninstall('app')).success, true);
      assert.equal(await exists(join(modules, 'app')), false);
      assert.equal(await exists(join(source, 'modpm.yml')), true);
    });
  });

  describe('installFromRegistry', () => {
    it('installs the highest matching version', async () => {
      const downloads: string[] = [];
      const archive = await packRegistryArchive('foo', '1.2.0');
      const installer = createInstaller({}, { registries: [fakeRegistry(['1.0.0', '1.2.0', '2.0.0'], archive, downloads)] });

      const result = await installer.installFromRegistry('foo', '^1.0.0');
      assert.equal(result.success, true);
      assert.deepEqual(result.identity, { name: 'foo', version: '1.2.0' });
      assert.deepEqual(downloads, ['foo@1.2.0']);
      assert.equal(await exists(join(modules, 'foo', 'foo.py')), true);
      assert.ok(output.texts('info').includes('  Checking registry "test" (https://registry.example.com)... FOUND (foo@1.2.0)'));

      const deps = new Map([['foo', parseRequirement('foo@^1.0.0')]]);
      assert.equal((await installer.installDependencies(deps, project)).success, true);
      assert.equal(output.texts('info').at(-1), '  Skipping satisfied dependency "foo@^1.0.0", have "foo@1.2.0" installed');
      assert.deepEqual(downloads, ['foo@1.2.0']);
    });

    it('keeps a present package without upgrade', async () => {
      const downloads: string[] = [];
      const archive = await packRegistryArchive('foo', '1.2.0');
      const installer = createInstaller({}, { registries: [fakeRegistry(['1.2.0'], archive, downloads)] });
      await installer.installFromRegistry('foo', '^1.0.0');
      const ledger = await readLedger(join(modules, 'foo'));

      const again = await installer.installFromRegistry('foo', '^1.0.0');
      assert.equal(again.success, true);
      assert.deepEqual(again.identity, { name: 'foo', version: '1.2.0' });
      assert.deepEqual(downloads, ['foo@1.2.0']);
      assert.deepEqual(await readLedger(join(modules, 'foo')), ledger);
      assert.equal(output.texts('info').at(-1), 'Package "foo@1.2.0" already installed, specify --upgrade');
    });

    it('fails when no registry has a match', async () => {
      const archive = await packRegistryArchive('foo', '1.2.0');
      const installer = createInstaller({}, { registries: [fakeRegistry(['2.0.0'], archive, [])] });

      const result = await installer.installFromRegistry('foo', '^1.0.0');
      assert.equal(result.success, false);
      assert.equal(output.texts('error').at(-1), 'Error: Package "foo@^1.0.0" could not be located');
    });

    it('rejects an archive whose manifest does not match', async () => {
      const archive = await packRegistryArchive('bar', '1.0.0');
      const installer = createInstaller({}, { registries: [fakeRegistry(['1.0.0'], archive, [])] });

      const result = await installer.installFromRegistry('foo', '*');
      assert.equal(result.success, false);
      assert.equal(await exists(join(modules, 'bar')), false);
    });
  });

  describe('installFromGit', () => {
    it('clones the ref and moves the clone into place', async () => {
      const clones: GitCloneOptions[] = [];
      const installer = createInstaller({}, {
        gitClone: async options => {
          clones.push(options);
          await writeFiles(options.destination, { 'modpm.yml': 'name: tool\nversion: 2.0.0\n', 'tool.py': '' });
        }
      });

      const result = await installer.installFromGit('https://example.com/tool.git@v2');
      assert.equal(result.success, true);
      assert.deepEqual(result.identity, { name: 'tool', version: '2.0.0' });
      assert.equal(clones[0]?.url, 'https://example.com/tool.git');
      assert.equal(clones[0]?.ref, 'v2');
      assert.deepEqual(await readdir(modules), ['tool']);
      assert.deepEqual(await readLedger(join(modules, 'tool')), [join(modules, 'tool')]);
    });

    it('removes the clone directory when the clone fails', async () => {
      const installer = createInstaller({}, {
        gitClone: async () => {
          throw new CloneFailedError('https://example.com/tool.git', 128, 'fatal: repository not found');
        }
      });

      const result = await installer.installFromGit('https://example.com/tool.git');
      assert.equal(result.success, false);
      assert.equal(output.texts('error').at(-1), 'Error: Git clone of "https://example.com/tool.git" failed (exit code 128)');
      assert.deepEqual(await readdir(modules), []);
    });
  });

  describe('installPythonDependencies', () => {
    it('runs pip with the bridged PYTHONPATH and restores it', async () => {
      const previous = process.env.PYTHONPATH;
      const seen: Array<{ args: string[]; pythonPath?: string }> = [];
      const installer = createInstaller({}, {
        pipRunner: async args => {
          seen.push({ args, pythonPath: process.env.PYTHONPATH });
          return 0;
        }
      });

      const result = await installer.installPythonDependencies({ six: '>=1.0' });
      assert.equal(result.success, true);
      assert.deepEqual(seen[0]?.args, ['--prefix', join(modules, '.pip'), 'six>=1.0']);
      assert.equal(seen[0]?.pythonPath?.split(':')[0], join(modules, '.pip', 'lib', 'python3.11', 'site-packages'));
      assert.equal(process.env.PYTHONPATH, previous);
      assert.equal(installer.installedPythonLibs.get('six'), null);
    });

    it('reports a failing pip run', async () => {
      const installer = createInstaller({}, { pipRunner: async () => 1 });
      const result = await installer.installPythonDependencies({ six: '' });
      assert.equal(result.success, false);
      assert.ok(result.error instanceof BridgeInstallFailedError);
      assert.equal(output.texts('error').at(-1), 'Error: `pip install` failed with exit code 1');
    });
  });
});
