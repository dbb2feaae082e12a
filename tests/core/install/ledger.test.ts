import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'fs/promises';
import { join } from 'path';

import {
  formatLedger,
  parseLedger,
  readLedger,
  readLinkMarker,
  writeLedger,
  writeLinkMarker
} from '../../../src/core/install/ledger.js';
import { InstallStack } from '../../../src/core/install/install-stack.js';
import { parseManifest } from '../../../src/core/manifest/manifest.js';
import { makeTempDir, removeTempDir } from '../../helpers/fixtures.js';

describe('installed-files ledger', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir();
  });

  after(async () => {
    await removeTempDir(dir);
  });

  it('writes one newline-terminated path per line', async () => {
    const ledgerPath = await writeLedger(dir, ['/a/b.py', '/a/bin/tool']);
    assert.equal(ledgerPath, join(dir, 'installed-files.txt'));
    assert.equal(await readFile(ledgerPath, 'utf8'), '/a/b.py\n/a/bin/tool\n');
    assert.deepEqual(await readLedger(dir), ['/a/b.py', '/a/bin/tool']);
  });

  it('parses CRLF content and skips empty lines', () => {
    assert.deepEqual(parseLedger('/x\r\n\r\n/y\n'), ['/x', '/y']);
    assert.equal(formatLedger([]), '');
  });

  it('returns null for a directory without a ledger', async () => {
    assert.equal(await readLedger(join(dir, 'missing')), null);
  });

  it('round-trips the link marker', async () => {
    assert.equal(await readLinkMarker(dir), null);
    await writeLinkMarker(dir, '/src/app');
    assert.equal(await readLinkMarker(dir), '/src/app');
  });
});

describe('InstallStack', () => {
  it('pushes for the duration of the callback and pops on failure', async () => {
    const stack = new InstallStack();
    const outer = parseManifest('name: outer\nversion: 1.0.0\n', '/p/outer/modpm.yml');
    const inner = parseManifest('name: inner\nversion: 1.0.0\n', '/p/inner/modpm.yml');

    await stack.withEntry(outer, '/p/outer', async () => {
      assert.equal(stack.top()?.manifest.name, 'outer');
      await assert.rejects(
        stack.withEntry(inner, '/p/outer/modpm_modules/inner', async () => {
          assert.equal(stack.top()?.manifest.name, 'inner');
          throw new Error('boom');
        }),
        /boom/
      );
      assert.equal(stack.top()?.directory, '/p/outer');
    });

    assert.equal(stack.top(), undefined);
  });
});
