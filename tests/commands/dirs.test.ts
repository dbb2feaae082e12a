import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { formatDirectories } from '../../src/commands/dirs.js';

const dirs = {
  packages: '/p/modpm_modules',
  bin: '/p/modpm_modules/.bin',
  pipPrefix: '/p/modpm_modules/.pip',
  pipLib: '/p/modpm_modules/.pip/lib/python3.11/site-packages',
  pipBin: '/p/modpm_modules/.pip/bin',
  referenceDir: '/p'
};

describe('formatDirectories', () => {
  it('prints every directory with its label', () => {
    assert.deepEqual(formatDirectories(dirs, {}), [
      'Packages:   /p/modpm_modules',
      'Bin:        /p/modpm_modules/.bin',
      'Pip Prefix: /p/modpm_modules/.pip',
      'Pip Lib:    /p/modpm_modules/.pip/lib/python3.11/site-packages',
      'Pip Bin:    /p/modpm_modules/.pip/bin',
      'Reference:  /p'
    ]);
  });

  it('prints only the selected directory', () => {
    assert.deepEqual(formatDirectories(dirs, { pipLib: true }), ['/p/modpm_modules/.pip/lib/python3.11/site-packages']);
    assert.deepEqual(formatDirectories(dirs, { reference: true, global: true }), ['/p']);
  });
});
