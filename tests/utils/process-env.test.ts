import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { buildCloneArgs, isSha } from '../../src/utils/git-clone.js';
import { quoteArgument } from '../../src/utils/process.js';
import { prependPathList, withScopedEnv } from '../../src/utils/scoped-env.js';

describe('withScopedEnv', () => {
  it('restores variables after the callback throws', async () => {
    process.env.MODPM_TEST_SET = 'before';
    delete process.env.MODPM_TEST_UNSET;

    await assert.rejects(
      withScopedEnv({ MODPM_TEST_SET: 'during', MODPM_TEST_UNSET: 'during' }, async () => {
        assert.equal(process.env.MODPM_TEST_SET, 'during');
        assert.equal(process.env.MODPM_TEST_UNSET, 'during');
        throw new Error('boom');
      }),
      /boom/
    );

    assert.equal(process.env.MODPM_TEST_SET, 'before');
    assert.equal('MODPM_TEST_UNSET' in process.env, false);
    delete process.env.MODPM_TEST_SET;
  });

  it('returns the callback result', async () => {
    assert.equal(await withScopedEnv({}, async () => 42), 42);
  });
});

describe('prependPathList', () => {
  it('keeps an existing value at the end', () => {
    assert.equal(prependPathList(['/a', '/b'], '/c', ':'), '/a:/b:/c');
    assert.equal(prependPathList(['/a'], undefined, ':'), '/a');
    assert.equal(prependPathList(['C:\\a'], '', ';'), 'C:\\a');
  });
});

describe('quoteArgument', () => {
  it('quotes for sh and cmd', () => {
    assert.equal(quoteArgument("it's", 'linux'), `'it'\\''s'`);
    assert.equal(quoteArgument('say "hi"', 'win32'), '"say ""hi"""');
  });
});

describe('buildCloneArgs', () => {
  it('clones a branch or tag shallowly', () => {
    assert.deepEqual(buildCloneArgs({ url: 'https://example.com/t.git', ref: 'v2', destination: '/tmp/x' }), [
      'clone', '--depth', '1', '--branch', 'v2', 'https://example.com/t.git', '/tmp/x'
    ]);
  });

  it('clones fully for a SHA and for recursive clones', () => {
    assert.deepEqual(
      buildCloneArgs({ url: 'https://example.com/t.git', ref: 'abc1234', recursive: true, destination: '/tmp/x' }),
      ['clone', '--recursive', 'https://example.com/t.git', '/tmp/x']
    );
  });

  it('recognizes SHAs', () => {
    assert.equal(isSha('abc1234'), true);
    assert.equal(isSha('ABCDEF0123456789abcdef0123456789abcdef01'), true);
    assert.equal(isSha('main'), false);
    assert.equal(isSha('abc12'), false);
  });
});
