import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { HttpRegistryClient, type FetchFunction } from '../../../src/core/registry/registry-client.js';
import { parseSelector } from '../../../src/core/manifest/selector.js';
import { DownloadFailedError } from '../../../src/utils/errors.js';

function fakeFetch(routes: Record<string, () => Response>, calls: string[] = []): FetchFunction {
  return async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    calls.push(url);
    const route = routes[url];
    return route ? route() : new Response('not found', { status: 404 });
  };
}

describe('HttpRegistryClient', () => {
  const config = { name: 'test', url: 'https://registry.example.com/' };

  it('selects the highest version matching the selector', async () => {
    const calls: string[] = [];
    const client = new HttpRegistryClient(config, {
      fetch: fakeFetch({
        'https://registry.example.com/packages/foo': () => new Response(JSON.stringify({ name: 'foo', versions: ['1.0.0', '1.2.0', '2.0.0'] }))
      }, calls)
    });

    assert.deepEqual(await client.findPackage('foo', parseSelector('^1.0.0')), { name: 'foo', version: '1.2.0' });
    assert.equal(await client.findPackage('foo', parseSelector('^3.0.0')), null);
    assert.deepEqual(calls, ['https://registry.example.com/packages/foo', 'https://registry.example.com/packages/foo']);
  });

  it('treats a 404 as an unknown package', async () => {
    const client = new HttpRegistryClient(config, { fetch: fakeFetch({}) });
    assert.equal(await client.findPackage('missing', parseSelector('*')), null);
  });

  it('keeps the scope separator in package URLs', async () => {
    const calls: string[] = [];
    const client = new HttpRegistryClient(config, { fetch: fakeFetch({}, calls) });
    await client.findPackage('@acme/tools', parseSelector('*'));
    assert.deepEqual(calls, ['https://registry.example.com/packages/%40acme/tools']);
  });

  it('reports server errors as download failures', async () => {
    const client = new HttpRegistryClient(config, {
      fetch: fakeFetch({ 'https://registry.example.com/packages/foo': () => new Response('oops', { status: 500 }) })
    });
    await assert.rejects(client.findPackage('foo', parseSelector('*')), DownloadFailedError);
  });

  it('downloads an archive with the registry file name', async () => {
    const client = new HttpRegistryClient(config, {
      fetch: fakeFetch({
        'https://registry.example.com/packages/foo/1.2.0/archive': () =>
          new Response('archive-bytes', { headers: { 'content-disposition': 'attachment; filename="foo-1.2.0.tgz"' } })
      })
    });

    const download = await client.download('foo', '1.2.0');
    assert.equal(download.filename, 'foo-1.2.0.tgz');
    const chunks: Buffer[] = [];
    for await (const chunk of download.stream) {
      chunks.push(Buffer.from(chunk));
    }
    assert.equal(Buffer.concat(chunks).toString(), 'archive-bytes');
  });

  it('falls back to a derived file name', async () => {
    const client = new HttpRegistryClient(config, {
      fetch: fakeFetch({ 'https://registry.example.com/packages/%40acme/tools/1.0.0/archive': () => new Response('x') })
    });
    const download = await client.download('@acme/tools', '1.0.0');
    assert.equal(download.filename, 'acme-tools-1.0.0.tar.gz');
  });
});
