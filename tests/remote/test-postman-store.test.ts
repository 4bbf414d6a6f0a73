import { describe, it, expect } from 'vitest';
import {
  PostmanCollectionStore,
  descriptorOfItem,
  itemOfDescriptor,
  parseRetryAfter,
  pathOfUrl,
  type FetchLike,
  type HttpRequest,
  type HttpResponse,
} from '../../src/remote/postman.js';
import { buildDescriptors } from '../../src/descriptors/builder.js';
import {
  RateLimitError,
  RemoteApplyError,
  TransientRemoteError,
} from '../../src/errors.js';
import { field } from '../helpers.js';

interface Recorded {
  url: string;
  init: HttpRequest;
}

function response(status: number, body: unknown = {}, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

function fakeFetch(...responses: Array<HttpResponse | Error>): { fetchImpl: FetchLike; requests: Recorded[] } {
  const requests: Recorded[] = [];
  const queue = [...responses];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({ url, init });
    const next = queue.shift();
    if (next === undefined) throw new Error(`unexpected request ${init.method} ${url}`);
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetchImpl, requests };
}

function storeWith(...responses: Array<HttpResponse | Error>) {
  const { fetchImpl, requests } = fakeFetch(...responses);
  const store = new PostmanCollectionStore({
    apiKey: 'test-key',
    collectionId: 'col-1',
    baseUrl: 'https://postman.test/',
    fetchImpl,
  });
  return { store, requests };
}

const [list, , create] = buildDescriptors('Invoice', [field('amount', { dataType: 'Currency' })], []);

describe('parseRetryAfter', () => {
  it('reads seconds and HTTP dates', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter('0.5')).toBe(500);
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:10 GMT', Date.parse('Thu, 01 Jan 2026 00:00:00 GMT'))).toBe(10_000);
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:00 GMT', Date.parse('Thu, 01 Jan 2026 00:01:00 GMT'))).toBe(0);
    expect(parseRetryAfter('soon')).toBeNull();
    expect(parseRetryAfter(null)).toBeNull();
  });
});

describe('pathOfUrl', () => {
  it('strips the host variable or the scheme and host', () => {
    expect(pathOfUrl('{{base_url}}/api/resource/Invoice')).toBe('/api/resource/Invoice');
    expect(pathOfUrl({ raw: 'https://erp.test/api/method/Invoice/submit' })).toBe('/api/method/Invoice/submit');
    expect(pathOfUrl('custom/ping')).toBe('/custom/ping');
    expect(pathOfUrl(undefined)).toBe('/');
  });
});

describe('item conversion', () => {
  it('writes requests in the collection item layout', () => {
    expect(itemOfDescriptor(create)).toEqual({
      name: 'Create Invoice',
      request: {
        method: 'POST',
        header: [
          { key: 'Content-Type', value: 'application/json' },
          { key: 'Authorization', value: 'token {{api_key}}' },
        ],
        url: {
          raw: '{{base_url}}/api/resource/Invoice',
          host: ['{{base_url}}'],
          path: ['api', 'resource', 'Invoice'],
        },
        description: 'Create a new Invoice record',
        body: {
          mode: 'raw',
          raw: '{\n  "amount": 0\n}',
          options: { raw: { language: 'json' } },
        },
      },
    });
    expect(itemOfDescriptor(list)).not.toHaveProperty('request.body');
  });

  it('recomputes the same hash from a stored item', () => {
    for (const descriptor of [list, create]) {
      const stored = itemOfDescriptor(descriptor);
      const rebuilt = descriptorOfItem(JSON.parse(JSON.stringify({ id: 'i1', ...stored })));
      expect(rebuilt.contentHash).toBe(descriptor.contentHash);
      expect(rebuilt.kind).toBe(descriptor.kind);
    }
  });

  it('never matches a generated hash for an unparsable body or unusual verb', () => {
    const garbled = descriptorOfItem({
      name: 'Create Invoice',
      request: { method: 'POST', url: '{{base_url}}/api/resource/Invoice', body: { mode: 'raw', raw: '{"amount": 0' } },
    });
    expect(garbled.contentHash).not.toBe(create.contentHash);

    const patch = descriptorOfItem({ name: 'Patch', request: { method: 'PATCH', url: '{{base_url}}/api/resource/Invoice' } });
    expect(patch.contentHash).not.toBe(descriptorOfItem({ name: 'Post', request: { method: 'POST', url: '{{base_url}}/api/resource/Invoice' } }).contentHash);
  });
});

describe('PostmanCollectionStore', () => {
  it('fetches the collection as a tree', async () => {
    const stored = itemOfDescriptor(list);
    const { store, requests } = storeWith(
      response(200, {
        collection: {
          info: { name: 'API' },
          item: [
            { id: 'f1', name: 'Invoice', item: [{ id: 'r1', ...stored }] },
            { id: 'f2', name: 'Empty', item: [] },
          ],
        },
      }),
    );

    const tree = await store.fetchTree();

    expect(requests[0].url).toBe('https://postman.test/collections/col-1');
    expect(requests[0].init.method).toBe('GET');
    expect(requests[0].init.headers['X-Api-Key']).toBe('test-key');
    expect(requests[0].init.body).toBeUndefined();
    expect(tree.remoteId).toBe('col-1');
    expect(tree.children.map((c) => [c.kind, c.name, c.remoteId])).toEqual([
      ['folder', 'Invoice', 'f1'],
      ['folder', 'Empty', 'f2'],
    ]);
    const invoice = tree.children[0];
    if (invoice.kind !== 'folder') throw new Error('expected a folder');
    const leaf = invoice.children[0];
    expect(leaf.kind === 'leaf' && leaf.descriptor.contentHash).toBe(list.contentHash);
  });

  it('creates folders and requests under the right parent', async () => {
    const { store, requests } = storeWith(
      response(200, { data: { id: 'f9' } }),
      response(200, { data: { id: 'r9' } }),
    );

    expect(await store.createFolder(null, 'Invoice')).toBe('f9');
    expect(await store.createLeaf('f9', create)).toBe('r9');

    expect(requests.map((r) => `${r.init.method} ${r.url}`)).toEqual([
      'POST https://postman.test/collections/col-1/folders',
      'POST https://postman.test/collections/col-1/requests?folder=f9',
    ]);
    expect(JSON.parse(requests[0].init.body ?? '')).toEqual({ name: 'Invoice' });
    expect(JSON.parse(requests[1].init.body ?? '')).toEqual(itemOfDescriptor(create));
    expect(requests[1].init.headers['Content-Type']).toBe('application/json');
  });

  it('names the parent of a nested folder in the body', async () => {
    const { store, requests } = storeWith(response(200, { data: { id: 'f2' } }));
    await store.createFolder('f1', 'Invoice');
    expect(requests[0].url).toBe('https://postman.test/collections/col-1/folders');
    expect(JSON.parse(requests[0].init.body ?? '')).toEqual({ name: 'Invoice', folder: 'f1' });
  });

  it('treats the collection id as the root parent', async () => {
    const { store, requests } = storeWith(response(201, { data: { id: 'f1' } }), response(201, { data: { id: 'r1' } }));
    await store.createFolder('col-1', 'Invoice');
    await store.createLeaf('col-1', create);
    expect(requests[0].url).toBe('https://postman.test/collections/col-1/folders');
    expect(JSON.parse(requests[0].init.body ?? '')).toEqual({ name: 'Invoice' });
    expect(requests[1].url).toBe('https://postman.test/collections/col-1/requests');
  });

  it('updates and deletes by id', async () => {
    const { store, requests } = storeWith(response(200), response(200), response(204, ''));
    await store.updateLeaf('r 1', create);
    await store.deleteLeaf('r1');
    await store.deleteFolder('f1');
    expect(requests.map((r) => `${r.init.method} ${r.url}`)).toEqual([
      'PUT https://postman.test/collections/col-1/requests/r%201',
      'DELETE https://postman.test/collections/col-1/requests/r1',
      'DELETE https://postman.test/collections/col-1/folders/f1',
    ]);
  });

  it('maps 429 to RateLimitError with the retry-after hint', async () => {
    const { store } = storeWith(response(429, 'slow down', { 'retry-after': '2' }));
    const error = await store.deleteLeaf('r1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterMs: 2000 });
  });

  it('maps 5xx and network failures to TransientRemoteError', async () => {
    const { store } = storeWith(response(503, 'unavailable'), new Error('ECONNRESET'));
    await expect(store.deleteLeaf('r1')).rejects.toThrow(TransientRemoteError);
    await expect(store.deleteLeaf('r1')).rejects.toThrow('DELETE /collections/col-1/requests/r1 failed: ECONNRESET');
  });

  it('maps other failures to RemoteApplyError', async () => {
    const { store } = storeWith(response(404, '{"error":"not found"}'));
    const error = await store.deleteLeaf('r1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteApplyError);
    expect(error).toMatchObject({ status: 404 });
  });

  it('rejects responses of the wrong shape', async () => {
    const { store } = storeWith(response(200, { data: {} }), response(200, 'not json'));
    await expect(store.createFolder(null, 'X')).rejects.toThrow(/unexpected body: \/data\/id/);
    await expect(store.createFolder(null, 'X')).rejects.toThrow('invalid JSON');
  });

  it('validates the connection against the collection', async () => {
    const { store, requests } = storeWith(response(200, { collection: { info: { name: 'Backend' } } }));
    await expect(store.validateConnection()).resolves.toEqual({ id: 'col-1', name: 'Backend' });
    expect(requests[0].url).toBe('https://postman.test/collections/col-1');
  });

  it('validates the connection against a configured workspace', async () => {
    const { fetchImpl, requests } = fakeFetch(
      response(200, { workspace: { id: 'ws-1', name: 'Team' } }),
      response(401, '{"error":"invalid key"}'),
    );
    const store = new PostmanCollectionStore({ apiKey: 'test-key', collectionId: 'col-1', workspaceId: 'ws-1', fetchImpl });

    await expect(store.validateConnection()).resolves.toEqual({ id: 'ws-1', name: 'Team' });
    expect(requests[0].url).toBe('https://api.getpostman.com/workspaces/ws-1');
    const error = await store.validateConnection().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteApplyError);
    expect(error).toMatchObject({ status: 401 });
  });

  it('creates an environment with the variables items refer to', async () => {
    const { store, requests } = storeWith(response(200, { environment: { id: 'env-1', name: 'Local' } }));

    const id = await store.createEnvironment({ name: 'Local', baseUrl: 'http://localhost:8000', siteName: 'site1.local' });

    expect(id).toBe('env-1');
    expect(requests[0].init.method).toBe('POST');
    expect(requests[0].url).toBe('https://postman.test/environments');
    expect(JSON.parse(requests[0].init.body ?? '')).toEqual({
      environment: {
        name: 'Local',
        values: [
          { key: 'base_url', value: 'http://localhost:8000', enabled: true },
          { key: 'api_key', value: '{{your_api_key}}', enabled: true, description: 'API key for the target site' },
          { key: 'site_name', value: 'site1.local', enabled: true },
        ],
      },
    });
  });

  it('creates environments in the configured workspace', async () => {
    const { fetchImpl, requests } = fakeFetch(response(200, { environment: { id: 'env-2' } }));
    const store = new PostmanCollectionStore({
      apiKey: 'test-key',
      collectionId: 'col-1',
      workspaceId: 'ws 1',
      baseUrl: 'https://postman.test',
      fetchImpl,
    });

    await store.createEnvironment({ name: 'CI', baseUrl: 'https://erp.test', apiKeyValue: 'test-secret' });

    expect(requests[0].url).toBe('https://postman.test/environments?workspace=ws%201');
    expect(JSON.parse(requests[0].init.body ?? '')).toMatchObject({
      environment: { values: [{ key: 'base_url' }, { key: 'api_key', value: 'test-secret' }] },
    });
  });
});
