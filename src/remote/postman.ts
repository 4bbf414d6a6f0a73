/**
 * Collection store backed by the Postman collections API (v2.1 items).
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { describeEndpoint } from '../descriptors/builder.js';
import { ID_PLACEHOLDER, METHOD_PREFIX } from '../descriptors/paths.js';
import type { EndpointDescriptor, EndpointKind, HttpVerb, JsonObject, JsonValue } from '../descriptors/types.js';
import { RateLimitError, RemoteApplyError, TransientRemoteError, toError } from '../errors.js';
import { silentLogger, type ContextLogger } from '../observability/context-logger.js';
import { folderNode, leafNode, type FolderNode, type TreeNode } from '../tree/types.js';
import { contentHash } from '../utils/hash.js';
import { isRecord } from '../utils/index.js';
import type { RemoteCollectionStore } from './store.js';

export const DEFAULT_POSTMAN_API_URL = 'https://api.getpostman.com';
export const BASE_URL_VARIABLE = '{{base_url}}';

export interface HttpRequest {
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequest) => Promise<HttpResponse>;

const RequestUrlSchema = Type.Union([
  Type.String(),
  Type.Object({ raw: Type.Optional(Type.String()) }),
]);

const RequestSchema = Type.Object({
  method: Type.Optional(Type.String()),
  url: Type.Optional(RequestUrlSchema),
  description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  body: Type.Optional(
    Type.Union([
      Type.Object({ mode: Type.Optional(Type.String()), raw: Type.Optional(Type.String()) }),
      Type.Null(),
    ]),
  ),
});

export const CollectionItemSchema = Type.Recursive((Self) =>
  Type.Object({
    id: Type.Optional(Type.String()),
    name: Type.String(),
    item: Type.Optional(Type.Array(Self)),
    request: Type.Optional(RequestSchema),
  }),
);

export const CollectionResponseSchema = Type.Object({
  collection: Type.Object({
    info: Type.Object({ name: Type.String() }),
    item: Type.Optional(Type.Array(CollectionItemSchema)),
  }),
});

export const CreatedResponseSchema = Type.Object({
  data: Type.Object({ id: Type.String() }),
});

export const EnvironmentResponseSchema = Type.Object({
  environment: Type.Object({ id: Type.String() }),
});

export const WorkspaceResponseSchema = Type.Object({
  workspace: Type.Object({ id: Type.String(), name: Type.String() }),
});

export type CollectionItem = Static<typeof CollectionItemSchema>;

/** Variables provisioned for the `{{base_url}}` and `{{api_key}}` references in generated items. */
export interface EnvironmentInput {
  name: string;
  baseUrl: string;
  siteName?: string;
  /** Value stored for `api_key`; a placeholder the user replaces in their client. */
  apiKeyValue?: string;
}

export interface ConnectionInfo {
  readonly id: string;
  readonly name: string;
}

export const DEFAULT_API_KEY_VALUE = '{{your_api_key}}';
type RequestUrl = Static<typeof RequestUrlSchema>;

function isHttpVerb(value: string): value is HttpVerb {
  return value === 'GET' || value === 'POST' || value === 'PUT' || value === 'DELETE';
}

/** Milliseconds from a Retry-After header (delta-seconds or HTTP date), or null. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

/** Request path of a stored item, with the host variable or scheme and host removed. */
export function pathOfUrl(url: RequestUrl | undefined): string {
  const raw = typeof url === 'string' ? url : url?.raw ?? '';
  const withoutHost = raw.replace(/^\{\{[^}]+\}\}/, '').replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]+/i, '');
  return withoutHost.startsWith('/') ? withoutHost : `/${withoutHost}`;
}

function kindOf(verb: HttpVerb, path: string): EndpointKind {
  if (path.startsWith(METHOD_PREFIX)) return 'method';
  const withId = path.endsWith(`/${ID_PLACEHOLDER}`);
  switch (verb) {
    case 'GET':
      return withId ? 'retrieve' : 'list';
    case 'POST':
      return 'create';
    case 'PUT':
      return 'update';
    case 'DELETE':
      return 'delete';
  }
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return true;
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && isJsonValue(value);
}

function parseBody(raw: string | undefined): { body: JsonObject | null; parsed: boolean } {
  if (raw === undefined || raw.trim() === '') return { body: null, parsed: true };
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { body: null, parsed: false };
  }
  return isJsonObject(value) ? { body: value, parsed: true } : { body: null, parsed: false };
}

/**
 * Rebuild a descriptor from a stored request. The hash is recomputed from
 * what is stored; a verb outside GET/POST/PUT/DELETE or a body that is not
 * a JSON object is hashed as stored, so it never matches a generated one.
 */
export function descriptorOfItem(item: CollectionItem): EndpointDescriptor {
  const request = item.request;
  const method = (request?.method ?? 'GET').toUpperCase();
  const path = pathOfUrl(request?.url);
  const rawBody = request?.body?.raw;
  const { body, parsed } = parseBody(rawBody);
  const verb: HttpVerb = isHttpVerb(method) ? method : 'POST';
  const descriptor = describeEndpoint({
    name: item.name,
    kind: kindOf(verb, path),
    verb,
    pathTemplate: path,
    description: request?.description ?? '',
    exampleBody: body,
  });
  if (isHttpVerb(method) && parsed) return descriptor;
  return { ...descriptor, contentHash: contentHash(method, path, parsed ? body : rawBody ?? null) };
}

/** The v2.1 item stored for a descriptor. */
export function itemOfDescriptor(descriptor: EndpointDescriptor): Record<string, unknown> {
  const request: Record<string, unknown> = {
    method: descriptor.verb,
    header: [
      { key: 'Content-Type', value: 'application/json' },
      { key: 'Authorization', value: 'token {{api_key}}' },
    ],
    url: {
      raw: `${BASE_URL_VARIABLE}${descriptor.pathTemplate}`,
      host: [BASE_URL_VARIABLE],
      path: descriptor.pathTemplate.split('/').filter((s) => s !== ''),
    },
    description: descriptor.description,
  };
  if (descriptor.exampleBody !== null) {
    request.body = {
      mode: 'raw',
      raw: JSON.stringify(descriptor.exampleBody, null, 2),
      options: { raw: { language: 'json' } },
    };
  }
  return { name: descriptor.name, request };
}

function toTreeNode(item: CollectionItem): TreeNode {
  const remoteId = item.id ?? null;
  if (item.item !== undefined || item.request === undefined) {
    return folderNode(item.name, (item.item ?? []).map(toTreeNode), remoteId);
  }
  return leafNode(descriptorOfItem(item), remoteId, item.name);
}

export class PostmanCollectionStore implements RemoteCollectionStore {
  private readonly _baseUrl: string;
  private readonly _apiKey: string;
  private readonly _collectionId: string;
  private readonly _workspaceId: string | null;
  private readonly _fetch: FetchLike;
  private readonly _logger: ContextLogger;

  constructor(options: {
    apiKey: string;
    collectionId: string;
    /** Workspace checked by validateConnection and given to new environments. */
    workspaceId?: string;
    baseUrl?: string;
    fetchImpl?: FetchLike;
    logger?: ContextLogger;
  }) {
    this._apiKey = options.apiKey;
    this._collectionId = options.collectionId;
    this._workspaceId = options.workspaceId ?? null;
    this._baseUrl = (options.baseUrl ?? DEFAULT_POSTMAN_API_URL).replace(/\/+$/, '');
    this._fetch = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this._logger = options.logger ?? silentLogger();
  }

  get collectionId(): string {
    return this._collectionId;
  }

  async fetchTree(): Promise<FolderNode> {
    const data = await this._request('GET', this._collectionPath(), undefined, CollectionResponseSchema);
    const { collection } = data;
    return folderNode(collection.info.name, (collection.item ?? []).map(toTreeNode), this._collectionId);
  }

  /** A nested folder names its parent in the body; requests take it as a query parameter. */
  async createFolder(parentId: string | null, name: string): Promise<string> {
    const body: Record<string, string> = { name };
    if (parentId !== null && !this._isRoot(parentId)) body.folder = parentId;
    const data = await this._request('POST', `${this._collectionPath()}/folders`, body, CreatedResponseSchema);
    return data.data.id;
  }

  async createLeaf(parentId: string | null, descriptor: EndpointDescriptor): Promise<string> {
    const path = `${this._collectionPath()}/requests${this._folderQuery(parentId)}`;
    const data = await this._request('POST', path, itemOfDescriptor(descriptor), CreatedResponseSchema);
    return data.data.id;
  }

  async updateLeaf(remoteId: string, descriptor: EndpointDescriptor): Promise<void> {
    await this._request('PUT', `${this._collectionPath()}/requests/${encodeURIComponent(remoteId)}`, itemOfDescriptor(descriptor), null);
  }

  async deleteFolder(remoteId: string): Promise<void> {
    await this._request('DELETE', `${this._collectionPath()}/folders/${encodeURIComponent(remoteId)}`, undefined, null);
  }

  async deleteLeaf(remoteId: string): Promise<void> {
    await this._request('DELETE', `${this._collectionPath()}/requests/${encodeURIComponent(remoteId)}`, undefined, null);
  }

  /**
   * Check the API key by reading the configured workspace, or the
   * collection when no workspace is set.
   */
  async validateConnection(): Promise<ConnectionInfo> {
    if (this._workspaceId !== null) {
      const path = `/workspaces/${encodeURIComponent(this._workspaceId)}`;
      const { workspace } = await this._request('GET', path, undefined, WorkspaceResponseSchema);
      this._logger.info('Remote connection validated', { workspace: workspace.name });
      return { id: workspace.id, name: workspace.name };
    }
    const { collection } = await this._request('GET', this._collectionPath(), undefined, CollectionResponseSchema);
    this._logger.info('Remote connection validated', { collection: collection.info.name });
    return { id: this._collectionId, name: collection.info.name };
  }

  /** Create an environment defining the variables generated items refer to; resolves to its id. */
  async createEnvironment(input: EnvironmentInput): Promise<string> {
    const values = [
      { key: 'base_url', value: input.baseUrl, enabled: true },
      {
        key: 'api_key',
        value: input.apiKeyValue ?? DEFAULT_API_KEY_VALUE,
        enabled: true,
        description: 'API key for the target site',
      },
    ];
    if (input.siteName !== undefined) {
      values.push({ key: 'site_name', value: input.siteName, enabled: true });
    }
    const query = this._workspaceId === null ? '' : `?workspace=${encodeURIComponent(this._workspaceId)}`;
    const data = await this._request(
      'POST',
      `/environments${query}`,
      { environment: { name: input.name, values } },
      EnvironmentResponseSchema,
    );
    return data.environment.id;
  }

  private _collectionPath(): string {
    return `/collections/${encodeURIComponent(this._collectionId)}`;
  }

  private _isRoot(parentId: string): boolean {
    return parentId === this._collectionId;
  }

  /** Requests created at the collection root carry no folder parameter. */
  private _folderQuery(parentId: string | null): string {
    if (parentId === null || this._isRoot(parentId)) return '';
    return `?folder=${encodeURIComponent(parentId)}`;
  }

  private async _request(method: string, path: string, body: unknown, schema: null): Promise<void>;
  private async _request<S extends TSchema>(method: string, path: string, body: unknown, schema: S): Promise<Static<S>>;
  private async _request<S extends TSchema>(
    method: string,
    path: string,
    body: unknown,
    schema: S | null,
  ): Promise<Static<S> | void> {
    const url = `${this._baseUrl}${path}`;
    const headers: Record<string, string> = { 'X-Api-Key': this._apiKey, Accept: 'application/json' };
    const init: HttpRequest = { method, headers };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    let response: HttpResponse;
    try {
      response = await this._fetch(url, init);
    } catch (e) {
      const error = toError(e);
      throw new TransientRemoteError(`${method} ${path} failed: ${error.message}`, { method, path }, { cause: error });
    }

    const text = await response.text();
    this._logger.debug('Remote call', { method, path, status: response.status });

    if (response.status === 429) {
      throw new RateLimitError(parseRetryAfter(response.headers.get('retry-after')));
    }
    if (response.status >= 500) {
      throw new TransientRemoteError(`${method} ${path} returned ${response.status}`, { method, path, status: response.status });
    }
    if (response.status < 200 || response.status >= 300) {
      throw new RemoteApplyError(`${method} ${path} returned ${response.status}: ${text.slice(0, 200)}`, response.status);
    }
    if (schema === null) return;

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      throw new RemoteApplyError(`${method} ${path} returned invalid JSON`, response.status, { cause: toError(e) });
    }
    if (!Value.Check(schema, data)) {
      const first = [...Value.Errors(schema, data)][0];
      const where = first === undefined ? '' : `: ${first.path || '/'}: ${first.message}`;
      throw new RemoteApplyError(`${method} ${path} returned an unexpected body${where}`, response.status);
    }
    return data;
  }
}
