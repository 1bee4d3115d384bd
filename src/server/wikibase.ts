import type { PropertyPayload, PropertyValue } from '../shared/types.js';
import type { KnowledgeStoreClient } from '../sync/store-client.js';
import { StoreRequestError } from '../sync/errors.js';

export interface WikibaseClientOptions {
  /** MediaWiki action API endpoint, e.g. https://example.org/w/api.php */
  apiUrl: string;
  /** OAuth 2 owner-only access token */
  accessToken: string;
  language?: string;
}

interface ApiError {
  error?: { code?: string; info?: string };
}

interface SearchResponse extends ApiError {
  search?: Array<{ id: string; label?: string }>;
}

interface TokenResponse extends ApiError {
  query?: { tokens?: { csrftoken?: string } };
}

interface EditResponse extends ApiError {
  edit?: { result?: string; pageid?: number };
}

interface EntityResponse extends ApiError {
  entity?: { id?: string };
}

function toDataValue(value: PropertyValue): Record<string, unknown> {
  switch (value.type) {
    case 'string':
      return { type: 'string', value: value.value };
    case 'quantity':
      return { type: 'quantity', value: { amount: value.value < 0 ? `${value.value}` : `+${value.value}`, unit: '1' } };
    case 'item':
      return { type: 'wikibase-entityid', value: { 'entity-type': 'item', id: value.id } };
  }
}

/** A Wikibase statement in the shape `wbeditentity` takes */
function toClaim(property: string, value: PropertyValue): Record<string, unknown> {
  return {
    type: 'statement',
    rank: 'normal',
    mainsnak: { snaktype: 'value', property, datavalue: toDataValue(value) },
  };
}

export function toClaims(properties: PropertyPayload): Record<string, unknown>[] {
  return Object.entries(properties).map(([property, value]) => toClaim(property, value));
}

/**
 * `KnowledgeStoreClient` over the MediaWiki action API.
 *
 * Labels must match exactly (case included); the first exact hit wins.
 */
export class WikibaseClient implements KnowledgeStoreClient {
  private readonly apiUrl: string;
  private readonly accessToken: string;
  private readonly language: string;
  private csrfToken: string | undefined;

  constructor(options: WikibaseClientOptions) {
    this.apiUrl = options.apiUrl;
    this.accessToken = options.accessToken;
    this.language = options.language ?? 'en';
  }

  resolvePropertyLabel(label: string): Promise<string> {
    return this.searchEntity('property', label);
  }

  resolveItemLabel(label: string): Promise<string> {
    return this.searchEntity('item', label);
  }

  async createArticle(title: string, content: string): Promise<number> {
    const res = await this.post<EditResponse>({
      action: 'edit',
      title,
      text: content,
      createonly: '1',
      token: await this.getCsrfToken(),
    });
    const pageId = res.edit?.pageid;
    if (res.edit?.result !== 'Success' || pageId === undefined) {
      throw new StoreRequestError('edit-failed', `Creating page "${title}" did not return a page id`);
    }
    return pageId;
  }

  async createItem(itemType: string, properties: PropertyPayload): Promise<string> {
    const res = await this.post<EntityResponse>({
      action: 'wbeditentity',
      new: 'item',
      data: JSON.stringify({
        descriptions: { [this.language]: { language: this.language, value: itemType } },
        claims: toClaims(properties),
      }),
      token: await this.getCsrfToken(),
    });
    const id = res.entity?.id;
    if (id === undefined) {
      throw new StoreRequestError('no-entity', `Creating ${itemType} item did not return an id`);
    }
    return id;
  }

  async updateItem(itemId: string, properties: PropertyPayload): Promise<void> {
    await this.post<EntityResponse>({
      action: 'wbeditentity',
      id: itemId,
      data: JSON.stringify({ claims: toClaims(properties) }),
      token: await this.getCsrfToken(),
    });
  }

  private async searchEntity(type: 'property' | 'item', label: string): Promise<string> {
    const res = await this.get<SearchResponse>({
      action: 'wbsearchentities',
      search: label,
      type,
      language: this.language,
      limit: '50',
    });
    const hit = (res.search ?? []).find(e => e.label === label);
    if (!hit) {
      throw new StoreRequestError('not-found', `No ${type} labelled "${label}"`);
    }
    return hit.id;
  }

  private async getCsrfToken(): Promise<string> {
    if (this.csrfToken !== undefined) return this.csrfToken;
    const res = await this.get<TokenResponse>({ action: 'query', meta: 'tokens', type: 'csrf' });
    const token = res.query?.tokens?.csrftoken;
    if (token === undefined) {
      throw new StoreRequestError('no-token', 'Store did not issue an edit token');
    }
    this.csrfToken = token;
    return token;
  }

  private get<T extends ApiError>(params: Record<string, string>): Promise<T> {
    const query = new URLSearchParams({ ...params, format: 'json', formatversion: '2' });
    return this.request<T>(`${this.apiUrl}?${query}`, { method: 'GET' });
  }

  private post<T extends ApiError>(params: Record<string, string>): Promise<T> {
    return this.request<T>(this.apiUrl, {
      method: 'POST',
      body: new URLSearchParams({ ...params, format: 'json', formatversion: '2' }),
    });
  }

  private async request<T extends ApiError>(url: string, init: RequestInit): Promise<T> {
    const res = await fetch(url, {
      ...init,
      headers: { Authorization: `Bearer ${this.accessToken}` },
    });

    if (!res.ok) {
      throw new StoreRequestError(`http-${res.status}`, `HTTP ${res.status} ${res.statusText}`.trim());
    }

    const body = (await res.json()) as T;
    if (body.error) {
      throw new StoreRequestError(body.error.code ?? 'unknown', body.error.info ?? 'Store reported an error');
    }
    return body;
  }
}
