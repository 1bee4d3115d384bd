import type { PropertyPayload } from '../shared/types.js';

/**
 * The remote item/property store, as seen by the sync pipeline.
 * Transport, auth and timeouts are the implementation's business.
 */
export interface KnowledgeStoreClient {
  resolvePropertyLabel(label: string): Promise<string>;
  resolveItemLabel(label: string): Promise<string>;
  /** Creates the article text page and returns its page id */
  createArticle(title: string, content: string): Promise<number>;
  /** Creates an item of the given type and returns its id */
  createItem(itemType: string, properties: PropertyPayload): Promise<string>;
  /** Attaches further property values to an existing item */
  updateItem(itemId: string, properties: PropertyPayload): Promise<void>;
}
