import type { ArticleStorage } from '../server/storage.js';
import type { KnowledgeStoreClient } from '../sync/store-client.js';
import { describeError } from '../sync/errors.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

export interface ErrorResult extends ToolResult {
  isError: boolean;
}

/** What every tool handler is given */
export interface ToolDeps {
  storage: ArticleStorage;
  /** Built on first use so tools that never talk to the store need no credentials */
  getClient: () => KnowledgeStoreClient;
  /** Article text file given with `--content` */
  contentPath?: string;
}

export function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

export function errorResult(err: unknown): ErrorResult {
  return { isError: true, content: [{ type: 'text', text: describeError(err) }] };
}
