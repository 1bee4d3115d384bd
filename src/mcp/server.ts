#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadStoreConfig, parseContentPath, parseStoragePath } from '../config.js';
import { ArticleStorage } from '../server/storage.js';
import { WikibaseClient } from '../server/wikibase.js';
import type { KnowledgeStoreClient } from '../sync/store-client.js';
import type { ToolDeps } from './types.js';
import { register as registerListLabels } from './tools/list-labels.js';
import { register as registerResolveLabels } from './tools/resolve-labels.js';
import { register as registerGetArticle } from './tools/get-article.js';
import { register as registerVerifyChain } from './tools/verify-chain.js';
import { register as registerSyncArticle } from './tools/sync-article.js';

function createToolDeps(argv: string[], env: Record<string, string | undefined> = process.env): ToolDeps {
  let client: KnowledgeStoreClient | undefined;
  return {
    storage: new ArticleStorage(parseStoragePath(argv)),
    contentPath: parseContentPath(argv),
    getClient: () => {
      client ??= new WikibaseClient(loadStoreConfig(env));
      return client;
    },
  };
}

async function main() {
  const deps = createToolDeps(process.argv);

  const server = new McpServer({
    name: 'sciencesource-sync-mcp',
    version: '0.1.0',
  });

  registerListLabels(server);
  registerResolveLabels(server, deps);
  registerGetArticle(server, deps);
  registerVerifyChain(server, deps);
  registerSyncArticle(server, deps);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error('[sciencesource-sync]', err);
  process.exit(1);
});
