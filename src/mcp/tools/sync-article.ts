import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDeps, ToolResult, ErrorResult } from '../types.js';
import { errorResult, jsonResult } from '../types.js';
import { ConfigError, PersistenceError } from '../../sync/errors.js';
import { resolveTagMaps } from '../../sync/resolver.js';
import { syncArticle } from '../../sync/orchestrator.js';

/**
 * Resolve labels, then take the stored article as far as `linked`,
 * checkpointing to storage after every confirmed write. The article text
 * comes from `contentPath`, else from the server's `--content` file.
 */
export async function syncArticleHandler(
  deps: ToolDeps,
  params: { contentPath?: string } = {},
): Promise<ToolResult | ErrorResult> {
  try {
    const article = await deps.storage.load();
    if (article.stage === 'linked') {
      return jsonResult({ title: article.title, stage: article.stage, pageId: article.pageId ?? null, id: article.id ?? null });
    }

    const contentPath = params.contentPath ?? deps.contentPath;
    if (contentPath === undefined) {
      throw new ConfigError('No article content: pass contentPath or start the server with --content');
    }

    let content: string;
    try {
      content = await readFile(contentPath, 'utf-8');
    } catch (err) {
      throw new PersistenceError(contentPath, 'Failed to read article content', err);
    }

    const client = deps.getClient();
    const maps = await resolveTagMaps(client);
    await syncArticle(article, content, {
      client,
      maps,
      checkpoint: a => deps.storage.save(a),
    });

    return jsonResult({ title: article.title, stage: article.stage, pageId: article.pageId ?? null, id: article.id ?? null });
  } catch (err) {
    return errorResult(err);
  }
}

export function register(server: McpServer, deps: ToolDeps): void {
  server.tool(
    'sync_article',
    'Upload the stored article to the remote store: article text, article item, annotations and anchor points, then the anchor chain. Resumes from the last completed stage.',
    { contentPath: z.string().min(1).optional().describe('Path to the HTML file holding the article text; defaults to the --content file') },
    async (params) => syncArticleHandler(deps, params),
  );
}
