import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDeps, ToolResult, ErrorResult } from '../types.js';
import { errorResult, jsonResult } from '../types.js';

export async function getArticleHandler(deps: Pick<ToolDeps, 'storage'>): Promise<ToolResult | ErrorResult> {
  try {
    const article = await deps.storage.load();
    return jsonResult({
      title: article.title,
      stage: article.stage,
      pageId: article.pageId ?? null,
      id: article.id ?? null,
      anchorPoints: article.anchorPoints.map(p => ({
        term: p.annotation.term,
        character: p.characterNumber,
        id: p.id ?? null,
        annotationId: p.annotation.id ?? null,
      })),
    });
  } catch (err) {
    return errorResult(err);
  }
}

export function register(server: McpServer, deps: ToolDeps): void {
  server.tool(
    'get_article',
    'Show the stored article: its upload stage, remote ids and anchor points in document order.',
    async () => getArticleHandler(deps),
  );
}
