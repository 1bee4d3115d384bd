import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDeps, ToolResult, ErrorResult } from '../types.js';
import { errorResult, jsonResult } from '../types.js';
import { verifyAnchorChain } from '../../sync/graph.js';

export async function verifyChainHandler(
  deps: Pick<ToolDeps, 'storage'>,
  params: { terminusId?: string } = {},
): Promise<ToolResult | ErrorResult> {
  try {
    const article = await deps.storage.load();
    if (article.stage !== 'linked') {
      return {
        isError: true,
        content: [{ type: 'text', text: `Article "${article.title}" is at stage ${article.stage}; the chain is only complete once linked` }],
      };
    }
    const problems = verifyAnchorChain(article, params.terminusId);
    return jsonResult({ consistent: problems.length === 0, problems });
  } catch (err) {
    return errorResult(err);
  }
}

export function register(server: McpServer, deps: ToolDeps): void {
  server.tool(
    'verify_chain',
    'Check that a linked article heads its anchor chain, every anchor point references its neighbours in both directions, and the last one closes the chain.',
    { terminusId: z.string().min(1).optional().describe('Item id the last anchor point must reference; when omitted the reference only has to be present') },
    async (params) => verifyChainHandler(deps, params),
  );
}
