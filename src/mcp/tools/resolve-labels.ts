import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDeps, ToolResult, ErrorResult } from '../types.js';
import { errorResult, jsonResult } from '../types.js';
import { resolveTagMaps } from '../../sync/resolver.js';

export async function resolveLabelsHandler(deps: Pick<ToolDeps, 'getClient'>): Promise<ToolResult | ErrorResult> {
  try {
    const maps = await resolveTagMaps(deps.getClient());
    return jsonResult({
      properties: Object.fromEntries(maps.properties),
      items: Object.fromEntries(maps.items),
    });
  } catch (err) {
    return errorResult(err);
  }
}

export function register(server: McpServer, deps: ToolDeps): void {
  server.tool(
    'resolve_labels',
    'Look up every property and item label in the remote store and return the label → id maps. Stops at the first label that cannot be resolved.',
    async () => resolveLabelsHandler(deps),
  );
}
