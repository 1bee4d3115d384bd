import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolResult } from '../types.js';
import { jsonResult } from '../types.js';
import { listLabels } from '../../sync/registry.js';

export function listLabelsHandler(): ToolResult {
  return jsonResult(listLabels());
}

export function register(server: McpServer): void {
  server.tool(
    'list_labels',
    'List the property and item labels the article, anchor point and annotation records use. Each must exist in the remote store before an upload.',
    async () => listLabelsHandler(),
  );
}
