import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  type CallToolResult,
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import {
  getToolByName,
  getToolDefinitions,
  TOOL_REGISTRY,
  type ToolContext,
  type ToolHandler,
} from '@openai-images/mcp-tools';
import { handler as generateAndSaveImage } from '@openai-images/tool-generate-and-save-image';
import { handler as generateImage } from '@openai-images/tool-generate-image';
import { handler as saveGeneratedImage } from '@openai-images/tool-save-generated-image';

// ============================================================================
// MCP Server Implementation
// ============================================================================

export const SERVER_INFO = {
  name: 'openai-images',
  version: '1.0.0',
};

/**
 * Tool name -> handler. Every entry in TOOL_REGISTRY needs one.
 */
export const TOOL_HANDLERS: ReadonlyMap<string, ToolHandler> = new Map<string, ToolHandler>([
  ['generate_image', generateImage],
  ['save_generated_image', saveGeneratedImage],
  ['generate_and_save_image', generateAndSaveImage],
]);

/**
 * Format a tool result for MCP: one text block with the pretty-printed JSON
 */
function toToolResponse(result: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

/**
 * Handle tools/call request
 */
export async function handleToolsCall(
  params: { name: string; arguments?: Record<string, unknown> },
  context: ToolContext
): Promise<CallToolResult> {
  const tool = getToolByName(params.name);
  const toolHandler = TOOL_HANDLERS.get(params.name);

  if (!tool || !toolHandler) {
    throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${params.name}`);
  }

  console.error(`Invoking tool: ${tool.name}`);

  try {
    const result = await toolHandler(params.arguments ?? {}, context);
    return toToolResponse(result);
  } catch (error) {
    // Handlers report failures as values; this only catches a broken handler
    console.error(`Tool invocation error:`, error);
    return toToolResponse({
      success: false,
      error: `Internal error: ${error instanceof Error ? error.message : 'Unknown error'}`,
    });
  }
}

/**
 * Create the MCP server with tools/list and tools/call wired to the registry
 */
export function createServer(context: ToolContext): Server {
  const server = new Server(SERVER_INFO, {
    capabilities: {
      tools: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: getToolDefinitions(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolsCall(request.params, context)
  );

  server.onerror = (error) => {
    console.error('[MCP Error]', error);
  };

  return server;
}

/**
 * Export tool registry for external use
 */
export { TOOL_REGISTRY };
