/**
 * MCP Tools Package
 *
 * Shared definitions for the MCP tools used by:
 * - openai-images-mcp (server): imports TOOL_REGISTRY for tools/list and routing
 * - tool-* (tool handlers): import their own schema and the shared handler types
 */

// Argument helpers
export { optionalString } from './args';
// Registry
export { getToolByName, getToolDefinitions, TOOL_REGISTRY } from './registry';
// Individual tool definitions
export { generateAndSaveImage, generateImage, saveGeneratedImage } from './tools';
// Types
export type {
  McpToolDefinition,
  ToolContext,
  ToolFailure,
  ToolHandler,
} from './types';
