import { generateAndSaveImage, generateImage, saveGeneratedImage } from './tools';
import type { McpToolDefinition } from './types';

/**
 * Tool Registry
 *
 * Central registry of all MCP tools. The server imports this registry to
 * answer tools/list and to reject tools/call requests for unknown names.
 *
 * To add a new tool:
 * 1. Create the tool definition in src/tools/
 * 2. Export it from src/tools/index.ts
 * 3. Add it to this registry and give the server a handler for it
 */
export const TOOL_REGISTRY: McpToolDefinition[] = [
  generateImage,
  saveGeneratedImage,
  generateAndSaveImage,
];

/**
 * Get a tool definition by name
 */
export function getToolByName(name: string): McpToolDefinition | undefined {
  return TOOL_REGISTRY.find((tool) => tool.name === name);
}

/**
 * Get all tool definitions
 * Used for tools/list response
 */
export function getToolDefinitions(): McpToolDefinition[] {
  return TOOL_REGISTRY.map(({ name, description, inputSchema }) => ({
    name,
    description,
    inputSchema,
  }));
}
