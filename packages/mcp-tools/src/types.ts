import type { Credentials } from '@openai-images/config';

/**
 * MCP Tool Definition
 * Represents the schema of a tool as defined by the MCP protocol
 */
export type McpToolDefinition = {
  /** Unique tool name (snake_case) */
  name: string;
  /** Human-readable description of what the tool does */
  description: string;
  /** JSON Schema for tool input parameters */
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
};

/**
 * Everything a tool handler needs from the running process.
 * Built once at startup; tests construct their own.
 */
export interface ToolContext {
  credentials: Credentials;
  /** Root that relative save paths and reported relative paths are resolved against */
  projectRoot: string;
  /** Model used when a request does not name one */
  defaultModel: string;
  /** OpenAI API base URL, e.g. https://api.openai.com/v1 */
  apiBaseUrl: string;
  /** Per-request timeout for outbound calls; unbounded when omitted */
  timeoutMs?: number;
  fetch: typeof fetch;
  now: () => Date;
}

/**
 * Failed tool call. Tools report failures as values, never by throwing.
 */
export interface ToolFailure {
  success: false;
  error: string;
}

export type ToolHandler<TResult extends { success: boolean } = { success: boolean }> = (
  args: Record<string, unknown>,
  context: ToolContext
) => Promise<TResult>;
