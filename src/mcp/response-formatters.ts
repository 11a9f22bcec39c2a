/**
 * MCP Response Formatters
 *
 * Tool handlers return arbitrary values; these wrap them in the text content
 * blocks MCP clients expect.
 */

/**
 * MCP response content type
 * This matches the expected return type for MCP tool handlers
 */
export type McpResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/**
 * Strings are sent as-is, everything else as indented JSON
 */
export function jsonResponse(data: unknown, indent: number = 2): McpResponse {
  const text = typeof data === 'string' ? data : JSON.stringify(data ?? null, null, indent);
  return {
    content: [{ type: 'text', text }],
  };
}

export function errorResponse(error: unknown): McpResponse {
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : 'Error';
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: name, message }) }],
    isError: true,
  };
}
