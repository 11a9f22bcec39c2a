/**
 * Replay tool MCP server
 *
 * Serves the tool registry over stdio. Besides the tools from the generated
 * module it exposes `reload_tools`, which re-imports that module.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { SessionStore } from '../core/session-store.js';
import { ToolRegistry } from '../core/tool-registry.js';
import type { ToolServerConfig } from '../utils/config-schemas.js';
import { logger, errorMessage } from '../utils/logger.js';
import { errorResponse, jsonResponse, type McpResponse } from './response-formatters.js';

const log = logger.server;

export const SERVER_INFO = { name: 'session-capture', version: '0.1.0' };

export const RELOAD_TOOL = 'reload_tools';

/**
 * Build a registry with the built-in tools registered
 */
export function createToolRegistry(config: ToolServerConfig): ToolRegistry {
  const registry = new ToolRegistry({
    store: new SessionStore(config.sessionFile),
    modulePath: config.toolsModule,
  });

  registry.registerTool(RELOAD_TOOL, () => registry.reload(), {
    description: 'Re-import the generated tool module and refresh the tool list',
    inputSchema: { type: 'object', properties: {} },
  });

  return registry;
}

/**
 * Run one tool call and format the outcome. Never throws.
 */
export async function handleToolCall(
  registry: ToolRegistry,
  name: string,
  args: Record<string, unknown> = {}
): Promise<McpResponse> {
  const startTime = Date.now();
  try {
    const result = await registry.call(name, args);
    log.timed('Tool call finished', startTime, { tool: name });
    return jsonResponse(result);
  } catch (error) {
    log.warn('Tool call failed', { tool: name, error: errorMessage(error) });
    return errorResponse(error);
  }
}

export function createToolServer(registry: ToolRegistry): Server {
  const server = new Server(SERVER_INFO, {
    capabilities: {
      tools: {},
    },
  });

  // ============================================
  // Tool List Handler
  // ============================================
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: registry.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  // ============================================
  // Tool Call Handler
  // ============================================
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(registry, name, args ?? {});
  });

  return server;
}

/**
 * Load the tool module, then serve until stdin closes.
 */
export async function startToolServer(config: ToolServerConfig): Promise<void> {
  const registry = createToolRegistry(config);
  const result = await registry.reload();
  if (!result.loaded) {
    log.warn('Starting without generated tools', { module: config.toolsModule, error: result.error });
  }

  const server = createToolServer(registry);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info('Tool server started', {
    version: SERVER_INFO.version,
    tools: registry.list().map((tool) => tool.name),
  });
}
