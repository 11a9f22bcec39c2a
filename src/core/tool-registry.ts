/**
 * Tool Registry - named replay tools served over MCP.
 *
 * Tools come from two places: built-ins registered by the server, and a
 * generated module that exports `register(host)`. Reloading drops every
 * module tool and imports the module again under a fresh URL so edits on disk
 * take effect without a restart.
 */

import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { unknownToolError, invalidToolModuleError } from '../utils/error-messages.js';
import { logger, errorMessage } from '../utils/logger.js';
import type { SessionStore } from './session-store.js';

const log = logger.registry;

export type ToolArgs = Record<string, unknown>;

export type ToolHandler = (args: ToolArgs) => unknown;

export interface ToolInputSchema {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
}

export interface ToolMetadata {
  description?: string;
  inputSchema?: ToolInputSchema;
}

export type ToolSource = 'builtin' | 'module';

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  source: ToolSource;
  handler: ToolHandler;
}

/**
 * What a tool module's `register(host)` receives
 */
export interface ToolHost {
  registerTool(name: string, handler: ToolHandler, metadata?: ToolMetadata): void;
  lookupCookies(url: string): Promise<Record<string, string>>;
  lookupCsrfToken(): Promise<string>;
}

export interface ReloadResult {
  loaded: boolean;
  tools: string[];
  error?: string;
}

export class UnknownToolError extends Error {
  constructor(
    public readonly toolName: string,
    available: string[]
  ) {
    super(unknownToolError(toolName, available));
    this.name = 'UnknownToolError';
  }
}

interface ToolModule {
  register: (host: ToolHost) => unknown;
}

function isToolModule(value: unknown): value is ToolModule {
  return typeof value === 'object' && value !== null && 'register' in value && typeof value.register === 'function';
}

export interface ToolRegistryOptions {
  store: SessionStore;
  /** Path of the generated tool module; reload() is a no-op without one */
  modulePath?: string;
  importModule?: (specifier: string) => Promise<unknown>;
}

const EMPTY_SCHEMA: ToolInputSchema = { type: 'object', properties: {} };

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();
  private store: SessionStore;
  private modulePath?: string;
  private importModule: (specifier: string) => Promise<unknown>;
  private generation = 0;

  constructor(options: ToolRegistryOptions) {
    this.store = options.store;
    this.modulePath = options.modulePath;
    this.importModule = options.importModule ?? ((specifier) => import(specifier));
  }

  registerTool(name: string, handler: ToolHandler, metadata: ToolMetadata = {}, source: ToolSource = 'builtin'): void {
    const existing = this.tools.get(name);
    if (existing?.source === 'builtin' && source === 'module') {
      log.warn('Module tool shadows a built-in, ignoring it', { name });
      return;
    }

    this.tools.set(name, {
      name,
      description: metadata.description ?? name,
      inputSchema: metadata.inputSchema ?? EMPTY_SCHEMA,
      source,
      handler,
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  /**
   * @throws UnknownToolError when no tool has this name
   */
  async call(name: string, args: ToolArgs = {}): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, [...this.tools.keys()]);
    }
    return tool.handler(args);
  }

  /**
   * Re-import the tool module. Never throws; failures are reported in the
   * result and leave only the built-ins registered.
   */
  async reload(): Promise<ReloadResult> {
    for (const tool of this.list()) {
      if (tool.source === 'module') {
        this.tools.delete(tool.name);
      }
    }

    if (!this.modulePath) {
      return { loaded: false, tools: [], error: 'No tool module configured' };
    }

    const url = pathToFileURL(path.resolve(this.modulePath));
    url.searchParams.set('v', `${Date.now()}-${++this.generation}`);

    const registered: string[] = [];
    const host: ToolHost = {
      registerTool: (name, handler, metadata) => {
        this.registerTool(name, handler, metadata, 'module');
        if (this.tools.get(name)?.source === 'module' && !registered.includes(name)) {
          registered.push(name);
        }
      },
      lookupCookies: (target) => this.store.lookupCookies(target),
      lookupCsrfToken: () => this.store.lookupCsrfToken(),
    };

    try {
      const mod = await this.importModule(url.href);
      if (!isToolModule(mod)) {
        throw new Error(invalidToolModuleError(this.modulePath));
      }
      await mod.register(host);
    } catch (error) {
      const message = errorMessage(error);
      log.error('Failed to load tool module', { module: this.modulePath, error });
      for (const name of registered) {
        this.tools.delete(name);
      }
      return { loaded: false, tools: [], error: message };
    }

    log.info('Tool module loaded', { module: this.modulePath, tools: registered.length });
    return { loaded: true, tools: registered };
  }
}
