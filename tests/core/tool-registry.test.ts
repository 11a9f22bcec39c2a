import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ToolRegistry, UnknownToolError, type ToolHost } from '../../src/core/tool-registry.js';
import { SessionStore } from '../../src/core/session-store.js';

describe('ToolRegistry', () => {
  let dir: string;
  let store: SessionStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tool-registry-'));
    store = new SessionStore(join(dir, 'session.json'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  /**
   * Importer that hands out the given modules in turn
   */
  function importer(...modules: unknown[]) {
    const queue = [...modules];
    return vi.fn(async (_specifier: string) => queue.shift());
  }

  function moduleRegistering(...names: string[]) {
    return {
      register: (host: ToolHost) => {
        for (const name of names) {
          host.registerTool(name, () => `${name} result`, { description: `Runs ${name}` });
        }
      },
    };
  }

  describe('built-in tools', () => {
    it('should call a registered tool with its arguments', async () => {
      const registry = new ToolRegistry({ store });
      const handler = vi.fn((args: Record<string, unknown>) => ({ echoed: args }));
      registry.registerTool('echo', handler);

      await expect(registry.call('echo', { q: 'boards' })).resolves.toEqual({ echoed: { q: 'boards' } });
      expect(registry.list()[0]).toMatchObject({
        name: 'echo',
        description: 'echo',
        inputSchema: { type: 'object', properties: {} },
        source: 'builtin',
      });
    });

    it('should reject an unknown tool with a suggestion', async () => {
      const registry = new ToolRegistry({ store });
      registry.registerTool('list_boards', () => []);

      const call = registry.call('list_board');

      await expect(call).rejects.toBeInstanceOf(UnknownToolError);
      await expect(registry.call('list_board')).rejects.toThrow('Did you mean: list_boards?');
    });
  });

  describe('reload', () => {
    it('should report that no module is configured', async () => {
      const registry = new ToolRegistry({ store });

      await expect(registry.reload()).resolves.toEqual({
        loaded: false,
        tools: [],
        error: 'No tool module configured',
      });
    });

    it('should import the module under a fresh URL each time', async () => {
      const importModule = importer(moduleRegistering('list_boards'), moduleRegistering('list_boards'));
      const registry = new ToolRegistry({ store, modulePath: join(dir, 'tools.mjs'), importModule });

      await expect(registry.reload()).resolves.toEqual({ loaded: true, tools: ['list_boards'] });
      await registry.reload();

      const [first, second] = importModule.mock.calls.map(([specifier]) => specifier);
      expect(first).toMatch(/^file:\/\/.*\/tools\.mjs\?v=\d+-1$/);
      expect(second).toMatch(/\?v=\d+-2$/);
      await expect(registry.call('list_boards')).resolves.toBe('list_boards result');
    });

    it('should drop module tools the new version no longer registers', async () => {
      const registry = new ToolRegistry({
        store,
        modulePath: join(dir, 'tools.mjs'),
        importModule: importer(moduleRegistering('list_boards', 'create_card'), moduleRegistering('create_card')),
      });

      await registry.reload();
      await registry.reload();

      expect(registry.list().map((tool) => tool.name)).toEqual(['create_card']);
    });

    it('should not let a module tool replace a built-in', async () => {
      const registry = new ToolRegistry({
        store,
        modulePath: join(dir, 'tools.mjs'),
        importModule: importer(moduleRegistering('reload_tools', 'list_boards')),
      });
      registry.registerTool('reload_tools', () => 'built-in');

      const result = await registry.reload();

      expect(result.tools).toEqual(['list_boards']);
      await expect(registry.call('reload_tools')).resolves.toBe('built-in');
    });

    it('should reject a module without register()', async () => {
      const registry = new ToolRegistry({
        store,
        modulePath: join(dir, 'tools.mjs'),
        importModule: importer({ default: () => undefined }),
      });

      const result = await registry.reload();

      expect(result.loaded).toBe(false);
      expect(result.error).toContain('does not export a register(host) function');
    });

    it('should remove tools registered before register() threw', async () => {
      const registry = new ToolRegistry({
        store,
        modulePath: join(dir, 'tools.mjs'),
        importModule: importer({
          register: (host: ToolHost) => {
            host.registerTool('list_boards', () => []);
            throw new Error('syntax error in generated code');
          },
        }),
      });

      const result = await registry.reload();

      expect(result).toEqual({ loaded: false, tools: [], error: 'syntax error in generated code' });
      expect(registry.has('list_boards')).toBe(false);
    });

    it('should give module tools the stored session', async () => {
      await store.persist({
        cookies: [
          { name: 'sid', value: 'abc', domain: '.example.com' },
          { name: 'dsc', value: 'test-csrf', domain: '.example.com' },
        ],
      });
      const registry = new ToolRegistry({
        store,
        modulePath: join(dir, 'tools.mjs'),
        importModule: importer({
          register: (host: ToolHost) => {
            host.registerTool('whoami', async () => ({
              cookies: await host.lookupCookies('https://api.example.com/1/members/me'),
              csrf: await host.lookupCsrfToken(),
            }));
          },
        }),
      });

      await registry.reload();

      await expect(registry.call('whoami')).resolves.toEqual({
        cookies: { sid: 'abc', dsc: 'test-csrf' },
        csrf: 'test-csrf',
      });
    });
  });
});
