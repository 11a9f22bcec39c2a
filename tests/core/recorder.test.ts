import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Recorder, processEvents, EXPLORE_SELECTOR, type BrowserHost } from '../../src/core/recorder.js';
import { HeuristicEventClassifier } from '../../src/core/event-enricher.js';
import { SessionStore } from '../../src/core/session-store.js';
import { recorderConfigSchema } from '../../src/utils/config-schemas.js';
import type { NetworkEvent } from '../../src/types/index.js';
import { FakePage, fakeResponse } from '../helpers/fake-page.js';
import { createScriptedOperator } from '../helpers/fake-operator.js';

function event(url: string, method = 'GET'): NetworkEvent {
  return { method, url, request_headers: {}, status: 200, is_binary: false };
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf-8'));
}

describe('processEvents', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'process-events-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const events = [
    event('https://api.example.com/1/boards/507f1f77bcf86cd799439011'),
    event('https://api.example.com/1/boards/5f2b8c9d1e3a4b5c6d7e8f90'),
    event('https://api.example.com/1/cards', 'POST'),
  ];

  it('should write the raw and deduplicated logs side by side', async () => {
    const eventsLog = join(dir, 'events.json');

    const result = await processEvents(events, { eventsLog });

    expect(result).toEqual({
      raw: 3,
      enriched: undefined,
      unique: 2,
      files: { raw: eventsLog, enriched: undefined, unique: join(dir, 'events_unique.json') },
    });
    expect(await readJson(eventsLog)).toEqual(events);
    expect(await readJson(join(dir, 'events_unique.json'))).toEqual([events[0], events[2]]);
  });

  it('should enrich before deduplicating when a classifier is given', async () => {
    const eventsLog = join(dir, 'events.json');

    const result = await processEvents(events, { eventsLog, classifier: new HeuristicEventClassifier() });

    expect(result.enriched).toBe(3);
    expect(result.files.enriched).toBe(join(dir, 'events_enriched.json'));
    const unique = await readJson(join(dir, 'events_unique.json'));
    expect(unique).toEqual([
      { ...events[0], ai_context: { purpose: 'Reads boards', category: 'read', useful_for_tool: true } },
      { ...events[2], ai_context: { purpose: 'Writes cards', category: 'write', useful_for_tool: true } },
    ]);
  });
});

describe('Recorder', () => {
  let dir: string;
  let page: FakePage;
  let cleanup: Mock<() => Promise<void>>;
  let browser: BrowserHost;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'recorder-'));
    page = new FakePage();
    cleanup = vi.fn(async () => {});
    browser = {
      newPage: async () => page.asPage(),
      cleanup,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function config() {
    return recorderConfigSchema.parse({
      targetUrl: 'https://app.example.com/boards',
      sessionFile: join(dir, 'session.json'),
      eventsLog: join(dir, 'events.json'),
    });
  }

  it('should capture requests made while exploring with a stored session', async () => {
    const store = new SessionStore(join(dir, 'session.json'));
    await store.persist({ cookies: [{ name: 'sid', value: 'abc', domain: 'app.example.com' }] });
    page.add(EXPLORE_SELECTOR, {
      onClick: () => page.emitResponse(fakeResponse({ url: 'https://api.example.com/1/cards/507f1f77bcf86cd799439011' })),
    });
    page.add(EXPLORE_SELECTOR, { visible: false });
    page.add(EXPLORE_SELECTOR, {
      onClick: () => page.emitResponse(fakeResponse({ url: 'https://api.example.com/1/cards/5f2b8c9d1e3a4b5c6d7e8f90' })),
    });
    const analyzer = { analyze: vi.fn() };

    const recorder = new Recorder(config(), { analyzer, operator: createScriptedOperator(), browser, store });
    const result = await recorder.record();

    expect(result.session).toEqual({ authenticated: true, source: 'stored' });
    expect(analyzer.analyze).not.toHaveBeenCalled();
    expect(result.explored).toBe(2);
    expect(result.raw).toBe(2);
    expect(result.unique).toBe(1);
    expect(page.listenerCount).toBe(0);
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('should close the browser when recording fails', async () => {
    browser.newPage = async () => {
      throw new Error('Executable doesn\'t exist');
    };
    const recorder = new Recorder(config(), {
      analyzer: { analyze: vi.fn() },
      operator: createScriptedOperator(),
      browser,
    });

    await expect(recorder.record()).rejects.toThrow('Executable doesn\'t exist');
    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});
