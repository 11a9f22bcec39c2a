import { describe, it, expect } from 'vitest';
import { convertToHar, convertEventToHarEntry, serializeHar } from '../../src/utils/har-converter.js';
import type { NetworkEvent } from '../../src/types/index.js';

const STARTED = '2024-01-02T03:04:05.000Z';

describe('HAR Converter', () => {
  describe('convertToHar', () => {
    it('should convert an empty log to valid HAR', () => {
      const har = convertToHar([], { startedAt: new Date(STARTED) });

      expect(har).toEqual({
        log: {
          version: '1.2',
          creator: { name: 'session-capture', version: '0.1.0' },
          entries: [],
        },
      });
    });

    it('should keep log order and stamp every entry', () => {
      const events: NetworkEvent[] = [
        { method: 'GET', url: 'https://api.example.com/1/a', request_headers: {}, status: 200, is_binary: false },
        { method: 'GET', url: 'https://api.example.com/1/b', request_headers: {}, status: 200, is_binary: false },
      ];

      const har = convertToHar(events, { startedAt: new Date(STARTED) });

      expect(har.log.entries.map((e) => e.request.url)).toEqual(['https://api.example.com/1/a', 'https://api.example.com/1/b']);
      expect(har.log.entries.every((e) => e.startedDateTime === STARTED)).toBe(true);
    });
  });

  describe('convertEventToHarEntry', () => {
    it('should convert a text body, query string and enrichment', () => {
      const entry = convertEventToHarEntry(
        {
          method: 'POST',
          url: 'https://api.example.com/1/cards?idList=abc',
          request_headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          status: 200,
          post_data: 'name=Todo',
          is_binary: false,
          ai_context: { purpose: 'Creates a card', category: 'write', useful_for_tool: true },
        },
        STARTED
      );

      expect(entry.request).toEqual({
        method: 'POST',
        url: 'https://api.example.com/1/cards?idList=abc',
        httpVersion: 'HTTP/1.1',
        cookies: [],
        headers: [{ name: 'Content-Type', value: 'application/x-www-form-urlencoded' }],
        queryString: [{ name: 'idList', value: 'abc' }],
        postData: { mimeType: 'application/x-www-form-urlencoded', text: 'name=Todo' },
        headersSize: 49,
        bodySize: 9,
      });
      expect(entry.response.status).toBe(200);
      expect(entry.response.statusText).toBe('OK');
      expect(entry.comment).toBe('write: Creates a card');
    });

    it('should mark binary bodies as base64 and size them by decoded bytes', () => {
      const entry = convertEventToHarEntry(
        {
          method: 'PUT',
          url: 'https://api.example.com/upload',
          request_headers: {},
          status: 201,
          post_data_base64: '//4A',
          is_binary: true,
        },
        STARTED
      );

      expect(entry.request.postData).toEqual({ mimeType: 'application/octet-stream', text: '//4A', encoding: 'base64' });
      expect(entry.request.bodySize).toBe(3);
      expect(entry.response.statusText).toBe('Created');
    });

    it('should leave out postData when there is no body', () => {
      const entry = convertEventToHarEntry(
        { method: 'GET', url: 'not a url', request_headers: {}, status: 299, is_binary: false },
        STARTED
      );

      expect(entry.request.postData).toBeUndefined();
      expect(entry.request.bodySize).toBe(0);
      expect(entry.request.queryString).toEqual([]);
      expect(entry.response.statusText).toBe('');
      expect(entry.comment).toBeUndefined();
    });
  });

  describe('serializeHar', () => {
    it('should pretty-print by default', () => {
      const har = convertToHar([], { startedAt: new Date(STARTED) });

      expect(serializeHar(har)).toContain('\n  "log": {');
      expect(serializeHar(har, false)).toBe(
        '{"log":{"version":"1.2","creator":{"name":"session-capture","version":"0.1.0"},"entries":[]}}'
      );
    });
  });
});
