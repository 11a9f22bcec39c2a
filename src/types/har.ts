/**
 * HAR 1.2 types (subset written by the exporter)
 *
 * See: http://www.softwareishard.com/blog/har-12-spec/
 */

export interface HarHeader {
  name: string;
  value: string;
}

export interface HarQueryParam {
  name: string;
  value: string;
}

export interface HarPostData {
  mimeType: string;
  text: string;
  /** Non-standard: set when `text` holds base64 of a binary body */
  encoding?: 'base64';
}

export interface HarRequest {
  method: string;
  url: string;
  httpVersion: string;
  cookies: Array<{ name: string; value: string }>;
  headers: HarHeader[];
  queryString: HarQueryParam[];
  postData?: HarPostData;
  headersSize: number;
  bodySize: number;
}

export interface HarResponse {
  status: number;
  statusText: string;
  httpVersion: string;
  cookies: Array<{ name: string; value: string }>;
  headers: HarHeader[];
  content: { size: number; mimeType: string; text?: string };
  redirectURL: string;
  headersSize: number;
  bodySize: number;
}

export interface HarEntry {
  startedDateTime: string;
  time: number;
  request: HarRequest;
  response: HarResponse;
  cache: Record<string, never>;
  timings: { send: number; wait: number; receive: number };
  comment?: string;
}

export interface HarLog {
  version: '1.2';
  creator: { name: string; version: string; comment?: string };
  entries: HarEntry[];
}

export interface Har {
  log: HarLog;
}
