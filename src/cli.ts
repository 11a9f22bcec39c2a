#!/usr/bin/env node

import 'dotenv/config';
import { promises as fs } from 'node:fs';
import process from 'node:process';
import { Command } from 'commander';
import { dedupeEvents } from './core/event-dedup.js';
import { HeuristicEventClassifier } from './core/event-enricher.js';
import { HeuristicPageAnalyzer } from './core/page-analyzer.js';
import { Recorder, type RecordResult } from './core/recorder.js';
import { SessionStore } from './core/session-store.js';
import { startToolServer } from './mcp/server.js';
import type { RecorderConfig } from './utils/config-schemas.js';
import { parseLogConfig, parseRecorderConfig, parseSessionConfig, parseToolServerConfig } from './utils/env-parser.js';
import { readEventLog, uniqueLogPath, writeEventLog } from './utils/event-log.js';
import { convertToHar, serializeHar } from './utils/har-converter.js';
import { configureLogger, logger } from './utils/logger.js';
import { ConsoleOperatorPrompt } from './utils/operator-prompt.js';

const log = logger.create('CLI');

interface RecordFlags {
  target?: string;
  loginUrl?: string;
  session?: string;
  events?: string;
  headless?: boolean;
  maxSteps?: string;
  enrich: boolean;
}

const program = new Command();
program
  .name('session-capture')
  .description('Log in to a site, capture its API traffic and persist the session for replay')
  .version('0.1.0')
  .hook('preAction', () => {
    const { level, prettyPrint } = parseLogConfig();
    configureLogger({ level, prettyPrint });
  });

program
  .command('record')
  .description('Log in (or reuse the stored session), then record fetch/XHR traffic on the target page')
  .option('--target <url>', 'page to record (TARGET_URL)')
  .option('--login-url <url>', 'page the login flow starts on (LOGIN_URL)')
  .option('--session <file>', 'session file (SESSION_FILE)')
  .option('--events <file>', 'raw event log path, must end in .json (EVENTS_LOG)')
  .option('--headless', 'run the browser without a window (HEADLESS)')
  .option('--max-steps <n>', 'login analysis cycles before giving up (MAX_LOGIN_STEPS)')
  .option('--no-enrich', 'skip classification of captured events')
  .action(async (flags: RecordFlags) => {
    const overrides: Partial<Record<keyof RecorderConfig, string>> = {
      targetUrl: flags.target,
      loginUrl: flags.loginUrl,
      sessionFile: flags.session,
      eventsLog: flags.events,
      headless: flags.headless ? 'true' : undefined,
      maxLoginSteps: flags.maxSteps,
    };
    const config = parseRecorderConfig(process.env, overrides);

    const operator = new ConsoleOperatorPrompt();
    const recorder = new Recorder(config, {
      analyzer: new HeuristicPageAnalyzer({
        requireLoggedInMarker: config.loginUrl === undefined || config.loginUrl === config.targetUrl,
      }),
      operator,
      classifier: flags.enrich ? new HeuristicEventClassifier() : undefined,
    });

    let result: RecordResult;
    try {
      result = await recorder.record();
    } finally {
      operator.close();
    }
    process.stdout.write(`${JSON.stringify({
      authenticated: result.session.authenticated,
      session: result.session.source,
      events: result.raw,
      unique: result.unique,
      files: result.files,
    }, null, 2)}\n`);
  });

program
  .command('dedupe <file>')
  .description('Reduce an event log to one example per endpoint')
  .option('-o, --output <file>', 'output path (default: <file>_unique.json)')
  .action(async (file: string, flags: { output?: string }) => {
    const events = await readEventLog(file);
    const output = flags.output ?? uniqueLogPath(file);
    const written = await writeEventLog(output, dedupeEvents(events));
    process.stdout.write(`${events.length} events -> ${written} unique endpoints in ${output}\n`);
  });

program
  .command('har <file>')
  .description('Convert an event log to HAR 1.2')
  .option('-o, --output <file>', 'output path (default: <file>.har)')
  .action(async (file: string, flags: { output?: string }) => {
    const events = await readEventLog(file);
    const output = flags.output ?? file.replace(/\.json$/, '') + '.har';
    await fs.writeFile(output, serializeHar(convertToHar(events)), 'utf-8');
    process.stdout.write(`Wrote ${events.length} entries to ${output}\n`);
  });

program
  .command('cookies <url>')
  .description('Print the stored cookies that apply to a URL')
  .option('--session <file>', 'session file (SESSION_FILE)')
  .option('--header', 'print a Cookie header instead of JSON')
  .action(async (url: string, flags: { session?: string; header?: boolean }) => {
    const { sessionFile } = parseSessionConfig(process.env, { sessionFile: flags.session });
    const store = new SessionStore(sessionFile);
    if (flags.header) {
      process.stdout.write(`${await store.cookieHeader(url)}\n`);
      return;
    }
    const cookies = await store.lookupCookies(url);
    const csrfToken = await store.lookupCsrfToken();
    process.stdout.write(`${JSON.stringify({ cookies, csrfToken }, null, 2)}\n`);
  });

program
  .command('serve')
  .description('Serve the generated replay tools over MCP stdio')
  .action(async () => {
    await startToolServer(parseToolServerConfig());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error('Command failed', { error });
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
