/**
 * Operator I/O
 *
 * Blocking prompts for credentials, one-time codes and manual confirmation.
 * The login loop never proceeds past a field without either a value or an
 * explicit skip (an empty answer).
 */

import { createInterface, type Interface } from 'node:readline';
import { Writable } from 'node:stream';

export type SecretField = 'email' | 'password' | 'otp';

export interface OperatorPrompt {
  /**
   * Ask for the value of a field the analyzer found. Resolves undefined when
   * the operator skips it.
   */
  requestSecret(field: SecretField, message: string): Promise<string | undefined>;
  /**
   * Block until the operator confirms (true) or declines (false).
   */
  confirm(message: string): Promise<boolean>;
}

const FIELD_PROMPTS: Record<SecretField, string> = {
  email: 'An email/username field is on the page. Enter it (leave empty to skip): ',
  password: 'A password field is on the page. Enter it (leave empty to skip): ',
  otp: 'A one-time code field is on the page. Enter the code (leave empty to skip): ',
};

export function defaultPromptFor(field: SecretField): string {
  return FIELD_PROMPTS[field];
}

export interface ConsolePromptOptions {
  /** Treat the input as a terminal (echo handled by readline); defaults to the input's isTTY */
  terminal?: boolean;
}

/**
 * Terminal implementation on stdin/stderr. Password input is not echoed.
 *
 * One readline interface serves every question. Lines that arrive before a
 * question is asked (piped input) are queued, not dropped. Call `close()`
 * when done so the input no longer holds the process open.
 */
export class ConsoleOperatorPrompt implements OperatorPrompt {
  private rl?: Interface;
  private muted = false;
  private closed = false;
  private lines: string[] = [];
  private waiting: Array<(line: string) => void> = [];
  private terminal: boolean;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stderr,
    options: ConsolePromptOptions = {}
  ) {
    this.terminal = options.terminal ?? ('isTTY' in input && input.isTTY === true);
  }

  async requestSecret(field: SecretField, message: string): Promise<string | undefined> {
    const answer = await this.ask(`>> ${message}`, field === 'password');
    const trimmed = field === 'password' ? answer : answer.trim();
    return trimmed === '' ? undefined : trimmed;
  }

  async confirm(message: string): Promise<boolean> {
    this.output.write(`\n${'='.repeat(40)}\n${message}\n${'='.repeat(40)}\n`);
    const answer = await this.ask('>> Press ENTER once done (type "n" to decline): ', false);
    return answer.trim().toLowerCase() !== 'n';
  }

  close(): void {
    this.rl?.close();
  }

  private reader(): Interface {
    if (this.rl) {
      return this.rl;
    }
    const target = this.output;
    const sink = new Writable({
      write: (chunk: Buffer | string, _encoding, callback) => {
        if (!this.muted) {
          target.write(chunk);
        }
        callback();
      },
    });

    const rl = createInterface({ input: this.input, output: sink, terminal: this.terminal, historySize: 0 });
    rl.on('line', (line: string) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.lines.push(line);
      }
    });
    // End of input answers every open question with a skip
    rl.on('close', () => {
      this.closed = true;
      for (const next of this.waiting.splice(0)) {
        next('');
      }
    });
    this.rl = rl;
    return rl;
  }

  private async ask(question: string, masked: boolean): Promise<string> {
    this.reader();
    this.output.write(question);

    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return buffered;
    }
    if (this.closed) {
      return '';
    }

    this.muted = masked;
    try {
      return await new Promise<string>((resolve) => this.waiting.push(resolve));
    } finally {
      if (masked) {
        this.muted = false;
        this.output.write('\n');
      }
    }
  }
}
