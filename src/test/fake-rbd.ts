import { RbdExecError } from '../lib/errors';
import type { LevelName, Logger } from '../lib/logger';
import { createLogger } from '../lib/logger';
import type { StatusFetcher } from '../services/rbd-cli';

type Reply = string | Error | ((signal: AbortSignal) => Promise<Buffer>);

/**
 * In-process stand-in for the rbd CLI. Replies are keyed by the joined argument list.
 */
export class FakeRbd implements StatusFetcher {
  readonly calls: string[][] = [];
  private readonly replies = new Map<string, Reply>();

  on(args: readonly string[], reply: Reply): this {
    this.replies.set(args.join(' '), reply);
    return this;
  }

  async fetch(signal: AbortSignal, args: readonly string[]): Promise<Buffer> {
    this.calls.push([...args]);
    const reply = this.replies.get(args.join(' '));
    if (reply === undefined) {
      throw new RbdExecError('rbd exited with code 2', {
        reason: 'exit',
        args,
        exitCode: 2,
        stderr: `rbd: no fake reply for ${args.join(' ')}`,
      });
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(signal);
    return Buffer.from(reply, 'utf8');
  }
}

/** Resolves only when the signal fires, then fails the way RbdCli does at the deadline. */
export function hangUntilAborted(args: readonly string[]): (signal: AbortSignal) => Promise<Buffer> {
  return (signal) =>
    new Promise<Buffer>((_resolve, reject) => {
      signal.addEventListener(
        'abort',
        () => reject(new RbdExecError('rbd killed at scrape deadline', { reason: 'timeout', args })),
        { once: true },
      );
    });
}

export type CapturedLine = { level: LevelName; line: string };

export function captureLogger(level: LevelName = 'debug'): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger({ level, write: (lvl, line) => lines.push({ level: lvl, line }) });
  return { logger, lines };
}
