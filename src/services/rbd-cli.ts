import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import { RbdExecError } from '../lib/errors';
import defaultLogger from '../lib/logger';
import type { Logger } from '../lib/logger';

/**
 * Runs one rbd command and hands back its raw stdout. Implementations do not retry,
 * cache or look at the bytes.
 */
export interface StatusFetcher {
  fetch(signal: AbortSignal, args: readonly string[]): Promise<Buffer>;
}

export type RbdCliOptions = {
  binary?: string;
  debug?: boolean;
  logger?: Logger;
};

export class RbdCli implements StatusFetcher {
  private readonly binary: string;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(options: RbdCliOptions = {}) {
    this.binary = options.binary ?? 'rbd';
    this.debug = options.debug ?? false;
    this.logger = (options.logger ?? defaultLogger).child('rbd');
  }

  async fetch(signal: AbortSignal, args: readonly string[]): Promise<Buffer> {
    if (this.debug) {
      this.logger.debug(`run: ${this.binary} ${args.join(' ')}`);
    }
    try {
      return await this.run(signal, args);
    } catch (err) {
      if (this.debug && err instanceof RbdExecError) {
        this.logger.debug(`${this.binary} error: ${err.message}`, {
          reason: err.reason,
          exitCode: err.exitCode,
          stderr: err.stderr,
        });
      }
      throw err;
    }
  }

  private async run(signal: AbortSignal, args: readonly string[]): Promise<Buffer> {
    if (signal.aborted) {
      throw new RbdExecError('deadline elapsed before rbd was started', { reason: 'timeout', args });
    }

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(this.binary, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err) {
      throw new RbdExecError('rbd spawn failed', {
        reason: 'spawn',
        args,
        stderr: err instanceof Error ? err.message : String(err),
      });
    }

    const stdout: Buffer[] = [];
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });

    let timedOut = false;
    const onAbort = () => {
      timedOut = true;
      child.kill('SIGKILL');
    };
    signal.addEventListener('abort', onAbort, { once: true });

    const exit = await new Promise<{ exitCode: number | null; spawnError?: Error }>((resolve) => {
      let done = false;
      const finish = (value: { exitCode: number | null; spawnError?: Error }) => {
        if (done) return;
        done = true;
        resolve(value);
      };
      child.on('error', (err) => finish({ exitCode: null, spawnError: err }));
      child.on('close', (code) => finish({ exitCode: code }));
    });

    signal.removeEventListener('abort', onAbort);

    if (exit.spawnError) {
      throw new RbdExecError('rbd failed to start', {
        reason: 'spawn',
        args,
        stderr: exit.spawnError.message,
      });
    }

    if (timedOut) {
      throw new RbdExecError('rbd killed at scrape deadline', {
        reason: 'timeout',
        args,
        exitCode: exit.exitCode,
        stderr,
      });
    }

    if (exit.exitCode !== 0) {
      throw new RbdExecError(`rbd exited with code ${exit.exitCode ?? 'null'}`, {
        reason: 'exit',
        args,
        exitCode: exit.exitCode,
        stderr,
      });
    }

    return Buffer.concat(stdout);
  }
}
