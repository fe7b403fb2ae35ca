/**
 * Instance lock
 *
 * Decides once per process whether this instance is the single writer of the
 * state file or a read-only reader. The lock is a listening local socket:
 * the operating system closes it when the owning process exits, cleanly or
 * not, so nothing has to be cleaned up after a crash.
 *
 * Strategies:
 * - abstract-socket (Linux): abstract-namespace socket, never touches disk
 * - named-pipe (Windows): named pipe, removed by the system with its owner
 * - socket-file (other POSIX): Unix socket at the lock path; a file left by
 *   a dead owner refuses connections and is replaced. Only the holder of
 *   the `<lock>.claim` file may remove it, and it probes again first, so a
 *   live socket that another instance has just bound is never deleted.
 */

import { createHash, randomBytes } from 'crypto';
import fs from 'fs';
import net from 'net';
import path from 'path';
import { APP } from '../constants/config';
import type { InstanceRole } from '../types';
import { Errors } from '../utils/errorHandler';
import { logger } from './logger';

const lockLogger = logger.withScope('LockCoordinator');

export type LockStrategy = 'abstract-socket' | 'named-pipe' | 'socket-file';

export interface LockDecision {
  role: InstanceRole;
  strategy: LockStrategy;
  /** True when the lock primitive failed and reader mode was forced */
  degraded: boolean;
  reason?: string;
}

export interface LockCoordinatorOptions {
  strategy?: LockStrategy;
}

type BindOutcome = 'bound' | 'in-use';

export function defaultLockStrategy(platform: NodeJS.Platform = process.platform): LockStrategy {
  if (platform === 'linux') {
    return 'abstract-socket';
  }
  if (platform === 'win32') {
    return 'named-pipe';
  }
  return 'socket-file';
}

/**
 * Socket endpoint for a lock path. Abstract and pipe names are derived from
 * a hash of the absolute path so that they stay within socket name limits.
 */
export function lockEndpoint(lockPath: string, strategy: LockStrategy): string {
  const absolute = path.resolve(lockPath);
  const digest = createHash('sha256').update(absolute).digest('hex').slice(0, 32);
  switch (strategy) {
    case 'abstract-socket':
      return `\0${APP.NAME}-${digest}`;
    case 'named-pipe':
      return `\\\\.\\pipe\\${APP.NAME}-${digest}`;
    case 'socket-file':
      return absolute;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

export class LockCoordinator {
  readonly lockPath: string;
  readonly strategy: LockStrategy;
  private decision: Promise<LockDecision> | null = null;
  private server: net.Server | null = null;

  constructor(lockPath: string, options: LockCoordinatorOptions = {}) {
    this.lockPath = path.resolve(lockPath);
    this.strategy = options.strategy ?? defaultLockStrategy();
  }

  /**
   * Try the lock without waiting. The first call decides the role; later
   * calls return the same decision.
   */
  acquire(): Promise<LockDecision> {
    if (!this.decision) {
      this.decision = this.decide();
    }
    return this.decision;
  }

  isHeld(): boolean {
    return this.server !== null;
  }

  /**
   * Close the lock socket. The role decision is not revisited afterwards.
   */
  async release(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          lockLogger.warn('Error while closing lock socket:', error);
        }
        resolve();
      });
    });
    lockLogger.debug('Writer lock released');
  }

  private async decide(): Promise<LockDecision> {
    const endpoint = lockEndpoint(this.lockPath, this.strategy);
    try {
      if (this.strategy === 'socket-file') {
        await fs.promises.mkdir(path.dirname(this.lockPath), { recursive: true });
      }

      let outcome = await this.bind(endpoint);
      if (outcome === 'in-use' && this.strategy === 'socket-file' && await this.isStale(endpoint)) {
        outcome = await this.replaceStaleSocket(endpoint);
      }

      if (outcome === 'bound') {
        lockLogger.info('Acquired writer lock:', this.lockPath);
        return { role: 'writer', strategy: this.strategy, degraded: false };
      }

      lockLogger.info('Another instance holds the lock, running read-only');
      return { role: 'reader', strategy: this.strategy, degraded: false };
    } catch (error) {
      const lockError = Errors.lockUnavailable(this.lockPath, error);
      lockLogger.warn(lockError.message, '- running read-only', lockError.details);
      return {
        role: 'reader',
        strategy: this.strategy,
        degraded: true,
        reason: lockError.message,
      };
    }
  }

  private async replaceStaleSocket(endpoint: string): Promise<BindOutcome> {
    const claimPath = `${this.lockPath}.claim`;
    if (!(await this.claim(claimPath))) {
      lockLogger.debug('Another instance is replacing the lock socket');
      return 'in-use';
    }

    try {
      // The claim may have been released by an instance that already rebound
      if (!(await this.isStale(endpoint))) {
        return 'in-use';
      }
      lockLogger.info('Replacing lock socket left by an exited process');
      await fs.promises.rm(endpoint, { force: true });
      return await this.bind(endpoint);
    } finally {
      await fs.promises.rm(claimPath, { force: true });
    }
  }

  /**
   * Create the claim file holding our pid. A hard link from a private draft
   * makes creation exclusive and the content complete from the first moment.
   */
  private async claim(claimPath: string): Promise<boolean> {
    const draft = `${claimPath}.${process.pid}.${randomBytes(4).toString('hex')}`;
    await fs.promises.writeFile(draft, String(process.pid), { flag: 'wx' });
    try {
      await fs.promises.link(draft, claimPath);
      return true;
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
      await this.clearAbandonedClaim(claimPath);
      return false;
    } finally {
      await fs.promises.rm(draft, { force: true });
    }
  }

  // Removed for the next start; this instance stays a reader
  private async clearAbandonedClaim(claimPath: string): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(claimPath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return;
      }
      throw error;
    }

    const owner = Number(content.trim());
    if (Number.isInteger(owner) && owner > 0 && isProcessAlive(owner)) {
      return;
    }
    lockLogger.warn('Removing lock claim left by an exited process:', claimPath);
    await fs.promises.rm(claimPath, { force: true });
  }

  private bind(endpoint: string): Promise<BindOutcome> {
    return new Promise<BindOutcome>((resolve, reject) => {
      const server = net.createServer((socket) => {
        // Probes from other instances only need to see that we are alive
        socket.destroy();
      });

      const onError = (error: Error) => {
        server.close();
        if (errorCode(error) === 'EADDRINUSE') {
          resolve('in-use');
        } else {
          reject(error);
        }
      };

      server.once('error', onError);
      server.listen(endpoint, () => {
        server.off('error', onError);
        server.on('error', (error) => {
          lockLogger.warn('Lock socket error:', error);
        });
        server.unref();
        this.server = server;
        resolve('bound');
      });
    });
  }

  // A socket file whose owner died refuses connections
  private isStale(endpoint: string): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const probe = net.connect(endpoint);
      probe.once('connect', () => {
        probe.destroy();
        resolve(false);
      });
      probe.once('error', (error) => {
        probe.destroy();
        const code = errorCode(error);
        resolve(code === 'ECONNREFUSED' || code === 'ENOENT');
      });
    });
  }
}
