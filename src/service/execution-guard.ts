// execution-guard.ts - Host-wide single-instance lease backed by an exclusively created file
import * as fs from 'fs';
import * as os from 'os';
import { z } from 'zod';
import { ComponentLogger } from '../common/logger';
import { errorMessage, isNodeError } from '../common/errors';
import { GuardConfig } from '../config/config';
import { safeParseJSON } from '../security';

// ============================================
// INTERFACES
// ============================================

export interface Lease {
  pid: number;
  hostname: string;
  acquiredAt: string;
}

export type LeaseResult =
  | { status: 'acquired'; lease: Lease }
  | { status: 'busy'; reason: string; holder: Lease | null };

export type GuardedResult<T> =
  | { status: 'completed'; value: T }
  | { status: 'busy'; reason: string; holder: Lease | null };

export interface ExecutionGuardOptions {
  pid?: number;
  hostname?: string;
  clock?: () => Date;
  isAlive?: (pid: number) => boolean;
}

const LeaseSchema = z.object({
  pid: z.number().int().positive(),
  hostname: z.string(),
  acquiredAt: z.string().datetime()
});

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isNodeError(error) && error.code === 'EPERM';
  }
}

// ============================================
// EXECUTION GUARD
// ============================================

export class ExecutionGuard {
  private lockFile: string;
  private staleAfterMs: number;
  private logger: ComponentLogger;
  private pid: number;
  private hostname: string;
  private clock: () => Date;
  private isAlive: (pid: number) => boolean;
  private held: Lease | null = null;

  constructor(config: GuardConfig, logger: ComponentLogger, options: ExecutionGuardOptions = {}) {
    this.lockFile = config.lockFile;
    this.staleAfterMs = config.staleLeaseSeconds * 1000;
    this.logger = logger;
    this.pid = options.pid ?? process.pid;
    this.hostname = options.hostname ?? os.hostname();
    this.clock = options.clock ?? (() => new Date());
    this.isAlive = options.isAlive ?? isProcessAlive;
  }

  async acquire(): Promise<LeaseResult> {
    const lease: Lease = {
      pid: this.pid,
      hostname: this.hostname,
      acquiredAt: this.clock().toISOString()
    };

    // One reclaim per call: if another process recreates the file first, it wins
    for (let attempt = 0; attempt < 2; attempt++) {
      if (await this.tryCreate(lease)) {
        this.held = lease;
        this.logger.info('Execution lease acquired', { lockFile: this.lockFile, pid: lease.pid });
        return { status: 'acquired', lease };
      }

      const existing = await this.inspect();
      if (existing === null) {
        continue; // vanished between create and inspect
      }

      if (existing.holder && this.isAlive(existing.holder.pid)) {
        return {
          status: 'busy',
          reason: `Another instance (PID ${existing.holder.pid}) is already running`,
          holder: existing.holder
        };
      }

      const ageSeconds = Math.round(existing.ageMs / 1000);
      if (existing.ageMs < this.staleAfterMs) {
        return {
          status: 'busy',
          reason: `Lease holder is not running but the lease is only ${ageSeconds}s old; waiting for it to go stale`,
          holder: existing.holder
        };
      }

      this.logger.warn('Reclaiming stale execution lease', { ageSeconds, holder: existing.holder });
      await this.removeFile();
    }

    return { status: 'busy', reason: 'Lease was taken by a concurrent run', holder: null };
  }

  /** Removes the lease file if it still names this process. */
  async release(): Promise<boolean> {
    if (!this.held) return false;
    const current = await this.readLease();
    if (current && (current.pid !== this.held.pid || current.hostname !== this.held.hostname)) {
      this.logger.warn('Lease file names another holder; leaving it in place', { holder: current });
      this.held = null;
      return false;
    }
    await this.removeFile();
    this.held = null;
    this.logger.info('Execution lease released', { lockFile: this.lockFile });
    return true;
  }

  /** Synchronous release for process exit handlers, where pending promises never settle. */
  releaseSync(): void {
    if (!this.held) return;
    try {
      const parsed = safeParseJSON(fs.readFileSync(this.lockFile, 'utf8'), LeaseSchema);
      if (!parsed.success || parsed.data.pid === this.held.pid) {
        fs.unlinkSync(this.lockFile);
      }
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        this.logger.error('Failed to release execution lease on exit', error);
      }
    }
    this.held = null;
  }

  async withLease<T>(work: (lease: Lease) => Promise<T>): Promise<GuardedResult<T>> {
    const result = await this.acquire();
    if (result.status === 'busy') {
      return result;
    }
    try {
      return { status: 'completed', value: await work(result.lease) };
    } finally {
      await this.release();
    }
  }

  isHeld(): boolean {
    return this.held !== null;
  }

  // ============================================
  // FILE OPERATIONS
  // ============================================

  private async tryCreate(lease: Lease): Promise<boolean> {
    try {
      await fs.promises.writeFile(this.lockFile, JSON.stringify(lease), { flag: 'wx' });
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Holder and age of the existing lease; null when the file is gone. A file that
   * does not parse has no holder and is aged by its modification time.
   */
  private async inspect(): Promise<{ holder: Lease | null; ageMs: number } | null> {
    let mtime: Date;
    try {
      mtime = (await fs.promises.stat(this.lockFile)).mtime;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return null;
      throw error;
    }

    const holder = await this.readLease();
    const since = holder ? Date.parse(holder.acquiredAt) : mtime.getTime();
    return { holder, ageMs: this.clock().getTime() - since };
  }

  private async readLease(): Promise<Lease | null> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.lockFile, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return null;
      throw error;
    }
    const parsed = safeParseJSON(content, LeaseSchema);
    if (!parsed.success) {
      this.logger.warn('Lease file is unreadable', { lockFile: this.lockFile, error: parsed.error });
      return null;
    }
    return parsed.data;
  }

  private async removeFile(): Promise<void> {
    try {
      await fs.promises.unlink(this.lockFile);
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        throw new Error(`Failed to remove lease file ${this.lockFile}: ${errorMessage(error)}`);
      }
    }
  }
}
