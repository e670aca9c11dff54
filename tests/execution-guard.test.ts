import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ExecutionGuard, ExecutionGuardOptions, Lease } from '../src/service/execution-guard';
import { mockLogger } from './helpers/fake-signal-source';

const NOW = new Date('2025-06-01T12:00:00Z');

let tmpDir: string;
let lockFile: string;
let logger: ReturnType<typeof mockLogger>;

function guard(options: ExecutionGuardOptions = {}): ExecutionGuard {
  return new ExecutionGuard(
    { lockFile, staleLeaseSeconds: 1800 },
    logger,
    { pid: 4242, hostname: 'test-host', clock: () => NOW, isAlive: () => false, ...options }
  );
}

function writeLease(lease: Lease): void {
  fs.writeFileSync(lockFile, JSON.stringify(lease));
}

function secondsBefore(seconds: number): Date {
  return new Date(NOW.getTime() - seconds * 1000);
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'host-pulse-guard-'));
  lockFile = path.join(tmpDir, '.health_monitor.lock');
  logger = mockLogger();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ============================================
// ACQUIRE
// ============================================

describe('ExecutionGuard - acquire', () => {
  it('creates the lease file naming this process', async () => {
    const result = await guard().acquire();
    expect(result.status).toBe('acquired');
    expect(JSON.parse(fs.readFileSync(lockFile, 'utf8'))).toEqual({
      pid: 4242,
      hostname: 'test-host',
      acquiredAt: '2025-06-01T12:00:00.000Z'
    });
  });

  it('is busy while the holder is alive', async () => {
    await guard().acquire();
    const result = await guard({ pid: 5555, isAlive: pid => pid === 4242 }).acquire();
    expect(result).toEqual({
      status: 'busy',
      reason: 'Another instance (PID 4242) is already running',
      holder: { pid: 4242, hostname: 'test-host', acquiredAt: '2025-06-01T12:00:00.000Z' }
    });
  });

  it('waits for a dead holder until the lease goes stale', async () => {
    writeLease({ pid: 777, hostname: 'test-host', acquiredAt: secondsBefore(60).toISOString() });
    const result = await guard().acquire();
    expect(result.status).toBe('busy');
    if (result.status !== 'busy') return;
    expect(result.reason).toBe('Lease holder is not running but the lease is only 60s old; waiting for it to go stale');
    expect(fs.existsSync(lockFile)).toBe(true);
  });

  it('reclaims a stale lease from a dead holder', async () => {
    const stale: Lease = { pid: 777, hostname: 'test-host', acquiredAt: secondsBefore(7200).toISOString() };
    writeLease(stale);

    const result = await guard().acquire();

    expect(result.status).toBe('acquired');
    expect(logger.warn).toHaveBeenCalledWith('Reclaiming stale execution lease', { ageSeconds: 7200, holder: stale });
    expect(JSON.parse(fs.readFileSync(lockFile, 'utf8')).pid).toBe(4242);
  });

  it('does not reclaim a stale lease whose holder is still alive', async () => {
    writeLease({ pid: 777, hostname: 'test-host', acquiredAt: secondsBefore(7200).toISOString() });
    const result = await guard({ isAlive: () => true }).acquire();
    expect(result.status).toBe('busy');
  });

  it('ages an unreadable lease file by its modification time', async () => {
    fs.writeFileSync(lockFile, 'not json');
    fs.utimesSync(lockFile, secondsBefore(10), secondsBefore(10));

    const recent = await guard().acquire();
    expect(recent.status).toBe('busy');
    if (recent.status === 'busy') {
      expect(recent.holder).toBeNull();
      expect(recent.reason).toBe('Lease holder is not running but the lease is only 10s old; waiting for it to go stale');
    }

    fs.utimesSync(lockFile, secondsBefore(3600), secondsBefore(3600));
    expect((await guard().acquire()).status).toBe('acquired');
  });
});

// ============================================
// RELEASE
// ============================================

describe('ExecutionGuard - release', () => {
  it('releases the lease after the guarded work', async () => {
    const g = guard();
    const result = await g.withLease(async lease => {
      expect(fs.existsSync(lockFile)).toBe(true);
      return lease.pid;
    });
    expect(result).toEqual({ status: 'completed', value: 4242 });
    expect(fs.existsSync(lockFile)).toBe(false);
    expect(g.isHeld()).toBe(false);
  });

  it('releases the lease when the guarded work throws', async () => {
    await expect(guard().withLease(async () => {
      throw new Error('collection failed');
    })).rejects.toThrow('collection failed');
    expect(fs.existsSync(lockFile)).toBe(false);
  });

  it('does not run the work while another instance holds the lease', async () => {
    await guard().acquire();
    const work = jest.fn(async () => 1);
    const result = await guard({ pid: 5555, isAlive: () => true }).withLease(work);
    expect(result.status).toBe('busy');
    expect(work).not.toHaveBeenCalled();
    expect(fs.existsSync(lockFile)).toBe(true);
  });

  it('leaves a lease that now names another holder', async () => {
    const g = guard();
    await g.acquire();
    writeLease({ pid: 9999, hostname: 'test-host', acquiredAt: NOW.toISOString() });

    expect(await g.release()).toBe(false);
    expect(fs.existsSync(lockFile)).toBe(true);
  });

  it('releases synchronously for exit handlers', async () => {
    const g = guard();
    await g.acquire();
    g.releaseSync();
    expect(fs.existsSync(lockFile)).toBe(false);
    expect(g.isHeld()).toBe(false);
  });

  it('does nothing on release when no lease is held', async () => {
    writeLease({ pid: 777, hostname: 'test-host', acquiredAt: NOW.toISOString() });
    const g = guard();
    expect(await g.release()).toBe(false);
    g.releaseSync();
    expect(fs.existsSync(lockFile)).toBe(true);
  });
});
