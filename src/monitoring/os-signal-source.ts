// os-signal-source.ts - Boundary to the host's query tools and filesystem
import * as fs from 'fs';
import * as path from 'path';
import { runCommand, QueryOutcome } from './command-runner';

/**
 * Everything the collectors need from the operating system. The macOS
 * implementation shells out to the system tools; tests hand in fakes.
 */
export interface OsSignalSource {
  /** Runs the unified log tool (`log <args>`) under a deadline. */
  queryLog(args: string[], timeoutMs: number): Promise<QueryOutcome>;
  exec(file: string, args: string[], timeoutMs: number): Promise<QueryOutcome>;
  /** Full paths of the regular files in `dir` whose extension is one of `extensions`; empty when the directory is missing. */
  listFiles(dir: string, extensions: string[]): Promise<string[]>;
  modifiedAt(filePath: string): Promise<Date | null>;
  pathExists(p: string): Promise<boolean>;
  isExecutable(p: string): Promise<boolean>;
  readText(filePath: string): Promise<string | null>;
  /** Entries below `dir` whose name contains `needle` (case-insensitive), at most `limit`. */
  findEntries(dir: string, needle: string, limit: number): Promise<string[]>;
}

export interface MacOsSignalSourceOptions {
  logBinary?: string;
  maxOutputBytes?: number;
  searchDepth?: number;
}

export class MacOsSignalSource implements OsSignalSource {
  private logBinary: string;
  private maxOutputBytes: number;
  private searchDepth: number;

  constructor(options: MacOsSignalSourceOptions = {}) {
    this.logBinary = options.logBinary ?? '/usr/bin/log';
    this.maxOutputBytes = options.maxOutputBytes ?? 256 * 1024 * 1024;
    this.searchDepth = options.searchDepth ?? 3;
  }

  queryLog(args: string[], timeoutMs: number): Promise<QueryOutcome> {
    return runCommand(this.logBinary, args, { timeoutMs, maxBufferBytes: this.maxOutputBytes });
  }

  exec(file: string, args: string[], timeoutMs: number): Promise<QueryOutcome> {
    return runCommand(file, args, { timeoutMs });
  }

  async listFiles(dir: string, extensions: string[]): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch {
      return [];
    }
    return entries
      .filter(entry => entry.isFile() && extensions.includes(path.extname(entry.name)))
      .map(entry => path.join(dir, entry.name));
  }

  async modifiedAt(filePath: string): Promise<Date | null> {
    try {
      const stats = await fs.promises.stat(filePath);
      return stats.mtime;
    } catch {
      return null;
    }
  }

  async pathExists(p: string): Promise<boolean> {
    try {
      await fs.promises.access(p, fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async isExecutable(p: string): Promise<boolean> {
    try {
      await fs.promises.access(p, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  async readText(filePath: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(filePath, 'utf8');
    } catch {
      return null;
    }
  }

  async findEntries(dir: string, needle: string, limit: number): Promise<string[]> {
    const hits: string[] = [];
    const lowered = needle.toLowerCase();

    const walk = async (current: string, depth: number): Promise<void> => {
      if (hits.length >= limit) return;
      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(current, { withFileTypes: true });
      } catch {
        return;
      }
      for (const entry of entries) {
        if (hits.length >= limit) return;
        const full = path.join(current, entry.name);
        if (entry.name.toLowerCase().includes(lowered)) {
          hits.push(full);
          continue;
        }
        // Bundles are opaque; their contents never need a separate hit
        if (entry.isDirectory() && depth < this.searchDepth && !entry.name.endsWith('.app')) {
          await walk(full, depth + 1);
        }
      }
    };

    await walk(dir, 1);
    return hits;
  }
}
