/**
 * State Store: JSON files colocated in one state directory
 *
 * Snapshot files are replaced whole (temp file + rename) so a reader sees
 * either the previous or the next complete content. The log is append-only.
 */

import { randomUUID } from 'crypto';
import { existsSync } from 'fs';
import { mkdir, open, readFile, rename, rm, stat, writeFile, type FileHandle } from 'fs/promises';
import { join } from 'path';
import type { z } from 'zod';
import type { DaemonHandle, DryRunToken, ResultRecord, StatusSnapshot } from '../types/index.js';
import {
  DaemonHandleSchema,
  DryRunTokenSchema,
  ResultRecordSchema,
  StatusSnapshotSchema,
} from '../config/schema.js';

/**
 * File names inside the state directory
 */
export const STATE_FILES = {
  handle: 'monitor.pid',
  log: 'monitor.log',
  config: 'config.json',
  credentials: 'credentials.json',
  status: 'status.json',
  result: 'result.json',
  dryRunToken: 'dry-run.token',
  startLock: 'monitor.pid.lock',
} as const;

/**
 * A start lock older than this belongs to a start that died midway
 */
export const START_LOCK_STALE_MS = 30_000;

const TAIL_CHUNK_BYTES = 16 * 1024;

export type StateFile = keyof typeof STATE_FILES;

/**
 * Write JSON file atomically
 */
export async function writeJsonFileAtomic(
  path: string,
  data: unknown,
  mode: number = 0o644
): Promise<void> {
  const tmp = `${path}.${process.pid}.${randomUUID()}.tmp`;
  await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', { encoding: 'utf-8', mode });
  await rename(tmp, path);
}

/**
 * Read and validate a JSON file.
 * Missing, unparseable or invalid content reads as null.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
  path: string,
  schema: S
): Promise<z.output<S> | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }

  const result = schema.safeParse(parsed);
  return result.success ? result.data : null;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function isNotFound(err: unknown): boolean {
  return hasErrorCode(err, 'ENOENT');
}

/**
 * Single-directory state store shared by the controller and the worker
 */
export class StateStore {
  constructor(readonly dir: string) {}

  pathOf(file: StateFile): string {
    return join(this.dir, STATE_FILES[file]);
  }

  async ensureDir(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  exists(file: StateFile): boolean {
    return existsSync(this.pathOf(file));
  }

  // Handle

  async readHandle(): Promise<DaemonHandle | null> {
    return readJsonFile(this.pathOf('handle'), DaemonHandleSchema);
  }

  async writeHandle(handle: DaemonHandle): Promise<void> {
    await this.ensureDir();
    await writeJsonFileAtomic(this.pathOf('handle'), handle);
  }

  async clearHandle(): Promise<void> {
    await rm(this.pathOf('handle'), { force: true });
  }

  // Status snapshot

  async readStatus(): Promise<StatusSnapshot | null> {
    return readJsonFile(this.pathOf('status'), StatusSnapshotSchema);
  }

  async writeStatus(snapshot: StatusSnapshot): Promise<void> {
    await this.ensureDir();
    await writeJsonFileAtomic(this.pathOf('status'), snapshot);
  }

  // Result record

  async readResult(): Promise<ResultRecord | null> {
    return readJsonFile(this.pathOf('result'), ResultRecordSchema);
  }

  async writeResult(result: ResultRecord): Promise<void> {
    await this.ensureDir();
    await writeJsonFileAtomic(this.pathOf('result'), result);
  }

  // Dry-run confirmation token

  async readDryRunToken(): Promise<DryRunToken | null> {
    return readJsonFile(this.pathOf('dryRunToken'), DryRunTokenSchema);
  }

  async writeDryRunToken(token: DryRunToken): Promise<void> {
    await this.ensureDir();
    await writeJsonFileAtomic(this.pathOf('dryRunToken'), token, 0o600);
  }

  async clearDryRunToken(): Promise<void> {
    await rm(this.pathOf('dryRunToken'), { force: true });
  }

  // Start lock

  /**
   * Take the exclusive lock held from the liveness check until the handle is written.
   * Returns false while another start holds it.
   */
  async acquireStartLock(staleAfterMs: number = START_LOCK_STALE_MS): Promise<boolean> {
    await this.ensureDir();
    const path = this.pathOf('startLock');

    if (await createExclusive(path)) return true;

    let age: number;
    try {
      age = Date.now() - (await stat(path)).mtimeMs;
    } catch (err) {
      // Released between our attempt and the stat
      if (isNotFound(err)) return createExclusive(path);
      throw err;
    }
    if (age < staleAfterMs) return false;

    await rm(path, { force: true });
    return createExclusive(path);
  }

  async releaseStartLock(): Promise<void> {
    await rm(this.pathOf('startLock'), { force: true });
  }

  // Log stream

  /**
   * Last `lines` lines of the log, or null if the log was never created.
   * Reads backwards from the end of the file only as far as needed.
   */
  async tailLog(lines: number): Promise<string[] | null> {
    let handle: FileHandle;
    try {
      handle = await open(this.pathOf('log'), 'r');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    try {
      if (lines <= 0) return [];

      const { size } = await handle.stat();
      const chunks: Buffer[] = [];
      let position = size;
      let newlines = 0;

      // One newline more than requested: the last one usually ends the file
      while (position > 0 && newlines <= lines) {
        const length = Math.min(TAIL_CHUNK_BYTES, position);
        position -= length;
        const chunk = Buffer.alloc(length);
        const { bytesRead } = await handle.read(chunk, 0, length, position);
        chunks.unshift(chunk.subarray(0, bytesRead));
        for (const byte of chunk.subarray(0, bytesRead)) {
          if (byte === 0x0a) newlines += 1;
        }
      }

      const all = Buffer.concat(chunks).toString('utf-8').split('\n');
      if (all[all.length - 1] === '') all.pop();
      return all.slice(-lines);
    } finally {
      await handle.close();
    }
  }
}

async function createExclusive(path: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'wx');
  } catch (err) {
    if (hasErrorCode(err, 'EEXIST')) return false;
    throw err;
  }
  try {
    await handle.writeFile(`${process.pid}\n`);
  } finally {
    await handle.close();
  }
  return true;
}
