/**
 * Detached worker spawning
 */

import { spawn } from 'child_process';
import { closeSync, openSync } from 'fs';

export interface DetachedSpawnOptions {
  /** Script the current runtime should execute */
  entry: string;
  args: string[];
  /** stdout and stderr of the worker are appended here */
  logFile: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Start `node <entry> <args>` in its own process group, detached from this
 * process, and resolve with its pid once it has been spawned.
 * The current runtime flags (a TypeScript loader, for instance) are passed on.
 */
export function spawnDetached(options: DetachedSpawnOptions): Promise<number> {
  const out = openSync(options.logFile, 'a');

  return new Promise<number>((resolve, reject) => {
    const child = spawn(process.execPath, [...process.execArgv, options.entry, ...options.args], {
      detached: true,
      stdio: ['ignore', out, out],
      env: options.env ?? process.env,
    });

    child.once('error', (error) => {
      closeSync(out);
      reject(error);
    });

    child.once('spawn', () => {
      closeSync(out);
      child.unref();
      if (child.pid === undefined) {
        reject(new Error('Worker spawned without a pid'));
        return;
      }
      resolve(child.pid);
    });
  });
}
