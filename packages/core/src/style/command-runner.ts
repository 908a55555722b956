/**
 * Default command runner backed by child_process.execFile
 */

import { execFile } from 'child_process';

import type { CommandRunner } from './types.js';

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const execFileRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf8',
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }

        // String codes (ENOENT, EACCES, ERR_CHILD_PROCESS_STDIO_MAXBUFFER) mean
        // the process never ran to completion
        if (typeof error.code === 'string') {
          reject(error);
          return;
        }

        const timedOut = error.killed === true && error.signal !== null && error.signal !== undefined;
        resolve({
          exitCode: typeof error.code === 'number' ? error.code : 1,
          stdout,
          stderr,
          timedOut,
        });
      }
    );
  });
