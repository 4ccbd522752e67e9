/**
 * Subprocess execution without a shell
 */

import { spawn } from 'child_process';
import { RenderEngineError } from '../errors.js';
import type { ProcessResult } from '../types/render.js';

export interface RunProcessOptions {
  cwd?: string;
  timeoutMs: number;
}

/**
 * Runs a command to completion and resolves with its exit status and output.
 * A non-zero exit still resolves; only a failure to start or a timeout rejects.
 */
export function runProcess(command: string, args: readonly string[], options: RunProcessOptions): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const proc = spawn(command, args, {
      cwd: options.cwd,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const collect = () => ({
      stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
      stderr: Buffer.concat(stderrChunks).toString('utf-8'),
    });

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
    }, options.timeoutMs);

    proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    proc.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(
        new RenderEngineError(`Failed to start ${command}: ${err.message}`, {
          reason: 'spawn',
          ...collect(),
          cause: err,
        })
      );
    });

    proc.on('close', (exitCode, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      const output = collect();
      if (timedOut) {
        reject(
          new RenderEngineError(`${command} did not finish within ${options.timeoutMs}ms`, {
            reason: 'timeout',
            exitCode,
            ...output,
          })
        );
        return;
      }
      resolve({ exitCode, signal, ...output });
    });
  });
}
