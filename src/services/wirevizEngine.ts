/**
 * WireViz command line invocation
 * Arguments are assembled from a closed set of flags and passed to spawn
 * as an array, never through a shell.
 */

import { InvalidEngineArgumentError } from '../errors.js';
import type { EngineRunner, FormatToken } from '../types/render.js';
import { runProcess } from '../utils/processRunner.js';

/** Format WireViz writes when no -f flag is given */
export const ENGINE_DEFAULT_FORMAT: FormatToken = 'svg';

const ENGINE_FLAGS = {
  outputDir: '-o',
  format: '-f',
} as const;

type EngineFlag = (typeof ENGINE_FLAGS)[keyof typeof ENGINE_FLAGS];

export interface EngineArgsInput {
  inputFile: string;
  outputDir: string;
  format: FormatToken;
}

function checkValue(value: string, what: string): string {
  if (value.length === 0) {
    throw new InvalidEngineArgumentError(`${what} must not be empty`);
  }
  if (value.startsWith('-')) {
    throw new InvalidEngineArgumentError(`${what} must not start with "-": ${value}`);
  }
  if (value.includes('\0')) {
    throw new InvalidEngineArgumentError(`${what} must not contain NUL characters`);
  }
  return value;
}

export function buildEngineArgs(input: EngineArgsInput): string[] {
  const args: string[] = [checkValue(input.inputFile, 'Input file')];
  const pushFlag = (flag: EngineFlag, value: string, what: string): void => {
    args.push(flag, checkValue(value, what));
  };

  pushFlag(ENGINE_FLAGS.outputDir, input.outputDir, 'Output directory');
  if (input.format !== ENGINE_DEFAULT_FORMAT) {
    pushFlag(ENGINE_FLAGS.format, input.format, 'Format');
  }
  return args;
}

export interface WirevizRunnerOptions {
  command: string;
  timeoutMs: number;
}

/**
 * Engine runner backed by the WireViz executable
 */
export function createWirevizRunner(options: WirevizRunnerOptions): EngineRunner {
  return async ({ inputFile, outputDir, format }) => {
    const args = buildEngineArgs({ inputFile, outputDir, format });
    return runProcess(options.command, args, { cwd: outputDir, timeoutMs: options.timeoutMs });
  };
}
