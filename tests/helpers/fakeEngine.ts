/**
 * In-process stand-in for the WireViz executable.
 * Writes <input stem>.<format> next to the input the way WireViz does,
 * and fails like WireViz on documents containing INVALID_MARKER.
 */

import { readdir, readFile, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { EngineRunner, FormatToken } from '../../src/types/render.js';

export const INVALID_MARKER = '!!invalid';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export const FAKE_STDERR = 'yaml.scanner.ScannerError: mapping values are not allowed here';

export interface FakeEngineCall {
  inputFile: string;
  outputDir: string;
  format: FormatToken;
  description: string;
  /** Contents of the resources directory at invocation time */
  resources: Record<string, string>;
}

export interface FakeEngine {
  runner: EngineRunner;
  calls: FakeEngineCall[];
}

async function readResources(dir: string): Promise<Record<string, string>> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch {
    return {};
  }
  const resources: Record<string, string> = {};
  for (const name of names) {
    resources[name] = await readFile(join(dir, name), 'utf-8');
  }
  return resources;
}

function fakeImage(format: FormatToken, description: string): Buffer {
  if (format === 'png') {
    return Buffer.concat([PNG_SIGNATURE, Buffer.from(description)]);
  }
  return Buffer.from(
    `<?xml version="1.0" encoding="UTF-8" standalone="no"?>\n<svg xmlns="http://www.w3.org/2000/svg"><desc>${description.length}</desc></svg>\n`
  );
}

export function createFakeEngine(options: { skipOutput?: boolean } = {}): FakeEngine {
  const calls: FakeEngineCall[] = [];

  const runner: EngineRunner = async ({ inputFile, outputDir, format }) => {
    const description = await readFile(inputFile, 'utf-8');
    calls.push({
      inputFile,
      outputDir,
      format,
      description,
      resources: await readResources(join(outputDir, 'resources')),
    });

    if (description.includes(INVALID_MARKER)) {
      return { exitCode: 1, signal: null, stdout: '', stderr: FAKE_STDERR };
    }
    if (!options.skipOutput) {
      const stem = basename(inputFile, extname(inputFile));
      await writeFile(join(outputDir, `${stem}.${format}`), fakeImage(format, description));
    }
    return { exitCode: 0, signal: null, stdout: '', stderr: '' };
  };

  return { runner, calls };
}
