/**
 * Render orchestration
 * Stages a description document and its assets in a temporary directory,
 * runs the engine on it and reads back the produced image.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, join, parse } from 'path';
import { InvalidUploadError, RenderEngineError, StagingError, errorMessage, isErrnoException } from '../errors.js';
import type {
  AuxiliaryAsset,
  EngineRunner,
  FormatToken,
  RenderedArtifact,
  Renderer,
  RenderRequest,
} from '../types/render.js';
import { tokenToMimeType } from '../utils/formatMapping.js';
import { logger } from '../utils/logger.js';
import { withTempWorkspace } from '../utils/tempWorkspace.js';

const log = logger('render');

/** Name of the staged description; the engine names its output after the stem */
export const INPUT_FILENAME = 'input.yml';

/** Subdirectory the description document refers to for images */
export const RESOURCES_DIR = 'resources';

const DEFAULT_OUTPUT_STEM = 'rendered';

export interface RenderServiceOptions {
  runner: EngineRunner;
  tempDirPrefix: string;
  tempRoot?: string;
}

/**
 * Reduces an uploaded filename to a bare file name inside the resources directory.
 * Both separators are stripped so a Windows-style path cannot escape either.
 */
export function sanitizeAssetFilename(filename: string): string {
  const name = basename(filename.replace(/\\/g, '/')).trim();
  if (name === '' || name === '.' || name === '..' || name.includes('\0')) {
    throw new InvalidUploadError(`Invalid asset filename: ${JSON.stringify(filename)}`);
  }
  return name;
}

/**
 * Derives the download filename: source stem plus the format extension
 * (demo01.yaml → demo01.png).
 */
export function outputFilename(sourceFilename: string | undefined, format: FormatToken): string {
  const source = sourceFilename ? basename(sourceFilename.replace(/\\/g, '/')) : '';
  const stem = parse(source).name || DEFAULT_OUTPUT_STEM;
  return `${stem}.${format}`;
}

async function stage<T>(what: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new StagingError(`Failed to ${what}: ${errorMessage(error)}`, { cause: error });
  }
}

async function stageAssets(dir: string, assets: AuxiliaryAsset[]): Promise<void> {
  const resourcesDir = join(dir, RESOURCES_DIR);
  await stage('create resources directory', () => mkdir(resourcesDir, { recursive: true }));

  const written = new Set<string>();
  for (const asset of assets) {
    const name = sanitizeAssetFilename(asset.filename);
    if (written.has(name)) {
      // Later uploads replace earlier ones with the same name
      log.warn('duplicate asset filename, keeping the last upload', { filename: name });
    }
    await stage(`write asset ${name}`, () => writeFile(join(resourcesDir, name), asset.data));
    written.add(name);
  }
}

export async function renderDescription(request: RenderRequest, options: RenderServiceOptions): Promise<RenderedArtifact> {
  const mimeType = tokenToMimeType(request.format);
  const filename = outputFilename(request.sourceFilename, request.format);

  return withTempWorkspace({ prefix: options.tempDirPrefix, root: options.tempRoot }, async (dir) => {
    const inputFile = join(dir, INPUT_FILENAME);
    await stage('write description document', () => writeFile(inputFile, request.description));

    if (request.assets.length > 0) {
      await stageAssets(dir, request.assets);
    }

    const started = Date.now();
    const result = await options.runner({ inputFile, outputDir: dir, format: request.format });
    log.info('engine finished', {
      format: request.format,
      exitCode: result.exitCode,
      durationMs: Date.now() - started,
    });

    if (result.exitCode !== 0) {
      const reason = result.signal ? 'signal' : 'exit';
      const status = result.signal ? `signal ${result.signal}` : `exit code ${String(result.exitCode)}`;
      throw new RenderEngineError(`WireViz failed with ${status}`, {
        reason,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }

    const outputFile = join(dir, `${parse(INPUT_FILENAME).name}.${request.format}`);
    let data: Buffer;
    try {
      data = await readFile(outputFile);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new RenderEngineError(`WireViz did not produce ${basename(outputFile)}`, {
          reason: 'missing-output',
          exitCode: result.exitCode,
          stdout: result.stdout,
          stderr: result.stderr,
        });
      }
      throw new StagingError(`Failed to read rendered output: ${errorMessage(error)}`, { cause: error });
    }

    return { data, mimeType, filename };
  });
}

/**
 * Binds the orchestrator to its options, giving the function the HTTP layer calls
 */
export function createRenderer(options: RenderServiceOptions): Renderer {
  return (request) => renderDescription(request, options);
}
