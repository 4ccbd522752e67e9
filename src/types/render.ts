/**
 * Type definitions for rendering operations
 */

export type FormatToken = 'svg' | 'png';

/** A supplementary file (usually an image) referenced by the description document */
export interface AuxiliaryAsset {
  filename: string;
  data: Buffer;
}

export interface RenderRequest {
  /** WireViz YAML as uploaded or decoded */
  description: Buffer;
  assets: AuxiliaryAsset[];
  format: FormatToken;
  /** Upload filename; its stem names the returned artifact */
  sourceFilename?: string;
}

export interface RenderedArtifact {
  readonly data: Buffer;
  readonly mimeType: string;
  readonly filename: string;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs the rendering engine against a staged input file.
 * Implementations resolve with the process result whatever the exit code.
 */
export type EngineRunner = (invocation: {
  inputFile: string;
  outputDir: string;
  format: FormatToken;
}) => Promise<ProcessResult>;

export type Renderer = (request: RenderRequest) => Promise<RenderedArtifact>;
