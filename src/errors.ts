/**
 * Error taxonomy for the render service
 * Every error the HTTP layer knows how to report extends AppError
 */

import { types } from 'util';

export type ErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'DECODE_ERROR'
  | 'INVALID_UPLOAD'
  | 'INVALID_ENGINE_ARGUMENT'
  | 'RENDER_ENGINE_ERROR'
  | 'STAGING_ERROR';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields included in the JSON error body */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

/** Unknown MIME type or format token */
export class UnsupportedFormatError extends AppError {
  readonly code = 'UNSUPPORTED_FORMAT';
  readonly statusCode = 400;

  constructor(readonly value: string, readonly kind: 'mime' | 'token') {
    super(`Unsupported ${kind === 'mime' ? 'MIME type' : 'format'}: ${value}`);
  }
}

/** Malformed PlantUML text encoding */
export class DecodeError extends AppError {
  readonly code = 'DECODE_ERROR';
  readonly statusCode = 400;
}

/** A multipart upload that cannot be staged as given */
export class InvalidUploadError extends AppError {
  readonly code = 'INVALID_UPLOAD';
  readonly statusCode = 400;
}

/** A value that may not be passed to the engine command line */
export class InvalidEngineArgumentError extends AppError {
  readonly code = 'INVALID_ENGINE_ARGUMENT';
  readonly statusCode = 400;
}

export type EngineFailureReason = 'exit' | 'signal' | 'timeout' | 'spawn' | 'missing-output';

/** The external engine failed, timed out or could not be started */
export class RenderEngineError extends AppError {
  readonly code = 'RENDER_ENGINE_ERROR';
  readonly statusCode = 502;
  readonly reason: EngineFailureReason;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    message: string,
    init: {
      reason: EngineFailureReason;
      exitCode?: number | null;
      stdout?: string;
      stderr?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: init.cause });
    this.reason = init.reason;
    this.exitCode = init.exitCode ?? null;
    this.stdout = init.stdout ?? '';
    this.stderr = init.stderr ?? '';
  }

  /** Engine diagnostics, stderr first since that is where WireViz reports YAML errors */
  diagnostics(): string {
    return [this.stderr.trim(), this.stdout.trim()].filter((s) => s.length > 0).join('\n');
  }

  override details(): Record<string, unknown> {
    return {
      reason: this.reason,
      exitCode: this.exitCode,
      diagnostics: this.diagnostics(),
    };
  }
}

/** Creating, writing or reading the temporary workspace failed */
export class StagingError extends AppError {
  readonly code = 'STAGING_ERROR';
  readonly statusCode = 500;
}

/**
 * Narrow an unknown thrown value to a Node.js system error.
 * Node core errors can come from another realm, so no instanceof here.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error || types.isNativeError(error) ? error.message : String(error);
}
