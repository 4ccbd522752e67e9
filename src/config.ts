/**
 * Service configuration
 * Read once from the environment (populated from .env by dotenv in the entry point)
 */

export interface ServiceConfig {
  port: number;
  /** WireViz executable, resolved through PATH unless absolute */
  wirevizCommand: string;
  renderTimeoutMs: number;
  maxUploadBytes: number;
  maxAssetCount: number;
  tempDirPrefix: string;
  /** Parent of the per-request temp directories; undefined means os.tmpdir() */
  tempRoot: string | undefined;
  /** Allowed CORS origins; empty allows any origin */
  corsOrigins: string[];
  /** Base URL used when building links to GET /plantuml */
  publicBaseUrl: string | undefined;
}

export const DEFAULT_CONFIG: ServiceConfig = {
  port: 3001,
  wirevizCommand: 'wireviz',
  renderTimeoutMs: 60_000,
  maxUploadBytes: 10 * 1024 * 1024,
  maxAssetCount: 20,
  tempDirPrefix: 'wireviz-render-',
  tempRoot: undefined,
  corsOrigins: [],
  publicBaseUrl: undefined,
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const origins = readString(env, 'CORS_ORIGINS');
  const publicBaseUrl = readString(env, 'PUBLIC_BASE_URL');

  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_CONFIG.port),
    wirevizCommand: readString(env, 'WIREVIZ_COMMAND') ?? DEFAULT_CONFIG.wirevizCommand,
    renderTimeoutMs: readPositiveInt(env, 'RENDER_TIMEOUT_MS', DEFAULT_CONFIG.renderTimeoutMs),
    maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_BYTES', DEFAULT_CONFIG.maxUploadBytes),
    maxAssetCount: readPositiveInt(env, 'MAX_ASSET_COUNT', DEFAULT_CONFIG.maxAssetCount),
    tempDirPrefix: readString(env, 'TEMP_DIR_PREFIX') ?? DEFAULT_CONFIG.tempDirPrefix,
    tempRoot: readString(env, 'TEMP_ROOT'),
    corsOrigins: origins
      ? origins
          .split(',')
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0)
      : [],
    publicBaseUrl: publicBaseUrl?.replace(/\/+$/, ''),
  };
}
