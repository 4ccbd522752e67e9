/**
 * Render routes
 * POST /render             multipart WireViz YAML (+ images) → image
 * GET  /plantuml/:t/:enc   PlantUML text encoded YAML → image
 * POST /plantuml/encode    YAML → encoded form and ready-made links
 */

import express, { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { InvalidUploadError, UnsupportedFormatError } from '../errors.js';
import type { AuxiliaryAsset, RenderedArtifact, Renderer } from '../types/render.js';
import { SUPPORTED_MIME_TYPES, isFormatToken, negotiateFormat } from '../utils/formatMapping.js';
import { decodePlantuml, encodePlantuml } from '../utils/plantumlEncoding.js';

export const DESCRIPTION_FIELD = 'yml_file';
export const ASSETS_FIELD = 'images';

export interface RenderRouterDeps {
  renderer: Renderer;
  maxUploadBytes: number;
  maxAssetCount: number;
  /** Overrides the request's own origin in generated links */
  publicBaseUrl?: string;
}

type UploadedFiles = Record<string, Express.Multer.File[]>;

function uploadedFiles(req: Request): UploadedFiles {
  const files = req.files;
  if (!files || Array.isArray(files)) {
    return {};
  }
  return files;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Multer hands over plain multipart filenames decoded as latin1, so a UTF-8
 * name like "stecker-ø.png" arrives as "stecker-Ã¸.png". Reinterpret the bytes
 * as UTF-8 when they form valid UTF-8; names with characters beyond latin1
 * were already decoded from an RFC 5987 filename* parameter.
 */
export function multipartFilename(originalname: string): string {
  if (/[^\x00-\xff]/.test(originalname)) {
    return originalname;
  }
  try {
    return utf8.decode(Buffer.from(originalname, 'latin1'));
  } catch {
    return originalname;
  }
}

/** Keeps the Content-Disposition value to a single token-safe header line */
function headerSafeFilename(filename: string): string {
  return filename.replace(/[^\w.\-]/g, '_');
}

function sendArtifact(res: Response, artifact: RenderedArtifact): void {
  res.status(200);
  res.setHeader('Content-Type', artifact.mimeType);
  res.setHeader('Content-Disposition', `attachment; filename=${headerSafeFilename(artifact.filename)}`);
  res.send(artifact.data);
}

function baseUrl(req: Request, publicBaseUrl: string | undefined): string {
  return publicBaseUrl ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

export function createRenderRouter(deps: RenderRouterDeps): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: deps.maxUploadBytes,
      files: deps.maxAssetCount + 1,
    },
  });

  router.post(
    '/render',
    upload.fields([
      { name: DESCRIPTION_FIELD, maxCount: 1 },
      { name: ASSETS_FIELD, maxCount: deps.maxAssetCount },
    ]),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const files = uploadedFiles(req);
        const description = files[DESCRIPTION_FIELD]?.[0];
        if (!description) {
          throw new InvalidUploadError(
            `No description provided. Upload the WireViz YAML as multipart/form-data field "${DESCRIPTION_FIELD}"`
          );
        }

        const assets: AuxiliaryAsset[] = (files[ASSETS_FIELD] ?? []).map((file) => ({
          filename: multipartFilename(file.originalname),
          data: file.buffer,
        }));

        const format = negotiateFormat(req.accepts([...SUPPORTED_MIME_TYPES]));
        const artifact = await deps.renderer({
          description: description.buffer,
          assets,
          format,
          sourceFilename: multipartFilename(description.originalname),
        });
        sendArtifact(res, artifact);
      } catch (error) {
        next(error);
      }
    }
  );

  router.get(
    '/plantuml/:imagetype/:encoded',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const { imagetype, encoded } = req.params;
        if (!isFormatToken(imagetype)) {
          throw new UnsupportedFormatError(imagetype, 'token');
        }
        const yaml = decodePlantuml(encoded);
        const artifact = await deps.renderer({
          description: Buffer.from(yaml, 'utf-8'),
          assets: [],
          format: imagetype,
        });
        sendArtifact(res, artifact);
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/plantuml/encode',
    upload.single(DESCRIPTION_FIELD),
    express.text({ type: ['text/plain', 'application/yaml', 'application/x-yaml', 'text/yaml'], limit: deps.maxUploadBytes }),
    (req: Request, res: Response, next: NextFunction): void => {
      try {
        const body: unknown = req.body;
        const text = req.file ? req.file.buffer.toString('utf-8') : typeof body === 'string' ? body : '';
        if (text.length === 0) {
          throw new InvalidUploadError(
            `No description provided. Send the YAML as the request body or as field "${DESCRIPTION_FIELD}"`
          );
        }
        const encoded = encodePlantuml(text);
        const base = baseUrl(req, deps.publicBaseUrl);
        res.json({
          encoded,
          svgUrl: `${base}/plantuml/svg/${encoded}`,
          pngUrl: `${base}/plantuml/png/${encoded}`,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
