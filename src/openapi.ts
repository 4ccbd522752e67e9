/**
 * OpenAPI description of the render routes, served at /doc
 */

import { DESCRIPTION_FIELD, ASSETS_FIELD } from './routes/render.js';
import { SUPPORTED_MIME_TYPES } from './utils/formatMapping.js';

export const API_TITLE = 'WireViz-Web';
export const API_DESCRIPTION = 'A wrapper around WireViz to render cable diagrams on the web.';

const imageResponse = {
  description: 'The rendered diagram',
  content: Object.fromEntries(
    SUPPORTED_MIME_TYPES.map((mimeType) => [mimeType, { schema: { type: 'string', format: 'binary' } }])
  ),
};

const errorResponse = (description: string) => ({
  description,
  content: {
    'application/json': { schema: { $ref: '#/components/schemas/Error' } },
  },
});

export function buildOpenApiDocument(version: string): Record<string, unknown> {
  return {
    openapi: '3.0.3',
    info: { title: API_TITLE, description: API_DESCRIPTION, version },
    tags: [{ name: 'render', description: 'WireViz-Web REST API' }],
    paths: {
      '/render': {
        post: {
          tags: ['render'],
          summary: `Upload a WireViz YAML (field ${DESCRIPTION_FIELD}) and optional images (field ${ASSETS_FIELD})`,
          description: 'The Accept header chooses SVG (default) or PNG.',
          requestBody: {
            required: true,
            content: {
              'multipart/form-data': {
                schema: {
                  type: 'object',
                  required: [DESCRIPTION_FIELD],
                  properties: {
                    [DESCRIPTION_FIELD]: { type: 'string', format: 'binary', description: 'YAML file' },
                    [ASSETS_FIELD]: {
                      type: 'array',
                      items: { type: 'string', format: 'binary' },
                      description: 'Images the YAML refers to, staged under resources/',
                    },
                  },
                },
              },
            },
          },
          responses: {
            200: imageResponse,
            400: errorResponse('Missing description, bad upload or unsupported format'),
            413: errorResponse('Upload over the size limit'),
            502: errorResponse('WireViz failed'),
          },
        },
      },
      '/plantuml/{imagetype}/{encoded}': {
        get: {
          tags: ['render'],
          summary: 'Render a WireViz YAML given in PlantUML text encoding',
          parameters: [
            {
              name: 'imagetype',
              in: 'path',
              required: true,
              schema: { type: 'string', enum: ['svg', 'png'] },
            },
            {
              name: 'encoded',
              in: 'path',
              required: true,
              description: 'PlantUML Text Encoding format',
              schema: { type: 'string' },
            },
          ],
          responses: {
            200: imageResponse,
            400: errorResponse('Unknown image type or undecodable text'),
            502: errorResponse('WireViz failed'),
          },
        },
      },
      '/plantuml/encode': {
        post: {
          tags: ['render'],
          summary: 'Encode a WireViz YAML for the PlantUML route',
          requestBody: {
            required: true,
            content: {
              'text/plain': { schema: { type: 'string' } },
              'multipart/form-data': {
                schema: {
                  type: 'object',
                  properties: { [DESCRIPTION_FIELD]: { type: 'string', format: 'binary' } },
                },
              },
            },
          },
          responses: {
            200: {
              description: 'The encoded text and links to both image types',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      encoded: { type: 'string' },
                      svgUrl: { type: 'string' },
                      pngUrl: { type: 'string' },
                    },
                  },
                },
              },
            },
            400: errorResponse('No description provided'),
          },
        },
      },
    },
    components: {
      schemas: {
        Error: {
          type: 'object',
          required: ['error', 'message'],
          properties: {
            error: { type: 'string' },
            message: { type: 'string' },
            details: { type: 'object' },
          },
        },
      },
    },
  };
}
