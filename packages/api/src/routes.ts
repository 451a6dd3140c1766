// Request routing, independent of the HTTP transport

import { AnalyzerError, type Morpheme, type MorphemizerRegistry } from '@morphseg/core';

export const DEFAULT_MORPHEMIZER = 'SpaceMorphemizer';

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface MorphemizerInfo {
  name: string;
  description: string;
}

export interface SegmentResponse {
  text: string;
  morphemizer: string;
  morphemes: readonly Morpheme[];
}

interface SegmentRequest {
  text: string;
  morphemizer: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function error(message: string, status: number): ApiResponse {
  return { status, body: { error: message } };
}

function parseSegmentRequest(body: unknown): SegmentRequest | string {
  if (!isRecord(body)) return 'Body must be a JSON object';
  if (typeof body.text !== 'string') return 'Missing required field: text';

  const morphemizer = body.morphemizer ?? DEFAULT_MORPHEMIZER;
  if (typeof morphemizer !== 'string') return 'Field morphemizer must be a string';

  return { text: body.text, morphemizer };
}

export function listMorphemizers(registry: MorphemizerRegistry): MorphemizerInfo[] {
  return registry.all().map((m) => ({ name: m.name, description: m.describe() }));
}

/**
 * Route one request. `body` is the parsed JSON body of POST requests.
 */
export function routeRequest(
  method: string,
  pathname: string,
  body: unknown,
  registry: MorphemizerRegistry
): ApiResponse {
  // Health check endpoint
  if (pathname === '/health' && method === 'GET') {
    return { status: 200, body: { status: 'ok', timestamp: new Date().toISOString() } };
  }

  if (pathname === '/api/morphemizers' && method === 'GET') {
    return { status: 200, body: listMorphemizers(registry) };
  }

  // Segmentation: POST /api/segment
  if (pathname === '/api/segment' && method === 'POST') {
    const request = parseSegmentRequest(body);
    if (typeof request === 'string') {
      return error(request, 400);
    }

    const morphemizer = registry.byName(request.morphemizer);
    if (!morphemizer) {
      return error(`Unknown morphemizer: ${request.morphemizer}`, 404);
    }

    try {
      const response: SegmentResponse = {
        text: request.text,
        morphemizer: morphemizer.name,
        morphemes: morphemizer.segment(request.text)
      };
      return { status: 200, body: response };
    } catch (err) {
      if (err instanceof AnalyzerError) {
        return error(err.message, 502);
      }
      throw err;
    }
  }

  // API documentation endpoint
  if (pathname === '/api' && method === 'GET') {
    return {
      status: 200,
      body: {
        name: 'morphseg REST API',
        version: '0.1.0',
        endpoints: {
          'GET /health': 'Health check',
          'GET /api/morphemizers': 'Available morphemizers with their descriptions',
          'POST /api/segment': 'Split text into morphemes (body: {text: string, morphemizer?: string})'
        },
        morphemizers: registry.names()
      }
    };
  }

  return error('Not found', 404);
}
