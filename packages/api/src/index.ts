#!/usr/bin/env tsx

/**
 * REST API server for morphseg
 * Exposes the morphemizer registry via HTTP endpoints
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { getDefaultRegistry, loadPreferencesFromEnv, setDebug, type MorphemizerRegistry } from '@morphseg/core';
import { config } from 'dotenv';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { routeRequest } from './routes.js';

export { routeRequest, listMorphemizers, DEFAULT_MORPHEMIZER } from './routes.js';
export type { ApiResponse, MorphemizerInfo, SegmentResponse } from './routes.js';

const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export class JsonBodyError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'JsonBodyError';
    this.status = status;
  }
}

/**
 * Parse a JSON request body
 */
export function parseJsonText(body: string): unknown {
  if (!body) {
    throw new JsonBodyError('Empty body');
  }
  try {
    return JSON.parse(body);
  } catch {
    throw new JsonBodyError('Invalid JSON');
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    let received = 0;

    const contentLengthHeader = req.headers['content-length'];
    if (contentLengthHeader) {
      const contentLength = Number(contentLengthHeader);
      if (Number.isFinite(contentLength) && contentLength > MAX_JSON_BODY_SIZE) {
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
    }

    const abort = (error: JsonBodyError) => {
      req.destroy();
      reject(error);
    };

    req.setEncoding('utf-8');
    req.on('data', (chunk: string) => {
      received += Buffer.byteLength(chunk);
      if (received > MAX_JSON_BODY_SIZE) {
        abort(new JsonBodyError('Payload too large', 413));
        return;
      }
      body += chunk;
    });

    req.on('end', () => {
      try {
        resolve(parseJsonText(body));
      } catch (error) {
        reject(error);
      }
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200, requestId?: string): void {
  const json = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' });
  res.end(json);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${json.length} bytes, status ${status}`);
  }
}

/**
 * Build the request handler for a registry
 */
export function createRequestHandler(registry: MorphemizerRegistry) {
  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = Math.random().toString(36).substring(7);
    const startTime = Date.now();
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';

    console.log(`[${requestId}] START ${method} ${url.pathname}`);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    // Handle OPTIONS for CORS preflight
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      console.log(`[${requestId}] END OPTIONS ${url.pathname} - ${Date.now() - startTime}ms`);
      return;
    }

    try {
      const body = method === 'POST' ? await readJsonBody(req) : undefined;
      const { status, body: payload } = routeRequest(method, url.pathname, body, registry);
      sendJson(res, payload, status, requestId);
      console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
    } catch (error) {
      console.error(`[${requestId}] Request error:`, error);
      if (error instanceof JsonBodyError) {
        sendJson(res, { error: error.message }, error.status, requestId);
      } else {
        const message = error instanceof Error ? error.message : 'Internal server error';
        sendJson(res, { error: message }, 500, requestId);
      }
      console.log(`[${requestId}] END ${url.pathname} ERROR - ${Date.now() - startTime}ms`);
    }
  };
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  config();
  loadPreferencesFromEnv(process.env);
  if (process.env.MORPHSEG_DEBUG === '1') {
    setDebug(true);
  }

  const port = parseInt(process.env.PORT || '3000', 10);
  const registry = getDefaultRegistry();

  // Build every morphemizer up front so the first request does not pay for it
  for (const m of registry.all()) {
    console.log(`Loaded ${m.name}: ${m.describe()}`);
  }

  const handleRequest = createRequestHandler(registry);
  const server = createServer((req, res) => {
    handleRequest(req, res).catch((error) => {
      console.error('Unhandled request failure:', error);
      res.destroy();
    });
  });

  // Bind to 0.0.0.0 to allow external connections
  server.listen(port, '0.0.0.0', () => {
    console.log(`morphseg API server listening on http://0.0.0.0:${port}`);
    console.log(`Health check: http://0.0.0.0:${port}/health`);
    console.log(`API docs: http://0.0.0.0:${port}/api`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
