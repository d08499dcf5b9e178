import http from 'node:http';
import { createHTTPHandler } from '@trpc/server/adapters/standalone';
import { config } from '../config/index.js';
import { appRouter } from '../trpc/router.js';
import { contextFactory } from '../trpc/context.js';
import type { IFileStorage } from '../services/file-storage.js';
import { handleUpload, sendJson } from './upload.js';
import { fileNameFromPath, handleFileServe } from './file-serve.js';

export function createServer(storage: IFileStorage) {
  const trpcHandler = createHTTPHandler({
    router: appRouter,
    createContext: contextFactory(storage),
    basePath: '/trpc/',
    onError({ error, path }) {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        console.error(`[trpc] ${path}:`, error.message, error.cause ?? '');
      }
    },
  });

  const filesPrefix = `${config.UPLOAD_BASE_URL.replace(/\/$/, '')}/`;

  return http.createServer((req, res) => {
    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, HEAD, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    // Health check
    if (url.pathname === '/health') {
      sendJson(res, 200, { status: 'ok' });
      return;
    }

    // File upload
    if (url.pathname === '/upload' && req.method === 'POST') {
      void handleUpload(req, res, storage);
      return;
    }

    // File serving
    if (url.pathname.startsWith(filesPrefix) && req.method === 'GET') {
      const filename = fileNameFromPath(url.pathname, filesPrefix);
      if (filename === null) {
        sendJson(res, 400, { error: 'Malformed file path' });
        return;
      }
      void handleFileServe(res, filename, storage);
      return;
    }

    // tRPC handler
    trpcHandler(req, res);
  });
}
