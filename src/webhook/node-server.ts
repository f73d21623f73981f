/**
 * Serve Fetch-style route handlers from Node's http module
 */

import http from 'http';
import { logger } from '../utils/logger';

export type FetchHandler = (request: Request) => Promise<Response>;

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function toFetchRequest(req: http.IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach(item => headers.append(name, item));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD';

  return new Request(new URL(req.url ?? '/', origin), {
    method,
    headers,
    body: hasBody ? await readBody(req) : undefined
  });
}

export async function writeFetchResponse(res: http.ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  res.end(Buffer.from(await response.arrayBuffer()));
}

export function createFetchServer(handler: FetchHandler): http.Server {
  return http.createServer((req, res) => {
    const origin = `http://${req.headers.host ?? 'localhost'}`;

    toFetchRequest(req, origin)
      .then(handler)
      .then(response => writeFetchResponse(res, response))
      .catch(error => {
        logger.error('Webhook request failed', error);
        if (!res.headersSent) {
          res.statusCode = 500;
          res.setHeader('content-type', 'application/json');
        }
        res.end(JSON.stringify({ error: 'Internal server error' }));
      });
  });
}
