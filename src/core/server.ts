// src/core/server.ts

import http from 'http';
import type { ErrorObject } from 'ajv';
import { prettyCode } from './format';
import { playgroundPage } from './playground';
import { ajv, errorProperty } from '../schema/validation';
import { defaultLogger, type Logger } from '../util/logger';

const moduleLogger = defaultLogger.child('[serve]');

/** Largest request body accepted, in bytes. */
export const MAX_BODY_BYTES = 1024 * 1024;

export interface PrettyRequest {
   method: string;
   url: string;
   body: string;
}

export interface PrettyResponse {
   status: number;
   headers: Record<string, string>;
   body: string;
}

export interface PrettyPayload {
   code: string;
   maxLineLength?: number;
}

/** JSON Schema of a `/pretty` request body. */
export const PRETTY_PAYLOAD_SCHEMA = {
   type: 'object',
   required: ['code'],
   properties: {
      code: { type: 'string' },
      maxLineLength: { type: 'integer', minimum: 1, nullable: true },
   },
} as const;

const validatePayload = ajv.compile<{ code: string; maxLineLength?: number | null }>(PRETTY_PAYLOAD_SCHEMA);

const PAYLOAD_ERRORS = new Map([
   ['code', '"code" must be a string'],
   ['maxLineLength', '"maxLineLength" must be a positive integer'],
]);

const text = (status: number, body: string, headers: Record<string, string> = {}): PrettyResponse => ({
   status,
   headers: { 'Content-Type': 'text/plain; charset=utf-8', ...headers },
   body,
});

/**
 * Route one request. No I/O happens here; the server only moves bytes.
 */
export function handlePrettyRequest(request: PrettyRequest, defaultMaxLineWidth = 80): PrettyResponse {
   const pathname = request.url.split('?')[0];

   if (pathname === '/') {
      return request.method === 'GET' || request.method === 'HEAD'
         ? {
              status: 200,
              headers: { 'Content-Type': 'text/html; charset=utf-8' },
              body: playgroundPage(defaultMaxLineWidth),
           }
         : text(405, 'method not allowed\n', { Allow: 'GET' });
   }

   if (pathname !== '/pretty') {
      return text(404, 'not found\n');
   }

   if (request.method !== 'POST') {
      return text(405, 'method not allowed\n', { Allow: 'POST' });
   }

   let payload: PrettyPayload;
   try {
      payload = parsePayload(request.body);
   } catch (err) {
      return text(400, `${err instanceof Error ? err.message : String(err)}\n`);
   }

   return text(200, prettyCode(payload.code, payload.maxLineLength ?? defaultMaxLineWidth));
}

/**
 * Decode a `/pretty` request body. Throws on malformed JSON or a payload of
 * the wrong shape.
 */
export function parsePayload(body: string): PrettyPayload {
   const raw: unknown = JSON.parse(body);
   if (!validatePayload(raw)) {
      throw new Error(payloadError(validatePayload.errors ?? []));
   }

   const payload: PrettyPayload = { code: raw.code };
   if (raw.maxLineLength !== undefined && raw.maxLineLength !== null) {
      payload.maxLineLength = raw.maxLineLength;
   }
   return payload;
}

function payloadError(errors: ErrorObject[]): string {
   const error = errors[0];
   const key = error === undefined ? undefined : errorProperty(error);
   const message = key === undefined ? undefined : PAYLOAD_ERRORS.get(key);
   return message ?? 'request body must be a JSON object';
}

export interface PrettyServerOptions {
   defaultMaxLineWidth?: number;
   logger?: Logger;
   /** Request handler; defaults to {@link handlePrettyRequest}. */
   handler?: (request: PrettyRequest, defaultMaxLineWidth?: number) => PrettyResponse;
}

export function createPrettyServer(options: PrettyServerOptions = {}): http.Server {
   const logger = options.logger ?? moduleLogger;
   const handler = options.handler ?? handlePrettyRequest;

   return http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let rejected = false;

      req.on('data', (chunk: Buffer) => {
         if (rejected) return;
         size += chunk.length;
         if (size > MAX_BODY_BYTES) {
            rejected = true;
            send(res, text(413, 'request body too large\n'));
            req.destroy();
            return;
         }
         chunks.push(chunk);
      });

      req.on('end', () => {
         if (rejected) return;
         let response: PrettyResponse;
         try {
            response = handler(
               {
                  method: req.method ?? 'GET',
                  url: req.url ?? '/',
                  body: Buffer.concat(chunks).toString('utf8'),
               },
               options.defaultMaxLineWidth,
            );
         } catch (err) {
            logger.error(`${req.method} ${req.url} failed:`, err);
            response = text(500, 'internal error\n');
         }
         logger.debug(`${req.method} ${req.url} → ${response.status}`);
         send(res, response);
      });

      req.on('error', (err) => {
         logger.error('Request error:', err);
      });
   });
}

/**
 * Start listening; resolves once the socket is bound.
 */
export function listen(server: http.Server, port: number, host: string): Promise<void> {
   return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
         server.off('error', reject);
         resolve();
      });
   });
}

function send(res: http.ServerResponse, response: PrettyResponse): void {
   res.writeHead(response.status, response.headers);
   res.end(response.body);
}
