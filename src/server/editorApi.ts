import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Connect, Plugin } from 'vite';
import type { z } from 'zod';
import type { Layer } from '../lib/canvas/types';
import { createLayer, strokeName } from '../lib/canvas/layerUtils';
import { NotFoundError, ScribbleEditorError, describeError } from '../lib/errors';
import { JumpRequestZ, SaveRequestZ } from '../validation/api.zod';
import { formatValidationIssues } from '../validation/formatIssues';
import type { EditorSession } from './editorSession';
import { decodePngDataUrl } from './imageCodec';
import type { Logger } from './logger';

export const API_PREFIX = '/api';

/** Upper bound for a request body; a save carries every stroke as a PNG data URL */
export const MAX_BODY_BYTES = 64 * 1024 * 1024;

export interface ApiRequest {
  method: string;
  /** Path below the /api prefix, e.g. "/next" */
  path: string;
  body: unknown;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

class BadRequestError extends ScribbleEditorError {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export class PayloadTooLargeError extends ScribbleEditorError {
  constructor(public readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

type RouteHandler = (session: EditorSession, body: unknown) => Promise<unknown>;

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BadRequestError(`Invalid request body.\n${formatValidationIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

async function decodeLayers(dataUrls: string[]): Promise<Layer[]> {
  const layers: Layer[] = [];
  for (const dataUrl of dataUrls) {
    const name = strokeName(layers);
    layers.push(createLayer(await decodePngDataUrl(dataUrl, name), name));
  }
  return layers;
}

const routes: Record<string, RouteHandler> = {
  'GET /view': (session) => session.current(),
  'GET /images': async (session) => ({ filenames: session.filenames }),
  'POST /next': (session) => session.next(),
  'POST /previous': (session) => session.previous(),
  'POST /jump': (session, body) => session.jumpTo(parseBody(JumpRequestZ, body).name),
  'POST /save': async (session, body) => {
    const { layers } = parseBody(SaveRequestZ, body);
    return session.save(await decodeLayers(layers));
  },
};

function statusFor(error: unknown): number {
  if (error instanceof BadRequestError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof PayloadTooLargeError) return 413;
  if (error instanceof ScribbleEditorError) return 422;
  return 500;
}

export function errorResponse(error: unknown): ApiResponse {
  return { status: statusFor(error), body: { error: describeError(error) } };
}

/**
 * Route one API call to the session. Never throws: failures become an
 * `{ error }` body with a matching status code.
 */
export async function handleApiRequest(
  session: EditorSession,
  request: ApiRequest,
  log: Logger
): Promise<ApiResponse> {
  const handler = routes[`${request.method.toUpperCase()} ${request.path}`];
  if (!handler) {
    return { status: 404, body: { error: `Unknown route: ${request.method} ${request.path}` } };
  }

  try {
    return { status: 200, body: await handler(session, request.body) };
  } catch (error) {
    const status = statusFor(error);
    if (status >= 500) {
      log.error(`${request.method} ${request.path} failed`, error);
    } else {
      log.warn(`${request.method} ${request.path}: ${describeError(error)}`);
    }
    return errorResponse(error);
  }
}

export interface RequestBodySource extends AsyncIterable<unknown> {
  headers: { 'content-length'?: string };
}

/**
 * Read and parse a JSON request body of at most `limit` bytes. An oversized
 * body is drained without being kept.
 */
export async function readJsonBody(req: RequestBodySource, limit: number = MAX_BODY_BYTES): Promise<unknown> {
  if (Number(req.headers['content-length']) > limit) {
    throw new PayloadTooLargeError(limit);
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= limit) {
      chunks.push(buffer);
    }
  }

  if (size > limit) {
    throw new PayloadTooLargeError(limit);
  }
  if (chunks.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(Buffer.concat(chunks).toString('utf8'));
  } catch (error) {
    throw new BadRequestError(`Malformed JSON body: ${describeError(error)}`);
  }
}

function sendJson(res: ServerResponse, response: ApiResponse): void {
  res.statusCode = response.status;
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Cache-Control', 'no-store');
  res.end(JSON.stringify(response.body));
}

/**
 * Connect middleware for the API. Mounted under API_PREFIX, so `req.url`
 * is already relative to it.
 */
export function createEditorApiMiddleware(session: EditorSession, log: Logger): Connect.NextHandleFunction {
  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const method = req.method ?? 'GET';

    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      sendJson(res, errorResponse(error));
      return;
    }

    sendJson(res, await handleApiRequest(session, { method, path, body }, log));
  };

  return (req, res, next) => {
    handle(req, res).catch(next);
  };
}

/**
 * Vite plugin serving the editor API next to the UI, in dev and preview mode
 */
export function editorApiPlugin(session: EditorSession, log: Logger): Plugin {
  return {
    name: 'scribble-editor-api',
    configureServer(server) {
      server.middlewares.use(API_PREFIX, createEditorApiMiddleware(session, log));
    },
    configurePreviewServer(server) {
      server.middlewares.use(API_PREFIX, createEditorApiMiddleware(session, log));
    },
  };
}
