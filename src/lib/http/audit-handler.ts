import { ReadableStream, type ReadableStreamDefaultController } from 'node:stream/web';
import { z } from 'zod';
import { type ProgressCallback, runAudit } from '../audit';
import type { AuditResult } from '../types';
import { type HostResolver, resolveWithDns } from '../crawler/target-guard';
import { TargetUrlError, resolveAuditTarget } from './request-guard';

const RequestSchema = z.object({
  url: z.string().trim().min(1, 'Please enter a valid URL'),
  competitorUrl: z.string().trim().min(1).nullish(),
});

const JSON_HEADERS = { 'Content-Type': 'application/json' };

const STREAM_HEADERS = {
  'Content-Type': 'application/x-ndjson',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
};

export type AuditRunner = (url: string, competitorUrl: string | null, onProgress?: ProgressCallback) => Promise<AuditResult>;

export interface AuditHandlerOptions {
  /** When set, `POST /audit` requires a matching `x-api-key` header. */
  apiSecretKey?: string;
  resolveHost?: HostResolver;
  audit?: AuditRunner;
}

export type StreamEvent =
  | { type: 'progress'; step: string; progress: number }
  | { type: 'result'; data: AuditResult }
  | { type: 'error'; message: string };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

function createStream() {
  const encoder = new TextEncoder();
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
    },
  });

  const send = (event: StreamEvent) => {
    try {
      controller?.enqueue(encoder.encode(JSON.stringify(event) + '\n'));
    } catch (error) {
      console.warn('Audit stream closed before event was sent:', event.type, error instanceof Error ? error.message : error);
    }
  };

  const close = () => {
    try {
      controller?.close();
    } catch (error) {
      console.warn('Audit stream already closed:', error instanceof Error ? error.message : error);
    }
  };

  return { stream, send, close };
}

function wantsStream(request: Request): boolean {
  return (request.headers.get('accept') ?? '').includes('application/x-ndjson');
}

export function createAuditHandler(options: AuditHandlerOptions = {}): (request: Request) => Promise<Response> {
  const resolveHost = options.resolveHost ?? resolveWithDns;
  const audit: AuditRunner = options.audit ?? ((url, competitorUrl, onProgress) => runAudit(url, competitorUrl, onProgress));

  async function handleAudit(request: Request): Promise<Response> {
    if (options.apiSecretKey && request.headers.get('x-api-key') !== options.apiSecretKey) {
      return json({ error: 'Invalid API key' }, 401);
    }

    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return json({ error: 'Invalid request body' }, 400);
    }

    const parsed = RequestSchema.safeParse(body);
    if (!parsed.success) {
      return json({ error: parsed.error.issues.map(i => i.message).join(', ') }, 400);
    }

    let url: string;
    let competitorUrl: string | null = null;
    try {
      url = await resolveAuditTarget(parsed.data.url, resolveHost);
      if (parsed.data.competitorUrl) {
        competitorUrl = await resolveAuditTarget(parsed.data.competitorUrl, resolveHost);
      }
    } catch (error) {
      if (error instanceof TargetUrlError) return json({ error: error.message }, 400);
      throw error;
    }

    if (!wantsStream(request)) {
      const result = await audit(url, competitorUrl);
      return json(result, result.error ? 502 : 200);
    }

    const { stream, send, close } = createStream();
    void (async () => {
      try {
        const result = await audit(url, competitorUrl, (step, progress) => {
          send({ type: 'progress', step, progress });
        });
        if (result.error) send({ type: 'error', message: result.error });
        else send({ type: 'result', data: result });
      } catch (error) {
        console.error('Audit failed:', error);
        send({ type: 'error', message: error instanceof Error ? error.message : 'Audit failed' });
      } finally {
        close();
      }
    })();

    return new Response(stream, { headers: STREAM_HEADERS });
  }

  return async function handle(request: Request): Promise<Response> {
    const { pathname } = new URL(request.url);

    if (pathname === '/health') {
      if (request.method !== 'GET') return json({ error: 'Method not allowed' }, 405);
      return json({ status: 'ok', engine: 'sitegrade' });
    }

    if (pathname === '/audit') {
      if (request.method !== 'POST') return json({ error: 'Method not allowed' }, 405);
      try {
        return await handleAudit(request);
      } catch (error) {
        console.error('Audit request failed:', error);
        return json({ error: error instanceof Error ? error.message : 'Audit failed' }, 500);
      }
    }

    return json({ error: 'Not found' }, 404);
  };
}
