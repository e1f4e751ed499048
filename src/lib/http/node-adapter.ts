import { type IncomingMessage, createServer } from 'node:http';

export type WebHandler = (request: Request) => Promise<Response>;

/** The part of `ServerResponse` a web `Response` is written through. */
export interface ResponseSink {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  write(chunk: Uint8Array): boolean;
  end(): unknown;
  on(event: 'close' | 'drain', listener: () => void): unknown;
  off(event: 'close' | 'drain', listener: () => void): unknown;
}

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

export async function toWebRequest(req: IncomingMessage): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) value.forEach(v => headers.append(name, v));
    else if (value !== undefined) headers.set(name, value);
  }

  const method = req.method ?? 'GET';
  const body = method === 'GET' || method === 'HEAD' ? undefined : await readBody(req);
  return new Request(new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`), {
    method,
    headers,
    body,
  });
}

/** Resolves once the sink can take more data, or once the connection is gone. */
function writable(res: ResponseSink): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
  });
}

export async function writeWebResponse(response: Response, res: ResponseSink): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));

  if (!response.body) {
    res.end();
    return;
  }

  const reader = response.body.getReader();
  let disconnected = false;
  const onClose = () => {
    disconnected = true;
    reader.cancel().catch((error: unknown) => {
      console.warn('Failed to cancel response stream:', error instanceof Error ? error.message : error);
    });
  };
  res.on('close', onClose);

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done || disconnected) break;
      if (!res.write(value)) await writable(res);
    }
  } finally {
    res.off('close', onClose);
  }
  res.end();
}

export function createHttpServer(handler: WebHandler) {
  return createServer((req, res) => {
    toWebRequest(req)
      .then(handler)
      .then(response => writeWebResponse(response, res))
      .catch(error => {
        console.error('Unhandled request error:', error);
        if (!res.headersSent) res.statusCode = 500;
        res.end();
      });
  });
}
