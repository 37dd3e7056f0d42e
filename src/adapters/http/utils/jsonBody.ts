import type { IncomingMessage, ServerResponse } from 'node:http';

export const MAX_JSON_BODY_BYTES = 1 * 1024 * 1024;

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Reads a JSON request body. Resolves `null` for an empty body; on oversized or invalid
 * payloads the error response (413 / 400) is already written and `undefined` is returned.
 */
export function readJsonBody(
  req: IncomingMessage,
  res: ServerResponse,
  limit = MAX_JSON_BODY_BYTES,
): Promise<unknown> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let settled = false;

    const cleanup = () => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
      req.off('aborted', onAborted);
    };

    const done = (value: unknown) => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(value);
    };

    const closeSocket = () => {
      const socket = req.socket;
      if (socket && !socket.destroyed) {
        socket.destroy();
      }
    };

    const rejectTooLarge = () => {
      if (!res.writableEnded) {
        res.setHeader('Connection', 'close');
        sendJson(res, 413, { error: 'payload-too-large' });
      }
      req.pause();
      res.once('finish', closeSocket);
      res.once('close', closeSocket);
      done(undefined);
    };

    const onData = (chunk: Buffer | string) => {
      if (settled) return;
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      totalBytes += buffer.length;
      if (totalBytes > limit) {
        rejectTooLarge();
        return;
      }
      chunks.push(buffer);
    };

    const onEnd = () => {
      if (settled) return;
      if (totalBytes === 0) {
        done(null);
        return;
      }
      const raw = Buffer.concat(chunks).toString('utf8');
      try {
        done(JSON.parse(raw));
      } catch {
        if (!res.writableEnded) {
          sendJson(res, 400, { error: 'invalid-json' });
        }
        done(undefined);
      }
    };

    const onError = () => {
      if (!res.writableEnded) {
        sendJson(res, 400, { error: 'invalid-json' });
      }
      done(undefined);
    };

    const onAborted = () => {
      done(undefined);
    };

    req.on('data', onData);
    req.once('end', onEnd);
    req.once('error', onError);
    req.once('aborted', onAborted);
  });
}
