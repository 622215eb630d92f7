import http from 'http';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { Metrics } from './metrics';
import type { WebhookHandler } from './WebhookHandler';

export const MAX_BODY_BYTES = 64 * 1024;

export type ServerDeps = {
  handler: WebhookHandler;
  metrics: Metrics;
  log: Logger;
  maxBodyBytes?: number;
};

/** Resolves with the body, or null once it grows past `limit` (the rest is drained and dropped). */
async function readBody(req: http.IncomingMessage, limit: number): Promise<string | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const c of req) {
    const buf = Buffer.isBuffer(c) ? c : Buffer.from(String(c));
    size += buf.length;
    if (size <= limit) chunks.push(buf);
  }
  return size > limit ? null : Buffer.concat(chunks).toString('utf8');
}

function send(res: http.ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}) {
  res.writeHead(status, { 'content-type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

export function createServer({ handler, metrics, log, maxBodyBytes = MAX_BODY_BYTES }: ServerDeps): http.Server {
  return http.createServer(async (req, res) => {
    const method = req.method || 'UNKNOWN';
    const path = new URL(req.url || '/', 'http://localhost').pathname;
    // Only known routes become label values.
    let route = 'unknown';
    const done = (status: number) => metrics.requests.inc({ method, path: route, status: String(status) });
    try {
      if (method === 'GET' && path === '/health') { route = '/health'; send(res, 200, { status: 'ok' }); done(200); return; }
      if (method === 'GET' && path === '/metrics') {
        route = '/metrics';
        const body = await metrics.registry.metrics();
        res.writeHead(200, { 'content-type': metrics.registry.contentType });
        res.end(body);
        done(200);
        return;
      }
      if (method === 'POST' && path === '/webhook') {
        route = '/webhook';
        const headerCorr = req.headers['x-correlation-id'];
        const corr = typeof headerCorr === 'string' && headerCorr ? headerCorr : uuidv4();
        const reqLog = log.child({ corr });
        try {
          const raw = await readBody(req, maxBodyBytes);
          if (raw === null) {
            send(res, 413, { ok: false, error: 'payload too large' }, { 'x-correlation-id': corr });
            done(413);
            return;
          }
          const result = await handler.handle(raw, reqLog);
          metrics.alerts.inc({ outcome: result.outcome });
          send(res, result.status, result.body, { 'x-correlation-id': corr });
          done(result.status);
        } catch (err) {
          metrics.alerts.inc({ outcome: 'error' });
          reqLog.error({ err }, 'webhook failed');
          send(res, 500, { ok: false, error: 'internal_error', message: err instanceof Error ? err.message : String(err) }, { 'x-correlation-id': corr });
          done(500);
        }
        return;
      }
      send(res, 404, { error: 'not_found' });
      done(404);
    } catch (err) {
      log.error({ err }, 'unhandled error');
      if (!res.headersSent) send(res, 500, { ok: false, error: 'internal_error', message: err instanceof Error ? err.message : String(err) });
      else res.end();
      done(500);
    }
  });
}
