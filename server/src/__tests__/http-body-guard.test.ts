import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { readJsonBody } from '../lib/http-body-guard.js';

function buildApp(maxBytes: number) {
  const app = new Hono();
  app.post('/parse', async (c) => {
    const parsed = await readJsonBody(c, maxBytes);
    if (!parsed.ok) return parsed.response;
    return c.json({ data: parsed.data });
  });
  return app;
}

function post(app: Hono, body: BodyInit | null, contentType = 'application/json') {
  return app.request('http://test/parse', { method: 'POST', body, headers: { 'Content-Type': contentType } });
}

describe('readJsonBody', () => {
  it('parses JSON within the limit', async () => {
    const res = await post(buildApp(200), JSON.stringify({ job_title: 'SRE' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { job_title: 'SRE' } });
  });

  it('treats an empty body as an empty object', async () => {
    const res = await post(buildApp(200), null);

    expect(await res.json()).toEqual({ data: {} });
  });

  it('returns 413 for oversized bodies', async () => {
    const res = await post(buildApp(20), JSON.stringify({ payload: 'x'.repeat(200) }));

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request too large (max 20 bytes)' });
  });

  it('counts streamed bytes when content-length is absent', async () => {
    const encoder = new TextEncoder();
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"payload":"'));
        controller.enqueue(encoder.encode('x'.repeat(120)));
        controller.enqueue(encoder.encode('"}'));
        controller.close();
      },
    });
    const init: RequestInit & { duplex: 'half' } = {
      method: 'POST',
      body: stream,
      headers: { 'Content-Type': 'application/json' },
      duplex: 'half',
    };

    const res = await buildApp(30).request(new Request('http://test/parse', init));

    expect(res.status).toBe(413);
  });

  it('returns 400 for invalid JSON', async () => {
    const res = await post(buildApp(200), '{invalid-json');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('returns 415 for other content types', async () => {
    const res = await post(buildApp(200), 'job_title=SRE', 'application/x-www-form-urlencoded');

    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'Unsupported content type. Use application/json.' });
  });
});
