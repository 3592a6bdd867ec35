import type { Context } from 'hono';

export type JsonBodyResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

/**
 * Reads a JSON request body while counting bytes, so the limit holds even
 * when Content-Length is missing or wrong. An empty body parses as `{}`.
 */
export async function readJsonBody(c: Context, maxBytes: number): Promise<JsonBodyResult> {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: tooLarge(c, maxBytes) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return { ok: false, response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415) };
  }

  const stream = c.req.raw.body;
  let raw = '';
  if (stream) {
    const reader = stream.getReader();
    const decoder = new TextDecoder();
    let total = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        total += value.byteLength;
        if (total > maxBytes) {
          await reader.cancel().catch(() => undefined);
          return { ok: false, response: tooLarge(c, maxBytes) };
        }
        raw += decoder.decode(value, { stream: true });
      }
      raw += decoder.decode();
    } catch {
      return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
    }
  }

  if (!raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Invalid JSON body' }, 400) };
  }
}
