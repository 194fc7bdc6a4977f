import { describe, it, expect } from 'vitest';
import { createAuthMiddleware } from '../../src/middleware/authenticate.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { ApiErrorResponse } from '../../src/types/api.js';

describe('authenticate middleware', () => {
  const echoHandler: Handler = async (_req, ctx) => {
    return new Response(JSON.stringify({ operator: ctx.operator }), { status: 200 });
  };

  function makeReq(apiKey?: string): Request {
    const headers: Record<string, string> = {};
    if (apiKey) {
      headers['Authorization'] = `Bearer ${apiKey}`;
    }
    return new Request('http://test', { headers });
  }

  function ctx(): HandlerContext {
    return { operator: false };
  }

  it('should mark the context as operator for the admin key', async () => {
    const wrapped = createAuthMiddleware('test-secret')(echoHandler);
    const context = ctx();
    const res = await wrapped(makeReq('test-secret'), context);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { operator: boolean };
    expect(body.operator).toBe(true);
    expect(context.operator).toBe(true);
  });

  it('should return 401 when no Authorization header', async () => {
    const wrapped = createAuthMiddleware('test-secret')(echoHandler);
    const res = await wrapped(makeReq(), ctx());
    const body = (await res.json()) as ApiErrorResponse;

    expect(res.status).toBe(401);
    expect(body.error.code).toBe('UNAUTHORIZED');
    expect(body.error.message).toBe('Missing or invalid Authorization header. Use: Bearer <api_key>');
  });

  it('should return 401 for non-Bearer scheme', async () => {
    const req = new Request('http://test', {
      headers: { Authorization: 'Basic test-secret' },
    });
    const wrapped = createAuthMiddleware('test-secret')(echoHandler);
    const res = await wrapped(req, ctx());

    expect(res.status).toBe(401);
  });

  it('should return 401 for a wrong key', async () => {
    const wrapped = createAuthMiddleware('test-secret')(echoHandler);
    const res = await wrapped(makeReq('other-secret'), ctx());
    const body = (await res.json()) as ApiErrorResponse;

    expect(res.status).toBe(401);
    expect(body.error.message).toBe('Invalid API key');
  });

  it('should return 401 for a key that is a prefix of the admin key', async () => {
    const wrapped = createAuthMiddleware('test-secret')(echoHandler);
    const res = await wrapped(makeReq('test'), ctx());

    expect(res.status).toBe(401);
  });

  it('should reject every key when no admin key is configured', async () => {
    const wrapped = createAuthMiddleware(null)(echoHandler);
    const res = await wrapped(makeReq('test-secret'), ctx());

    expect(res.status).toBe(401);
  });

  it('should not call the handler when rejected', async () => {
    let called = false;
    const wrapped = createAuthMiddleware('test-secret')(async () => {
      called = true;
      return new Response('ok');
    });
    await wrapped(makeReq('wrong'), ctx());

    expect(called).toBe(false);
  });
});
