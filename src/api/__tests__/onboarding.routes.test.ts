import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Server } from 'http';
import { createApp } from '../../app';
import { SessionRegistry } from '../../services/session-manager';
import { RuleBasedExtractor } from '../../services/extraction/rules';
import { isRecord } from '../../utils/guards';

let server: Server;
let baseUrl: string;

beforeEach(async () => {
  const app = createApp(new SessionRegistry(new RuleBasedExtractor()));
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function post(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function createSession(): Promise<string> {
  const res = await post('/api/onboarding', {});
  const body = await res.json();
  if (!isRecord(body) || typeof body.sessionId !== 'string') throw new Error('no session id in response');
  return body.sessionId;
}

describe('onboarding routes', () => {
  it('POST /api/onboarding starts a session', async () => {
    const res = await post('/api/onboarding', { storeId: 3 });
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      sessionId: expect.any(String),
      state: 'AskStoreName',
      accepted: false,
      done: false,
    });
  });

  it('rejects a non-integer store id', async () => {
    const res = await post('/api/onboarding', { storeId: 'abc' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Validation error' });
  });

  it('POST /:id/messages advances the conversation', async () => {
    const id = await createSession();
    const res = await post(`/api/onboarding/${id}/messages`, { text: '123 Bistro' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ sessionId: id, state: 'AskResources', accepted: true });
  });

  it('rejects an empty message', async () => {
    const id = await createSession();
    const res = await post(`/api/onboarding/${id}/messages`, { text: '' });
    expect(res.status).toBe(400);
  });

  it('returns 404 for an unknown session', async () => {
    const res = await post('/api/onboarding/nope/messages', { text: 'hi' });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Session not found' });
  });

  it('GET /:id returns the collected slots', async () => {
    const id = await createSession();
    await post(`/api/onboarding/${id}/messages`, { text: '123 Bistro' });

    const res = await fetch(`${baseUrl}/api/onboarding/${id}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      sessionId: id,
      state: 'AskResources',
      done: false,
      visited: ['AskStoreName', 'AskResources'],
      slots: { store_name: '123 Bistro', resources: null },
      recommendation: null,
      configuration: null,
    });
  });

  it('DELETE /:id discards the session', async () => {
    const id = await createSession();
    const res = await fetch(`${baseUrl}/api/onboarding/${id}`, { method: 'DELETE' });
    expect(res.status).toBe(204);

    const gone = await fetch(`${baseUrl}/api/onboarding/${id}`);
    expect(gone.status).toBe(404);
  });

  it('GET /api/health reports ok', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });
});
