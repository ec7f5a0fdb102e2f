import { describe, it, expect, vi, afterEach } from 'vitest';
import { Server } from 'http';
import { createApp } from '../../app';
import { SessionRegistry } from '../../services/session-manager';
import { RuleBasedExtractor } from '../../services/extraction/rules';
import { ExtractionPort } from '../../services/extraction/types';
import { isRecord } from '../../utils/guards';

vi.mock('../../onboarding/validators', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../onboarding/validators')>();
  return {
    ...actual,
    validateFinal: vi.fn(() => ({ ok: false, reason: 'capacity_hint does not match resources' })),
  };
});

let server: Server | null = null;

afterEach(async () => {
  const s = server;
  server = null;
  if (s) await new Promise<void>((resolve, reject) => s.close((err) => (err ? reject(err) : resolve())));
});

async function serve(registry: SessionRegistry): Promise<string> {
  const app = createApp(registry);
  const s = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  server = s;
  const address = s.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
  return `http://127.0.0.1:${address.port}`;
}

function post(url: string, body: unknown) {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function createSession(baseUrl: string): Promise<string> {
  const body = await (await post(`${baseUrl}/api/onboarding`, {})).json();
  if (!isRecord(body) || typeof body.sessionId !== 'string') throw new Error('no session id in response');
  return body.sessionId;
}

describe('onboarding route errors', () => {
  it('returns 500 when the final configuration fails validation', async () => {
    const baseUrl = await serve(new SessionRegistry(new RuleBasedExtractor()));
    const id = await createSession(baseUrl);
    const replies = ['123 Bistro', '4-seat table x5, 6-seat table x4', 'A', 'every day 08:00-17:00', 'yes', 'you decide'];
    for (const text of replies) {
      expect((await post(`${baseUrl}/api/onboarding/${id}/messages`, { text })).status).toBe(200);
    }

    const res = await post(`${baseUrl}/api/onboarding/${id}/messages`, { text: 'A' });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error' });
  });

  it('returns 409 while the previous message is still being handled', async () => {
    let release: (value: unknown) => void = () => {};
    let started: () => void = () => {};
    const extracting = new Promise<void>((resolve) => {
      started = resolve;
    });
    const port: ExtractionPort = {
      name: 'deferred',
      extract: () =>
        new Promise((resolve) => {
          release = resolve;
          started();
        }),
    };
    const baseUrl = await serve(new SessionRegistry(port));
    const id = await createSession(baseUrl);

    const first = post(`${baseUrl}/api/onboarding/${id}/messages`, { text: '123 Bistro' });
    await extracting;
    const second = await post(`${baseUrl}/api/onboarding/${id}/messages`, { text: 'again' });
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ error: 'Session is busy with a previous message' });

    release({ store_name: '123 Bistro' });
    const done = await first;
    expect(done.status).toBe(200);
    expect(await done.json()).toMatchObject({ state: 'AskResources' });
  });
});
