import { describe, it, expect, vi } from 'vitest';
import { route } from '../http.js';
import type { ControlSurface } from '../http.js';
import type { TriggerResult } from '../scheduler/scheduler.js';

function makeSurface(overrides: Partial<ControlSurface> = {}): ControlSurface {
  return {
    getStatus: vi.fn(async () => ({ sources: ['booking'], lastPass: null })),
    runNow: vi.fn((): TriggerResult => 'started'),
    testNotify: vi.fn(async () => true),
    ...overrides,
  };
}

describe('route', () => {
  it('answers health checks', async () => {
    expect(await route(makeSurface(), 'GET', '/health')).toEqual({
      status: 200,
      contentType: 'text/plain',
      body: 'ok',
    });
  });

  it('serves status as JSON', async () => {
    const response = await route(makeSurface(), 'GET', '/status');

    expect(response.status).toBe(200);
    expect(response.contentType).toBe('application/json');
    expect(JSON.parse(response.body)).toEqual({ sources: ['booking'], lastPass: null });
  });

  it('starts a search pass on POST /run', async () => {
    const surface = makeSurface();
    const response = await route(surface, 'POST', '/run');

    expect(surface.runNow).toHaveBeenCalledOnce();
    expect(response).toMatchObject({ status: 202, body: '{"result":"started"}' });
  });

  it('reports a conflict when the search is already running', async () => {
    const response = await route(makeSurface({ runNow: () => 'already_running' }), 'POST', '/run');
    expect(response).toMatchObject({ status: 409, body: '{"result":"already_running"}' });
  });

  it('reports whether the test notification was delivered', async () => {
    expect(await route(makeSurface(), 'POST', '/test-notify'))
      .toMatchObject({ status: 200, body: '{"delivered":true}' });
    expect(await route(makeSurface({ testNotify: async () => false }), 'POST', '/test-notify'))
      .toMatchObject({ status: 502, body: '{"delivered":false}' });
  });

  it('returns 404 for unknown routes and wrong methods', async () => {
    const surface = makeSurface();
    expect((await route(surface, 'GET', '/nope')).status).toBe(404);
    expect((await route(surface, 'GET', '/run')).status).toBe(404);
    expect(surface.runNow).not.toHaveBeenCalled();
  });

  it('ignores query strings', async () => {
    expect((await route(makeSurface(), 'GET', '/health?check=1')).body).toBe('ok');
  });
});
