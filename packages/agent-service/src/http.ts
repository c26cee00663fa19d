import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { describeError } from '@stayhound/shared';
import type { TriggerResult } from './scheduler/scheduler.js';

export interface ControlSurface {
  getStatus(): Promise<unknown>;
  runNow(): TriggerResult;
  testNotify(): Promise<boolean>;
}

export interface RouteResponse {
  status: number;
  contentType: 'text/plain' | 'application/json';
  body: string;
}

const RUN_STATUS: Record<TriggerResult, number> = {
  started: 202,
  already_running: 409,
  disabled: 409,
  not_found: 404,
};

function text(status: number, body: string): RouteResponse {
  return { status, contentType: 'text/plain', body };
}

function json(status: number, payload: unknown): RouteResponse {
  return { status, contentType: 'application/json', body: JSON.stringify(payload) };
}

export async function route(surface: ControlSurface, method: string, url: string): Promise<RouteResponse> {
  const path = new URL(url, 'http://localhost').pathname;

  if (path === '/health') return text(200, 'ok');

  if (path === '/status' && method === 'GET') {
    return json(200, await surface.getStatus());
  }

  if (path === '/run' && method === 'POST') {
    const result = surface.runNow();
    return json(RUN_STATUS[result], { result });
  }

  if (path === '/test-notify' && method === 'POST') {
    const delivered = await surface.testNotify();
    return json(delivered ? 200 : 502, { delivered });
  }

  return text(404, 'not found');
}

export function createControlServer(surface: ControlSurface): Server {
  return createServer((req, res) => {
    route(surface, req.method ?? 'GET', req.url ?? '/')
      .catch((err: unknown) => {
        console.error(`[http] ${req.method} ${req.url} failed:`, describeError(err));
        return text(500, 'internal error');
      })
      .then(({ status, contentType, body }) => {
        res.writeHead(status, { 'Content-Type': contentType });
        res.end(body);
      })
      .catch((err: unknown) => {
        console.error('[http] Failed to write response:', describeError(err));
      });
  });
}
