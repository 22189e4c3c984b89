/**
 * @file HTTP routing tests. The app listens on an ephemeral local port
 * inside the test process.
 */

import type { Server } from 'http';
import { createApp } from '../../../src/services/api_server/app';
import { ChatController } from '../../../src/services/api_server/chat_controller';
import { ChatEngine } from '../../../src/services/chat_engine/chat_engine';
import { createInMemoryStores } from '../../../src/services/memory_service/in_memory_stores';
import { SessionManager } from '../../../src/services/session_service/session_manager';
import { InMemorySessionStore } from '../../../src/services/session_service/session_stores';

describe('API app', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const stores = createInMemoryStores();
    const engine = new ChatEngine({ stores, sessions: new SessionManager(new InMemorySessionStore()) });
    const app = createApp({
      controller: new ChatController(engine, stores.profiles),
      health: () => ({ storage: 'memory' }),
    });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>(resolve => {
      server.close(() => resolve());
    });
  });

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'UP', storage: 'memory' });
  });

  it('should run a chat turn', async () => {
    const response = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ userId: 'user-1', message: 'I am stressed about work' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ userId: 'user-1', turn: 1, phase: 'AT_RISK' });
  });

  it('should answer 400 for malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"userId":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Bad Request', details: ['Request body is not valid JSON.'] });
  });

  it('should route profile and feedback requests', async () => {
    const put = await fetch(`${baseUrl}/api/users/user-2/profile`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: 'Sam' }),
    });
    const feedback = await fetch(`${baseUrl}/api/users/user-2/feedback`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ suggestionId: 'comfort-song', action: 'rejected' }),
    });
    const suggestions = await fetch(`${baseUrl}/api/users/user-2/suggestions?limit=1`);

    expect(put.status).toBe(200);
    expect(feedback.status).toBe(201);
    expect(suggestions.status).toBe(200);
    expect(await suggestions.json()).toMatchObject({ phase: 'STABLE', suggestions: [{ source: 'catalog' }] });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/api/nothing`);

    expect(response.status).toBe(404);
  });
});
