import { routeSupervisorRequest, type SupervisorApiRequest } from './supervisor-api.js';
import { createDeskRuntime, type DeskRuntime } from '../lib/runtime.js';
import { createTestConfig } from '../lib/config.js';
import { MemoryStore } from '../lib/memory-store.js';
import { ConsoleNotificationChannel } from '../lib/notifications.js';
import type { EscalationOracle } from '../lib/oracle.js';

const unusedOracle: EscalationOracle = {
  classify: jest.fn().mockRejectedValue(new Error('not expected')),
  generate: jest.fn().mockRejectedValue(new Error('not expected')),
};

describe('routeSupervisorRequest', () => {
  let runtime: DeskRuntime;

  const call = async (request: SupervisorApiRequest) => {
    const response = await routeSupervisorRequest(runtime, request);
    return { statusCode: response.statusCode, headers: response.headers, json: response.body ? JSON.parse(response.body) : undefined };
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    runtime = createDeskRuntime(createTestConfig(), {
      store: new MemoryStore(),
      notifications: new ConsoleNotificationChannel(),
      oracle: unusedOracle,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should list pending requests with CORS headers', async () => {
    const id = await runtime.lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');

    const response = await call({ method: 'GET', path: '/api/requests/pending' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['Access-Control-Allow-Origin']).toBe('*');
    expect(response.json.success).toBe(true);
    expect(response.json.data.map((request: { id: string }) => request.id)).toEqual([id]);
  });

  it('should resolve a request and report the learned entry', async () => {
    const id = await runtime.lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');

    const response = await call({
      method: 'POST',
      path: `/api/requests/${id}/resolve`,
      body: JSON.stringify({ answer: 'Yes, bridal packages start at $150.', supervisorName: 'Dana' }),
    });

    expect(response.statusCode).toBe(200);
    expect(response.json.data.request).toMatchObject({ id, status: 'resolved', supervisorName: 'Dana' });
    expect(response.json.data.knowledgeEntryId).toBe(runtime.knowledge.entries()[0].id);
  });

  it('should map resolution failures to status codes', async () => {
    const id = await runtime.lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');
    const resolve = (requestId: string, answer: string) =>
      call({ method: 'POST', path: `/api/requests/${requestId}/resolve`, body: JSON.stringify({ answer }) });

    expect((await resolve(id, '  ')).statusCode).toBe(400);
    expect((await resolve('nonexistent-id', 'Yes.')).statusCode).toBe(404);
    expect((await resolve(id, 'Yes.')).statusCode).toBe(200);

    const again = await resolve(id, 'Yes.');
    expect(again.statusCode).toBe(409);
    expect(again.json).toEqual({ success: false, message: `Help request ${id} cannot move from resolved to resolved` });
  });

  it('should reject a malformed resolve body', async () => {
    const response = await call({ method: 'POST', path: '/api/requests/abc/resolve', body: 'not json' });

    expect(response.statusCode).toBe(400);
    expect(response.json.message).toBe('Body must be JSON with a string "answer"');
  });

  it('should return 404 for an unknown request id', async () => {
    const response = await call({ method: 'GET', path: '/api/requests/nonexistent-id' });

    expect(response.statusCode).toBe(404);
    expect(response.json).toEqual({ success: false, message: 'Help request nonexistent-id not found' });
  });

  it('should validate the limit parameter', async () => {
    expect((await call({ method: 'GET', path: '/api/requests', query: { limit: 'ten' } })).statusCode).toBe(400);
    expect((await call({ method: 'GET', path: '/api/calls', query: { limit: '5' } })).statusCode).toBe(200);
  });

  it('should search knowledge without counting usage', async () => {
    const [id] = await runtime.knowledge.seed([{ question: 'Is there parking?', answer: 'Behind the salon.' }]);

    const response = await call({ method: 'GET', path: '/api/knowledge/search', query: { q: 'parking' } });

    expect(response.json.data.map((entry: { id: string }) => entry.id)).toEqual([id]);
    expect((await runtime.store.listAllKnowledge())[0].usageCount).toBe(0);
  });

  it('should require a search query', async () => {
    expect((await call({ method: 'GET', path: '/api/knowledge/search' })).statusCode).toBe(400);
  });

  it('should report stats with the knowledge entry count', async () => {
    await runtime.knowledge.seed([{ question: 'Q', answer: 'A' }]);
    await runtime.lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');

    const response = await call({ method: 'GET', path: '/api/stats' });

    expect(response.json.data).toEqual({
      total: 1,
      pending: 1,
      resolved: 0,
      timeout: 0,
      avgResolutionMinutes: 0,
      resolutionRatePct: 0,
      knowledgeEntries: 1,
    });
  });

  it('should answer preflight requests', async () => {
    const response = await call({ method: 'OPTIONS', path: '/api/requests' });

    expect(response.statusCode).toBe(204);
  });

  it('should return 404 for unknown routes', async () => {
    expect((await call({ method: 'DELETE', path: '/api/requests/abc' })).statusCode).toBe(404);
    expect((await call({ method: 'GET', path: '/health' })).statusCode).toBe(404);
  });

  it('should return 500 when the store fails', async () => {
    jest.spyOn(runtime.store, 'listPending').mockRejectedValue(new Error('store offline'));

    const response = await call({ method: 'GET', path: '/api/requests/pending' });

    expect(response.statusCode).toBe(500);
    expect(response.json).toEqual({ success: false, message: 'store offline' });
  });
});
