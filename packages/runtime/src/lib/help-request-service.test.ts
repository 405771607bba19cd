import { HelpRequestLifecycle } from './help-request-service.js';
import { KnowledgeIndex } from './knowledge-index.js';
import { MemoryStore } from './memory-store.js';
import { ConsoleNotificationChannel } from './notifications.js';
import { UpstreamUnavailableError, ValidationError } from './errors.js';
import { buildCallerFollowUp, buildSupervisorAlert } from './prompts.js';

describe('HelpRequestLifecycle', () => {
  let clock: Date;
  let store: MemoryStore;
  let knowledge: KnowledgeIndex;
  let notifications: ConsoleNotificationChannel;
  let lifecycle: HelpRequestLifecycle;

  const advanceMinutes = (minutes: number) => {
    clock = new Date(clock.getTime() + minutes * 60 * 1000);
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    clock = new Date('2024-03-01T10:00:00.000Z');
    const now = () => clock;
    store = new MemoryStore();
    knowledge = new KnowledgeIndex({ store, now });
    notifications = new ConsoleNotificationChannel();
    lifecycle = new HelpRequestLifecycle({ store, knowledge, notifications, now });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('create', () => {
    it('should persist a pending request and alert the supervisor', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?', 'Customer: Do you do weddings?');

      await expect(lifecycle.get(id)).resolves.toEqual({
        id,
        callerId: 'caller-1',
        callerContact: '+15550001111',
        question: 'Do you do weddings?',
        context: 'Customer: Do you do weddings?',
        status: 'pending',
        createdAt: '2024-03-01T10:00:00.000Z',
      });
      expect(notifications.log()).toEqual([
        expect.objectContaining({
          kind: 'supervisor',
          requestId: id,
          message: buildSupervisorAlert('Do you do weddings?', '+15550001111', id),
        }),
      ]);
      const [alert] = notifications.log();
      expect(alert.message.split('\n')).toEqual(expect.arrayContaining([
        `Request: ${id}`,
        'Question: Do you do weddings?',
        'Caller: +15550001111',
      ]));
    });

    it('should reject a blank question', async () => {
      await expect(lifecycle.create('caller-1', '+15550001111', '  ')).rejects.toBeInstanceOf(ValidationError);
      await expect(store.listRecent(10)).resolves.toEqual([]);
    });

    it('should keep the request when the alert fails', async () => {
      jest.spyOn(notifications, 'notifySupervisor').mockRejectedValue(new Error('bus down'));

      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');

      expect((await lifecycle.get(id))?.status).toBe('pending');
    });

    it('should surface store failures without notifying', async () => {
      jest.spyOn(store, 'createHelpRequest').mockRejectedValue(new Error('table missing'));

      await expect(lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?'))
        .rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(notifications.log()).toEqual([]);
    });
  });

  describe('resolve', () => {
    it('should resolve, learn the answer and follow up with the caller', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');
      advanceMinutes(12);

      const outcome = await lifecycle.resolveRequest(id, 'Yes, bridal packages start at $150.', 'Dana');

      expect(outcome.ok).toBe(true);
      const request = await lifecycle.get(id);
      expect(request).toMatchObject({
        status: 'resolved',
        resolvedAt: '2024-03-01T10:12:00.000Z',
        supervisorAnswer: 'Yes, bridal packages start at $150.',
        supervisorName: 'Dana',
      });

      const learned = await store.listAllKnowledge();
      expect(learned).toHaveLength(1);
      expect(learned[0]).toMatchObject({ question: 'Do you do weddings?', helpRequestId: id, source: 'supervisor' });
      if (outcome.ok) {
        expect(outcome.knowledgeEntryId).toBe(learned[0].id);
      }

      expect(notifications.log()[1]).toMatchObject({
        kind: 'caller',
        to: '+15550001111',
        message: buildCallerFollowUp('Do you do weddings?', 'Yes, bridal packages start at $150.'),
      });
    });

    it('should default the resolver name', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');

      await expect(lifecycle.resolve(id, 'Yes.')).resolves.toBe(true);
      expect(await lifecycle.get(id)).toMatchObject({ supervisorName: 'Supervisor' });
    });

    it('should refuse a second resolution without learning or notifying again', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');
      await lifecycle.resolve(id, 'Yes.');

      const outcome = await lifecycle.resolveRequest(id, 'No.');

      expect(outcome).toEqual({
        ok: false,
        reason: 'invalid_transition',
        message: `Help request ${id} cannot move from resolved to resolved`,
      });
      expect(await store.listAllKnowledge()).toHaveLength(1);
      expect(notifications.log()).toHaveLength(2);
      expect(await lifecycle.get(id)).toMatchObject({ supervisorAnswer: 'Yes.' });
    });

    it('should return false for an unknown id', async () => {
      await expect(lifecycle.resolve('nonexistent-id', 'Yes.')).resolves.toBe(false);
      await expect(lifecycle.resolveRequest('nonexistent-id', 'Yes.')).resolves.toMatchObject({ ok: false, reason: 'not_found' });
      expect(await store.listAllKnowledge()).toEqual([]);
    });

    it('should reject a blank answer', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');

      await expect(lifecycle.resolveRequest(id, '   ')).resolves.toMatchObject({ ok: false, reason: 'validation' });
      expect((await lifecycle.get(id))?.status).toBe('pending');
    });

    it('should let only one of two concurrent resolvers win', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');

      const results = await Promise.all([
        lifecycle.resolve(id, 'Yes.', 'Dana'),
        lifecycle.resolve(id, 'No.', 'Sam'),
      ]);

      expect(results.filter(Boolean)).toHaveLength(1);
      expect(await store.listAllKnowledge()).toHaveLength(1);
    });

    it('should stay resolved when learning fails', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');
      jest.spyOn(knowledge, 'learn').mockRejectedValue(new Error('write failed'));

      const outcome = await lifecycle.resolveRequest(id, 'Yes.');

      expect(outcome).toMatchObject({ ok: true, knowledgeEntryId: undefined });
      expect((await lifecycle.get(id))?.status).toBe('resolved');
      expect(notifications.log()).toHaveLength(2);
    });

    it('should stay resolved when the follow-up fails', async () => {
      const id = await lifecycle.create('caller-1', '+15550001111', 'Do you do weddings?');
      jest.spyOn(notifications, 'notifyCaller').mockRejectedValue(new Error('sms down'));

      await expect(lifecycle.resolve(id, 'Yes.')).resolves.toBe(true);
      expect((await lifecycle.get(id))?.status).toBe('resolved');
    });
  });

  describe('timeoutStale', () => {
    it('should time out only pending requests older than the threshold', async () => {
      const old = await lifecycle.create('caller-1', '+15550001111', 'Old question');
      const answered = await lifecycle.create('caller-2', '+15550002222', 'Answered question');
      await lifecycle.resolve(answered, 'Done.');
      advanceMinutes(60);
      const exact = await lifecycle.create('caller-3', '+15550003333', 'Exactly one hour old');
      advanceMinutes(60);

      const timedOut = await lifecycle.timeoutStale(1);

      expect(timedOut).toEqual([old]);
      expect(await lifecycle.get(old)).toMatchObject({ status: 'timeout', resolvedAt: '2024-03-01T12:00:00.000Z' });
      expect((await lifecycle.get(exact))?.status).toBe('pending');
      expect((await lifecycle.get(answered))?.status).toBe('resolved');
    });

    it('should be idempotent and send no notifications', async () => {
      await lifecycle.create('caller-1', '+15550001111', 'Old question');
      advanceMinutes(25 * 60);

      expect(await lifecycle.timeoutStale(24)).toHaveLength(1);
      expect(await lifecycle.timeoutStale(24)).toEqual([]);
      expect(notifications.log()).toHaveLength(1);
    });

    it('should keep sweeping when one update fails', async () => {
      const older = await lifecycle.create('caller-1', '+15550001111', 'Older question');
      const newer = await lifecycle.create('caller-2', '+15550002222', 'Newer question');
      advanceMinutes(25 * 60);
      const updateTimeout = store.updateHelpRequestTimeout.bind(store);
      jest.spyOn(store, 'updateHelpRequestTimeout').mockImplementation(async (id, resolvedAt) => {
        if (id === newer) {
          throw new Error('throttled');
        }
        return updateTimeout(id, resolvedAt);
      });

      const timedOut = await lifecycle.timeoutStale(24);

      expect(timedOut).toEqual([older]);
      expect((await lifecycle.get(older))?.status).toBe('timeout');
      expect((await lifecycle.get(newer))?.status).toBe('pending');
      expect(console.error).toHaveBeenCalledWith(`❌ Failed to time out help request ${newer}: throttled`);
    });

    it('should raise UpstreamUnavailableError when pending requests cannot be listed', async () => {
      jest.spyOn(store, 'listPending').mockRejectedValueOnce(new Error('store offline'));

      const sweep = lifecycle.timeoutStale(24);

      await expect(sweep).rejects.toBeInstanceOf(UpstreamUnavailableError);
      await expect(sweep).rejects.toThrow('Failed to list pending help requests: store offline');
    });
  });

  describe('stats', () => {
    it('should return zeros when there are no requests', async () => {
      await expect(lifecycle.stats()).resolves.toEqual({
        total: 0,
        pending: 0,
        resolved: 0,
        timeout: 0,
        avgResolutionMinutes: 0,
        resolutionRatePct: 0,
      });
    });

    it('should aggregate counts, mean resolution time and resolution rate', async () => {
      const first = await lifecycle.create('caller-1', '+15550001111', 'Q1');
      const second = await lifecycle.create('caller-2', '+15550002222', 'Q2');
      await lifecycle.create('caller-3', '+15550003333', 'Q3');
      advanceMinutes(10);
      await lifecycle.resolve(first, 'A1');
      advanceMinutes(5);
      await lifecycle.resolve(second, 'A2');

      await expect(lifecycle.stats()).resolves.toEqual({
        total: 3,
        pending: 1,
        resolved: 2,
        timeout: 0,
        avgResolutionMinutes: 12.5,
        resolutionRatePct: 66.7,
      });
    });
  });

  describe('listing', () => {
    it('should list pending requests newest first', async () => {
      const first = await lifecycle.create('caller-1', '+15550001111', 'Q1');
      advanceMinutes(1);
      const second = await lifecycle.create('caller-2', '+15550002222', 'Q2');

      expect((await lifecycle.listPending()).map(request => request.id)).toEqual([second, first]);
      expect((await lifecycle.listRecent(1)).map(request => request.id)).toEqual([second]);
    });
  });
});
