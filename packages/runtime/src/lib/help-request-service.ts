import { DeskError, InvalidTransitionError, NotFoundError, UpstreamUnavailableError, ValidationError, describeError } from './errors.js';
import type { KnowledgeIndex } from './knowledge-index.js';
import type { NotificationChannel } from './notifications.js';
import { buildCallerFollowUp, buildSupervisorAlert } from './prompts.js';
import type { DeskStore } from './store.js';
import type { HelpRequest, HelpRequestStats, ResolvedHelpRequest } from '../types/index.js';

export type ResolveFailureReason = 'not_found' | 'invalid_transition' | 'validation';

export type ResolveOutcome =
  | { ok: true; request: ResolvedHelpRequest; knowledgeEntryId?: string }
  | { ok: false; reason: ResolveFailureReason; message: string };

export interface HelpRequestLifecycleOptions {
  store: DeskStore;
  knowledge: KnowledgeIndex;
  notifications: NotificationChannel;
  statsWindow?: number;
  now?: () => Date;
}

const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_MINUTE = 60 * 1000;

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Help-request state machine: pending → resolved | timeout.
 *
 * Transitions go through the store's conditional updates, so a request is
 * resolved (and learned from) at most once even with concurrent resolvers.
 * Notifications are sent after persistence and never roll it back.
 */
export class HelpRequestLifecycle {
  private store: DeskStore;
  private knowledge: KnowledgeIndex;
  private notifications: NotificationChannel;
  private statsWindow: number;
  private now: () => Date;

  constructor(options: HelpRequestLifecycleOptions) {
    this.store = options.store;
    this.knowledge = options.knowledge;
    this.notifications = options.notifications;
    this.statsWindow = options.statsWindow ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Persist a pending request and alert the supervisor.
   *
   * @throws ValidationError on blank caller id, contact or question
   * @throws UpstreamUnavailableError when the store write fails
   */
  async create(callerId: string, callerContact: string, question: string, context?: string): Promise<string> {
    if (!callerId.trim() || !callerContact.trim() || !question.trim()) {
      throw new ValidationError('callerId, callerContact and question are required');
    }

    const id = await this.withStore('create help request', () => this.store.createHelpRequest({
      callerId,
      callerContact,
      question,
      context,
      status: 'pending',
      createdAt: this.now().toISOString(),
    }));

    console.log(`🆘 Help request ${id} created for ${callerContact}: "${question}"`);

    try {
      await this.notifications.notifySupervisor(buildSupervisorAlert(question, callerContact, id), id);
    } catch (error) {
      console.error(`❌ Supervisor notification failed for ${id}: ${describeError(error)}`);
    }

    return id;
  }

  /**
   * Resolve a pending request; true only for the call that performed the transition
   */
  async resolve(id: string, answer: string, resolverName = 'Supervisor'): Promise<boolean> {
    const outcome = await this.resolveRequest(id, answer, resolverName);
    return outcome.ok;
  }

  /**
   * Resolve a pending request: record the answer, learn it, and send the
   * caller a follow-up.
   *
   * @throws UpstreamUnavailableError when the store cannot be read or written
   */
  async resolveRequest(id: string, answer: string, resolverName = 'Supervisor'): Promise<ResolveOutcome> {
    if (!answer.trim()) {
      return this.failure('validation', new ValidationError('Answer must not be blank'));
    }

    const request = await this.withStore('load help request', () => this.store.getHelpRequest(id));
    if (!request) {
      return this.failure('not_found', new NotFoundError('Help request', id));
    }
    if (request.status !== 'pending') {
      return this.failure('invalid_transition', new InvalidTransitionError(id, request.status, 'resolved'));
    }

    const resolvedAt = this.now().toISOString();
    const transitioned = await this.withStore('resolve help request', () =>
      this.store.updateHelpRequestResolved(id, answer, resolverName, resolvedAt)
    );
    if (!transitioned) {
      return this.failure('invalid_transition', new InvalidTransitionError(id, 'pending', 'resolved'));
    }

    const resolved: ResolvedHelpRequest = {
      ...request,
      status: 'resolved',
      resolvedAt,
      supervisorAnswer: answer,
      supervisorName: resolverName,
    };
    console.log(`✅ Help request ${id} resolved by ${resolverName}`);

    let knowledgeEntryId: string | undefined;
    try {
      knowledgeEntryId = await this.knowledge.learn(request.question, answer, id);
    } catch (error) {
      console.error(`❌ Failed to learn answer for ${id}: ${describeError(error)}`);
    }

    try {
      await this.notifications.notifyCaller(request.callerContact, buildCallerFollowUp(request.question, answer));
    } catch (error) {
      console.error(`❌ Caller follow-up failed for ${id}: ${describeError(error)}`);
    }

    return { ok: true, request: resolved, knowledgeEntryId };
  }

  /**
   * Time out every pending request older than `maxAgeHours` and return the
   * ids that were transitioned. A failed update is logged and the sweep
   * moves on to the next request.
   *
   * @throws UpstreamUnavailableError when the pending list cannot be read
   */
  async timeoutStale(maxAgeHours: number): Promise<string[]> {
    const now = this.now();
    const cutoff = now.getTime() - maxAgeHours * MS_PER_HOUR;
    const resolvedAt = now.toISOString();

    const pending = await this.withStore('list pending help requests', () => this.store.listPending());
    const timedOut: string[] = [];
    for (const request of pending) {
      if (Date.parse(request.createdAt) >= cutoff) {
        continue;
      }
      try {
        if (await this.store.updateHelpRequestTimeout(request.id, resolvedAt)) {
          timedOut.push(request.id);
        }
      } catch (error) {
        console.error(`❌ Failed to time out help request ${request.id}: ${describeError(error)}`);
      }
    }

    if (timedOut.length > 0) {
      console.log(`⏰ Timed out ${timedOut.length} help request(s) older than ${maxAgeHours}h`);
    }
    return timedOut;
  }

  /**
   * Aggregate over the most recent requests
   */
  async stats(): Promise<HelpRequestStats> {
    const requests = await this.store.listRecent(this.statsWindow);

    let pending = 0;
    let timeout = 0;
    const resolutionMinutes: number[] = [];

    for (const request of requests) {
      switch (request.status) {
        case 'pending':
          pending++;
          break;
        case 'timeout':
          timeout++;
          break;
        case 'resolved':
          resolutionMinutes.push((Date.parse(request.resolvedAt) - Date.parse(request.createdAt)) / MS_PER_MINUTE);
          break;
      }
    }

    const total = requests.length;
    const resolved = resolutionMinutes.length;
    const avgResolutionMinutes = resolved === 0
      ? 0
      : roundToTenth(resolutionMinutes.reduce((sum, minutes) => sum + minutes, 0) / resolved);
    const resolutionRatePct = total === 0 ? 0 : roundToTenth((resolved / total) * 100);

    return { total, pending, resolved, timeout, avgResolutionMinutes, resolutionRatePct };
  }

  async get(id: string): Promise<HelpRequest | undefined> {
    return this.store.getHelpRequest(id);
  }

  async listPending(): Promise<HelpRequest[]> {
    return this.store.listPending();
  }

  async listRecent(limit = 50): Promise<HelpRequest[]> {
    return this.store.listRecent(limit);
  }

  private failure(reason: ResolveFailureReason, error: DeskError): ResolveOutcome {
    console.warn(`⚠️  ${error.message}`);
    return { ok: false, reason, message: error.message };
  }

  private async withStore<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new UpstreamUnavailableError(`Failed to ${action}: ${describeError(error)}`, { cause: error });
    }
  }
}
