import { ConversationContext } from './conversation-context.js';
import { KnowledgeLookupError, describeError } from './errors.js';
import type { HelpRequestLifecycle } from './help-request-service.js';
import type { KnowledgeIndex } from './knowledge-index.js';
import type { EscalationOracle } from './oracle.js';
import {
  ESCALATION_FAILURE_REPLY,
  ESCALATION_REPLY,
  GENERATION_FAILURE_REPLY,
  buildSystemPrompt,
  renderTurns,
} from './prompts.js';
import type { DeskStore } from './store.js';
import type { CallEvent, RuntimeConfig } from '../types/index.js';

export interface CallerInfo {
  callerId: string;
  callerContact: string;
}

export type SessionSettings = Pick<
  RuntimeConfig,
  'business' | 'historyLimit' | 'escalationContextTurns' | 'promptKnowledgeLimit' | 'maxCallDurationMs'
>;

export interface ConversationSessionOptions {
  call: CallerInfo;
  store: DeskStore;
  knowledge: KnowledgeIndex;
  lifecycle: HelpRequestLifecycle;
  oracle: EscalationOracle;
  settings: SessionSettings;
  now?: () => Date;
}

export type UtteranceOutcome =
  | { kind: 'knowledge_hit'; reply: string; knowledgeEntryId: string }
  | { kind: 'answered'; reply: string }
  | { kind: 'generation_failed'; reply: string }
  | { kind: 'escalated'; reply: string; helpRequestId: string }
  | { kind: 'escalation_failed'; reply: string };

export type SessionEndReason = 'stream_ended' | 'end_event' | 'max_duration';

export interface SessionSummary {
  callId: string;
  reason: SessionEndReason;
  turns: number;
  helpRequestIds: string[];
}

const DEADLINE = Symbol('deadline');

/**
 * One call: answers from learned knowledge first, then asks the oracle
 * whether the question is answerable, and escalates to a supervisor when it
 * is not (or when the oracle cannot be reached).
 */
export class ConversationSession {
  private call: CallerInfo;
  private store: DeskStore;
  private knowledge: KnowledgeIndex;
  private lifecycle: HelpRequestLifecycle;
  private oracle: EscalationOracle;
  private settings: SessionSettings;
  private now: () => Date;
  private context: ConversationContext | undefined;

  constructor(options: ConversationSessionOptions) {
    this.call = options.call;
    this.store = options.store;
    this.knowledge = options.knowledge;
    this.lifecycle = options.lifecycle;
    this.oracle = options.oracle;
    this.settings = options.settings;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create the call record. Returns the call id; repeated calls are no-ops.
   */
  async start(): Promise<string> {
    if (this.context) {
      return this.context.callId;
    }

    const startedAt = this.now().toISOString();
    const callId = await this.store.createCallRecord({
      callerId: this.call.callerId,
      callerContact: this.call.callerContact,
      startedAt,
      helpRequestIds: [],
      resolvedByAi: true,
    });

    this.context = new ConversationContext(callId, this.call.callerId, this.call.callerContact, startedAt);
    console.log(`📞 Call ${callId} started with ${this.call.callerContact}`);
    return callId;
  }

  async handleUtterance(text: string): Promise<UtteranceOutcome> {
    const context = this.activeContext();
    context.append('user', text);

    const outcome = await this.respond(context, text);
    // a reply that arrives after the duration cap ended the call is dropped
    if (!context.hasEnded) {
      context.append('assistant', outcome.reply);
    }
    return outcome;
  }

  /**
   * Consume call events in order until the stream ends, an `end` event
   * arrives or the call exceeds its maximum duration; then end the call.
   * The duration cap also applies while an utterance is being handled.
   */
  async run(events: AsyncIterable<CallEvent>): Promise<SessionSummary> {
    const callId = await this.start();
    const context = this.activeContext();
    const deadline = Date.now() + this.settings.maxCallDurationMs;
    const iterator = events[Symbol.asyncIterator]();

    let reason: SessionEndReason = 'stream_ended';
    try {
      while (true) {
        const next = await this.beforeDeadline(() => iterator.next(), deadline, 'next call event');
        if (next === DEADLINE) {
          reason = 'max_duration';
          break;
        }
        if (next.done) {
          break;
        }

        const event = next.value;
        if (event.type === 'end') {
          reason = 'end_event';
          break;
        }
        if (event.role !== 'user') {
          context.append('assistant', event.text);
          continue;
        }

        const handled = await this.beforeDeadline(() => this.handleUtterance(event.text), deadline, 'utterance');
        if (handled === DEADLINE) {
          reason = 'max_duration';
          break;
        }
      }
    } finally {
      await this.end();
    }

    if (reason === 'max_duration') {
      console.warn(`⏱️  Call ${callId} reached its maximum duration`);
      iterator.return?.().catch(error => {
        console.warn(`⚠️  Failed to close event stream for ${callId}: ${describeError(error)}`);
      });
    }

    return {
      callId,
      reason,
      turns: context.turns.length,
      helpRequestIds: [...context.helpRequestIds],
    };
  }

  /**
   * Persist the end timestamp and transcript. Pending help requests are left as they are.
   */
  async end(): Promise<void> {
    const context = this.context;
    if (!context || context.hasEnded) {
      return;
    }

    const endedAt = this.now().toISOString();
    context.end(endedAt);
    await this.store.endCallRecord(context.callId, endedAt, context.transcript());
    console.log(`📴 Call ${context.callId} ended (${context.turns.length} turns, ${context.helpRequestIds.length} escalations)`);
  }

  get callContext(): ConversationContext | undefined {
    return this.context;
  }

  private async respond(context: ConversationContext, question: string): Promise<UtteranceOutcome> {
    try {
      const entry = await this.knowledge.search(question);
      if (entry) {
        console.log(`💡 Answered from knowledge entry ${entry.id}`);
        return { kind: 'knowledge_hit', reply: entry.answer, knowledgeEntryId: entry.id };
      }
    } catch (error) {
      if (error instanceof KnowledgeLookupError) {
        console.warn(`⚠️  Knowledge lookup failed, treating as no match: ${describeError(error.cause)}`);
      } else {
        throw error;
      }
    }

    const systemContext = buildSystemPrompt(
      this.settings.business,
      this.knowledge.promptContext(this.settings.promptKnowledgeLimit)
    );

    let verdict: 'answerable' | 'escalate';
    try {
      verdict = await this.oracle.classify(systemContext, question);
    } catch (error) {
      console.warn(`⚠️  Escalation check failed, escalating: ${describeError(error)}`);
      verdict = 'escalate';
    }

    if (verdict === 'escalate') {
      return this.escalate(context, question);
    }

    try {
      const reply = await this.oracle.generate(systemContext, context.recent(this.settings.historyLimit));
      return { kind: 'answered', reply };
    } catch (error) {
      console.error(`❌ Response generation failed: ${describeError(error)}`);
      return { kind: 'generation_failed', reply: GENERATION_FAILURE_REPLY };
    }
  }

  private async escalate(context: ConversationContext, question: string): Promise<UtteranceOutcome> {
    let helpRequestId: string;
    try {
      helpRequestId = await this.lifecycle.create(
        context.callerId,
        context.callerContact,
        question,
        renderTurns(context.recent(this.settings.escalationContextTurns))
      );
    } catch (error) {
      console.error(`❌ Escalation failed for call ${context.callId}: ${describeError(error)}`);
      return { kind: 'escalation_failed', reply: ESCALATION_FAILURE_REPLY };
    }

    context.linkHelpRequest(helpRequestId);
    try {
      await this.store.linkHelpRequestToCall(context.callId, helpRequestId);
    } catch (error) {
      console.warn(`⚠️  Failed to link help request ${helpRequestId} to call ${context.callId}: ${describeError(error)}`);
    }

    return { kind: 'escalated', reply: ESCALATION_REPLY, helpRequestId };
  }

  private activeContext(): ConversationContext {
    if (!this.context) {
      throw new Error('Session has not been started');
    }
    if (this.context.hasEnded) {
      throw new Error(`Call ${this.context.callId} has ended`);
    }
    return this.context;
  }

  /**
   * Settle `work` or give up at the deadline. Abandoned work keeps running;
   * its late failure is logged.
   */
  private async beforeDeadline<T>(
    work: () => Promise<T>,
    deadline: number,
    label: string
  ): Promise<T | typeof DEADLINE> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return DEADLINE;
    }

    const pending = work();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<typeof DEADLINE>(resolve => {
      timer = setTimeout(() => resolve(DEADLINE), remaining);
    });

    try {
      const result = await Promise.race([pending, expired]);
      if (result === DEADLINE) {
        pending.catch(error => {
          console.warn(`⚠️  Abandoned ${label} failed after the call ended: ${describeError(error)}`);
        });
      }
      return result;
    } finally {
      clearTimeout(timer);
    }
  }
}
