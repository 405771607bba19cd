import { renderTurns } from './prompts.js';
import type { ConversationTurn, TurnRole } from '../types/index.js';

/**
 * Per-call transcript state. Turns are append-only; the context is ended once
 * and never reopened.
 */
export class ConversationContext {
  readonly callId: string;
  readonly callerId: string;
  readonly callerContact: string;
  readonly startedAt: string;
  private turnLog: ConversationTurn[] = [];
  private linkedRequests: string[] = [];
  private endedAt: string | undefined;

  constructor(callId: string, callerId: string, callerContact: string, startedAt: string) {
    this.callId = callId;
    this.callerId = callerId;
    this.callerContact = callerContact;
    this.startedAt = startedAt;
  }

  append(role: TurnRole, text: string): void {
    if (this.endedAt) {
      throw new Error(`Call ${this.callId} has ended`);
    }
    this.turnLog.push({ role, text });
  }

  /**
   * The last `count` turns, oldest first
   */
  recent(count: number): ConversationTurn[] {
    return count > 0 ? this.turnLog.slice(-count) : [];
  }

  get turns(): ReadonlyArray<ConversationTurn> {
    return this.turnLog;
  }

  linkHelpRequest(requestId: string): void {
    this.linkedRequests.push(requestId);
  }

  get helpRequestIds(): ReadonlyArray<string> {
    return this.linkedRequests;
  }

  get hasEnded(): boolean {
    return this.endedAt !== undefined;
  }

  end(at: string): void {
    this.endedAt ??= at;
  }

  transcript(): string {
    return renderTurns(this.turnLog);
  }
}
