import { z } from 'zod';

// Knowledge entry source
export const KnowledgeSourceSchema = z.enum(['supervisor', 'seed']);
export type KnowledgeSource = z.infer<typeof KnowledgeSourceSchema>;

// Knowledge entry schema (learned Q&A)
export const KnowledgeEntrySchema = z.object({
  id: z.string(),
  question: z.string(),
  answer: z.string(),
  source: KnowledgeSourceSchema,
  helpRequestId: z.string().optional(),
  createdAt: z.string(), // ISO8601
  updatedAt: z.string(), // ISO8601
  usageCount: z.number().int().nonnegative(),
});

export type KnowledgeEntry = z.infer<typeof KnowledgeEntrySchema>;

// Entry as handed to the store, before an id is assigned
export type KnowledgeEntryDraft = Omit<KnowledgeEntry, 'id'>;

// Seed file entries
export const SeedKnowledgeSchema = z.array(z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
}));

export type SeedKnowledge = z.infer<typeof SeedKnowledgeSchema>;

// Help request status
export const HelpRequestStatusSchema = z.enum(['pending', 'resolved', 'timeout']);
export type HelpRequestStatus = z.infer<typeof HelpRequestStatusSchema>;

const HelpRequestBaseSchema = z.object({
  id: z.string(),
  callerId: z.string(),
  callerContact: z.string(),
  question: z.string(),
  context: z.string().optional(), // last N turns, rendered
  createdAt: z.string(),
});

export const PendingHelpRequestSchema = HelpRequestBaseSchema.extend({
  status: z.literal('pending'),
});

export const ResolvedHelpRequestSchema = HelpRequestBaseSchema.extend({
  status: z.literal('resolved'),
  resolvedAt: z.string(),
  supervisorAnswer: z.string(),
  supervisorName: z.string(),
});

export const TimedOutHelpRequestSchema = HelpRequestBaseSchema.extend({
  status: z.literal('timeout'),
  resolvedAt: z.string(),
});

/**
 * A help request is pending, resolved or timed out. Resolution data only
 * exists on the resolved variant; the timeout variant carries `resolvedAt`
 * alone.
 */
export const HelpRequestSchema = z.discriminatedUnion('status', [
  PendingHelpRequestSchema,
  ResolvedHelpRequestSchema,
  TimedOutHelpRequestSchema,
]);

export type PendingHelpRequest = z.infer<typeof PendingHelpRequestSchema>;
export type ResolvedHelpRequest = z.infer<typeof ResolvedHelpRequestSchema>;
export type TimedOutHelpRequest = z.infer<typeof TimedOutHelpRequestSchema>;
export type HelpRequest = z.infer<typeof HelpRequestSchema>;

export type HelpRequestDraft = Omit<PendingHelpRequest, 'id'>;

// Call record (one per conversation)
export const CallRecordSchema = z.object({
  id: z.string(),
  callerId: z.string(),
  callerContact: z.string(),
  startedAt: z.string(),
  endedAt: z.string().optional(),
  transcript: z.string().optional(),
  helpRequestIds: z.array(z.string()),
  resolvedByAi: z.boolean(),
});

export type CallRecord = z.infer<typeof CallRecordSchema>;
export type CallRecordDraft = Omit<CallRecord, 'id'>;

// Conversation turns
export const TurnRoleSchema = z.enum(['user', 'assistant']);
export type TurnRole = z.infer<typeof TurnRoleSchema>;

export interface ConversationTurn {
  role: TurnRole;
  text: string;
}

// Inbound call events, consumed in order by ConversationSession
export type CallEvent =
  | { type: 'utterance'; role: TurnRole; text: string }
  | { type: 'end' };

// Aggregate over recent help requests
export interface HelpRequestStats {
  total: number;
  pending: number;
  resolved: number;
  timeout: number;
  avgResolutionMinutes: number;
  resolutionRatePct: number;
}

// Event schemas for EventBridge
export const SupervisorAlertEventSchema = z.object({
  source: z.literal('deskloop.escalation'),
  'detail-type': z.literal('supervisor.alert.created'),
  detail: z.object({
    requestId: z.string(),
    message: z.string(),
    dashboardUrl: z.string().optional(),
    timestamp: z.string(),
  }),
});

export const CallerFollowUpEventSchema = z.object({
  source: z.literal('deskloop.escalation'),
  'detail-type': z.literal('caller.followup.created'),
  detail: z.object({
    to: z.string(),
    message: z.string(),
    timestamp: z.string(),
  }),
});

export type SupervisorAlertEvent = z.infer<typeof SupervisorAlertEventSchema>;
export type CallerFollowUpEvent = z.infer<typeof CallerFollowUpEventSchema>;

// Business facts rendered into the system prompt
export interface BusinessInfo {
  name: string;
  hours: string;
  phone: string;
  services: string;
  pricing: string;
  location: string;
}

// Environment configuration
export interface RuntimeConfig {
  awsRegion: string;
  dynamodbEndpoint?: string; // for local development
  helpRequestsTable: string;
  knowledgeTable: string;
  callRecordsTable: string;
  bedrockModelId: string;
  classifierModelId?: string;
  outboundEventBusName?: string;
  dashboardUrl?: string;
  historyLimit: number;
  escalationContextTurns: number;
  promptKnowledgeLimit: number;
  helpRequestTimeoutHours: number;
  statsWindow: number;
  maxCallDurationMs: number;
  business: BusinessInfo;
}
