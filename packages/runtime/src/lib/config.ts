import { z } from 'zod';
import type { RuntimeConfig } from '../types/index.js';

// Blank values count as unset
const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const EnvSchema = z.object({
  AWS_REGION: z.string().default('us-east-1'),
  DYNAMODB_ENDPOINT: optionalString,
  HELP_REQUESTS_TABLE: z.string().default('Deskloop-help-requests'),
  KNOWLEDGE_TABLE: z.string().default('Deskloop-knowledge'),
  CALL_RECORDS_TABLE: z.string().default('Deskloop-call-records'),
  BEDROCK_MODEL_ID: z.string().default('anthropic.claude-3-haiku-20240307-v1:0'),
  CLASSIFIER_MODEL_ID: optionalString,
  OUTBOUND_EVENT_BUS_NAME: optionalString,
  DASHBOARD_URL: optionalString,
  HISTORY_LIMIT: z.coerce.number().int().positive().default(10),
  ESCALATION_CONTEXT_TURNS: z.coerce.number().int().positive().default(5),
  PROMPT_KNOWLEDGE_LIMIT: z.coerce.number().int().positive().default(10),
  HELP_REQUEST_TIMEOUT_HOURS: z.coerce.number().positive().default(24),
  STATS_WINDOW: z.coerce.number().int().positive().default(1000),
  MAX_CALL_DURATION_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  BUSINESS_NAME: z.string().default('Luxe Hair Salon'),
  BUSINESS_HOURS: z.string().default('Monday-Saturday 9AM-7PM, Closed Sundays'),
  BUSINESS_PHONE: z.string().default('+1-555-123-4567'),
  BUSINESS_SERVICES: z.string().default('Haircuts, Coloring, Styling, Extensions, Treatments'),
  BUSINESS_PRICING: z.string().default('Haircuts from $45, Coloring from $80, Styling from $35'),
  BUSINESS_LOCATION: z.string().default('123 Main Street, Downtown'),
});

/**
 * Load runtime configuration from environment variables
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid runtime configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    awsRegion: vars.AWS_REGION,
    dynamodbEndpoint: vars.DYNAMODB_ENDPOINT,
    helpRequestsTable: vars.HELP_REQUESTS_TABLE,
    knowledgeTable: vars.KNOWLEDGE_TABLE,
    callRecordsTable: vars.CALL_RECORDS_TABLE,
    bedrockModelId: vars.BEDROCK_MODEL_ID,
    classifierModelId: vars.CLASSIFIER_MODEL_ID,
    outboundEventBusName: vars.OUTBOUND_EVENT_BUS_NAME,
    dashboardUrl: vars.DASHBOARD_URL,
    historyLimit: vars.HISTORY_LIMIT,
    escalationContextTurns: vars.ESCALATION_CONTEXT_TURNS,
    promptKnowledgeLimit: vars.PROMPT_KNOWLEDGE_LIMIT,
    helpRequestTimeoutHours: vars.HELP_REQUEST_TIMEOUT_HOURS,
    statsWindow: vars.STATS_WINDOW,
    maxCallDurationMs: vars.MAX_CALL_DURATION_MS,
    business: {
      name: vars.BUSINESS_NAME,
      hours: vars.BUSINESS_HOURS,
      phone: vars.BUSINESS_PHONE,
      services: vars.BUSINESS_SERVICES,
      pricing: vars.BUSINESS_PRICING,
      location: vars.BUSINESS_LOCATION,
    },
  };
}

/**
 * Validate runtime configuration for the DynamoDB-backed deployment
 */
export function validateRuntimeConfig(config: RuntimeConfig): void {
  const required: Array<keyof RuntimeConfig> = [
    'awsRegion',
    'helpRequestsTable',
    'knowledgeTable',
    'callRecordsTable',
    'bedrockModelId',
  ];

  const missing = required.filter(key => !config[key]);
  if (missing.length > 0) {
    throw new Error(`Missing required configuration: ${missing.join(', ')}`);
  }

  if (config.escalationContextTurns > config.historyLimit) {
    console.warn(`⚠️  ESCALATION_CONTEXT_TURNS (${config.escalationContextTurns}) exceeds HISTORY_LIMIT (${config.historyLimit})`);
  }
}

/**
 * Create a test configuration for local development
 */
export function createTestConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    ...loadRuntimeConfig({}),
    awsRegion: 'us-east-1',
    helpRequestsTable: 'test-help-requests',
    knowledgeTable: 'test-knowledge',
    callRecordsTable: 'test-call-records',
    ...overrides,
  };
}
