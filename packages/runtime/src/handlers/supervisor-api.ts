import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { z } from 'zod';
import { loadRuntimeConfig, validateRuntimeConfig } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import type { ResolveFailureReason } from '../lib/help-request-service.js';
import { createDeskRuntime, type DeskRuntime } from '../lib/runtime.js';

export interface SupervisorApiRequest {
  method: string;
  path: string;
  query?: Record<string, string | undefined>;
  body?: string | null;
}

export interface SupervisorApiResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export const corsHeaders: Record<string, string> = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
};

const ResolveBodySchema = z.object({
  answer: z.string(),
  supervisorName: z.string().trim().min(1).optional(),
});

const LimitSchema = z.coerce.number().int().positive().max(1000).default(50);

const FAILURE_STATUS: Record<ResolveFailureReason, number> = {
  validation: 400,
  not_found: 404,
  invalid_transition: 409,
};

function ok(data: unknown, statusCode = 200): SupervisorApiResponse {
  return { statusCode, headers: corsHeaders, body: JSON.stringify({ success: true, data }) };
}

function fail(statusCode: number, message: string): SupervisorApiResponse {
  return { statusCode, headers: corsHeaders, body: JSON.stringify({ success: false, message }) };
}

function parseLimit(raw: string | undefined): number | undefined {
  const parsed = LimitSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function parseJson(body: string | null | undefined): unknown {
  if (!body) {
    return undefined;
  }
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Supervisor dashboard operations over plain request/response values; shared
 * by the Lambda handler and the CLI's local server.
 */
export async function routeSupervisorRequest(
  runtime: DeskRuntime,
  request: SupervisorApiRequest
): Promise<SupervisorApiResponse> {
  const method = request.method.toUpperCase();
  const segments = request.path.split('/').filter(Boolean);
  const query = request.query ?? {};

  if (method === 'OPTIONS') {
    return { statusCode: 204, headers: corsHeaders, body: '' };
  }
  if (segments[0] !== 'api') {
    return fail(404, `No route for ${method} ${request.path}`);
  }

  try {
    const [, resource, id, action] = segments;

    if (resource === 'requests') {
      if (method === 'GET' && id === 'pending' && !action) {
        return ok(await runtime.lifecycle.listPending());
      }
      if (method === 'GET' && !id) {
        const limit = parseLimit(query.limit);
        if (limit === undefined) {
          return fail(400, 'limit must be a positive integer up to 1000');
        }
        return ok(await runtime.lifecycle.listRecent(limit));
      }
      if (method === 'GET' && id && !action) {
        const helpRequest = await runtime.lifecycle.get(id);
        return helpRequest ? ok(helpRequest) : fail(404, `Help request ${id} not found`);
      }
      if (method === 'POST' && id && action === 'resolve') {
        const body = ResolveBodySchema.safeParse(parseJson(request.body));
        if (!body.success) {
          return fail(400, 'Body must be JSON with a string "answer"');
        }

        const outcome = await runtime.lifecycle.resolveRequest(id, body.data.answer, body.data.supervisorName);
        if (!outcome.ok) {
          return fail(FAILURE_STATUS[outcome.reason], outcome.message);
        }
        return ok({ request: outcome.request, knowledgeEntryId: outcome.knowledgeEntryId });
      }
    }

    if (resource === 'knowledge' && method === 'GET') {
      if (!id) {
        await runtime.knowledge.refresh();
        return ok(runtime.knowledge.entries());
      }
      if (id === 'search' && !action) {
        const q = query.q?.trim();
        if (!q) {
          return fail(400, 'Query parameter q is required');
        }
        return ok(await runtime.store.textSearchKnowledge(q));
      }
    }

    if (resource === 'stats' && method === 'GET' && !id) {
      await runtime.knowledge.refresh();
      const stats = await runtime.lifecycle.stats();
      return ok({ ...stats, knowledgeEntries: runtime.knowledge.entries().length });
    }

    if (resource === 'calls' && method === 'GET' && !id) {
      const limit = parseLimit(query.limit);
      if (limit === undefined) {
        return fail(400, 'limit must be a positive integer up to 1000');
      }
      return ok(await runtime.store.listRecentCalls(limit));
    }

    return fail(404, `No route for ${method} ${request.path}`);
  } catch (error) {
    console.error(`❌ Supervisor API ${method} ${request.path} failed:`, error);
    return fail(500, describeError(error));
  }
}

let cachedRuntime: DeskRuntime | undefined;

async function getRuntime(): Promise<DeskRuntime> {
  if (!cachedRuntime) {
    const config = loadRuntimeConfig();
    validateRuntimeConfig(config);
    cachedRuntime = createDeskRuntime(config);
  }
  return cachedRuntime;
}

/**
 * Lambda handler for the supervisor dashboard API (API Gateway HTTP API)
 */
export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> {
  console.log(`🧑‍💼 Supervisor API ${event.requestContext.http.method} ${event.rawPath}`);

  const body = event.body && event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;

  return routeSupervisorRequest(await getRuntime(), {
    method: event.requestContext.http.method,
    path: event.rawPath,
    query: event.queryStringParameters,
    body,
  });
}
