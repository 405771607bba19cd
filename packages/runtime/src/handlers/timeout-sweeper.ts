import type { ScheduledEvent } from 'aws-lambda';
import { loadRuntimeConfig, validateRuntimeConfig } from '../lib/config.js';
import { createDeskRuntime } from '../lib/runtime.js';

/**
 * Lambda handler for the scheduled stale-request sweep.
 * Triggered by an EventBridge schedule rule.
 */
export async function handler(event: ScheduledEvent): Promise<{ timedOut: string[] }> {
  console.log(`⏰ Timeout sweep triggered at ${event.time}`);

  const config = loadRuntimeConfig();
  validateRuntimeConfig(config);

  const runtime = createDeskRuntime(config);
  const timedOut = await runtime.lifecycle.timeoutStale(config.helpRequestTimeoutHours);

  console.log(`⏰ Sweep complete: ${timedOut.length} request(s) timed out`);
  return { timedOut };
}
