import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import type { CallerFollowUpEvent, RuntimeConfig, SupervisorAlertEvent } from '../types/index.js';

/**
 * Outbound notifications. Implementations may throw; the help-request
 * lifecycle logs and swallows delivery failures.
 */
export interface NotificationChannel {
  notifySupervisor(message: string, requestId: string): Promise<void>;
  notifyCaller(contact: string, message: string): Promise<void>;
}

export type NotificationRecord =
  | { kind: 'supervisor'; requestId: string; message: string; sentAt: string }
  | { kind: 'caller'; to: string; message: string; sentAt: string };

/**
 * Prints notifications to the console and keeps them in an in-process log
 */
export class ConsoleNotificationChannel implements NotificationChannel {
  private records: NotificationRecord[] = [];

  async notifySupervisor(message: string, requestId: string): Promise<void> {
    console.log('\n' + '='.repeat(60));
    console.log(`📱 SUPERVISOR NOTIFICATION (request ${requestId})`);
    console.log('='.repeat(60));
    console.log(message);
    console.log('='.repeat(60) + '\n');

    this.records.push({ kind: 'supervisor', requestId, message, sentAt: new Date().toISOString() });
  }

  async notifyCaller(contact: string, message: string): Promise<void> {
    console.log('\n' + '='.repeat(60));
    console.log(`📤 SMS TO ${contact}`);
    console.log('='.repeat(60));
    console.log(message);
    console.log('='.repeat(60) + '\n');

    this.records.push({ kind: 'caller', to: contact, message, sentAt: new Date().toISOString() });
  }

  /**
   * Notifications sent so far, oldest first
   */
  log(): ReadonlyArray<NotificationRecord> {
    return [...this.records];
  }
}

/**
 * Publishes supervisor alerts and caller follow-ups to the outbound
 * EventBridge bus, where SMS/chat delivery is wired up.
 */
export class EventBridgeNotificationChannel implements NotificationChannel {
  private client: EventBridgeClient;
  private config: RuntimeConfig;

  constructor(config: RuntimeConfig) {
    this.config = config;
    this.client = new EventBridgeClient({
      region: config.awsRegion,
    });
  }

  async notifySupervisor(message: string, requestId: string): Promise<void> {
    const event: SupervisorAlertEvent = {
      source: 'deskloop.escalation',
      'detail-type': 'supervisor.alert.created',
      detail: {
        requestId,
        message,
        dashboardUrl: this.config.dashboardUrl,
        timestamp: new Date().toISOString(),
      },
    };
    await this.publishEvent(event);
  }

  async notifyCaller(contact: string, message: string): Promise<void> {
    const event: CallerFollowUpEvent = {
      source: 'deskloop.escalation',
      'detail-type': 'caller.followup.created',
      detail: {
        to: contact,
        message,
        timestamp: new Date().toISOString(),
      },
    };
    await this.publishEvent(event);
  }

  private async publishEvent(event: SupervisorAlertEvent | CallerFollowUpEvent): Promise<void> {
    const eventBusName = this.config.outboundEventBusName;

    if (!eventBusName) {
      console.warn('⚠️  No EventBridge bus configured, skipping event publication');
      console.warn('   Event would have been:', event);
      return;
    }

    const result = await this.client.send(new PutEventsCommand({
      Entries: [{
        Source: event.source,
        DetailType: event['detail-type'],
        Detail: JSON.stringify(event.detail),
        EventBusName: eventBusName,
      }],
    }));

    if (result.FailedEntryCount) {
      const reason = result.Entries?.[0]?.ErrorMessage ?? 'unknown error';
      throw new Error(`Failed to publish ${event['detail-type']}: ${reason}`);
    }

    console.log(`📤 Event published: ${event['detail-type']}`);
  }
}
