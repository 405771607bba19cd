import { ConsoleNotificationChannel, EventBridgeNotificationChannel } from './notifications.js';
import { createTestConfig } from './config.js';

jest.mock('@aws-sdk/client-eventbridge', () => {
  const mockSend = jest.fn();
  return {
    EventBridgeClient: jest.fn().mockImplementation(() => ({
      send: mockSend,
    })),
    PutEventsCommand: jest.fn().mockImplementation((params) => params),
    __mockSend: mockSend,
  };
});

const { __mockSend: mockSend } = jest.requireMock<{ __mockSend: jest.Mock }>('@aws-sdk/client-eventbridge');

describe('notifications', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    mockSend.mockResolvedValue({ FailedEntryCount: 0, Entries: [{ EventId: 'evt-1' }] });
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  describe('ConsoleNotificationChannel', () => {
    it('should record notifications in order', async () => {
      const channel = new ConsoleNotificationChannel();

      await channel.notifySupervisor('help!', 'req-1');
      await channel.notifyCaller('+15550001111', 'here is your answer');

      const log = channel.log();
      expect(log).toHaveLength(2);
      expect(log[0]).toMatchObject({ kind: 'supervisor', requestId: 'req-1', message: 'help!' });
      expect(log[1]).toMatchObject({ kind: 'caller', to: '+15550001111', message: 'here is your answer' });
    });
  });

  describe('EventBridgeNotificationChannel', () => {
    it('should publish a supervisor alert', async () => {
      const channel = new EventBridgeNotificationChannel(createTestConfig({
        outboundEventBusName: 'test-bus',
        dashboardUrl: 'http://localhost:3000',
      }));

      await channel.notifySupervisor('help!', 'req-1');

      expect(mockSend).toHaveBeenCalledTimes(1);
      const entry = mockSend.mock.calls[0][0].Entries[0];
      expect(entry.Source).toBe('deskloop.escalation');
      expect(entry.DetailType).toBe('supervisor.alert.created');
      expect(entry.EventBusName).toBe('test-bus');

      const detail = JSON.parse(entry.Detail);
      expect(detail.requestId).toBe('req-1');
      expect(detail.message).toBe('help!');
      expect(detail.dashboardUrl).toBe('http://localhost:3000');
      expect(detail.timestamp).toBeDefined();
    });

    it('should publish a caller follow-up', async () => {
      const channel = new EventBridgeNotificationChannel(createTestConfig({ outboundEventBusName: 'test-bus' }));

      await channel.notifyCaller('+15550001111', 'answer');

      const entry = mockSend.mock.calls[0][0].Entries[0];
      expect(entry.DetailType).toBe('caller.followup.created');
      expect(JSON.parse(entry.Detail)).toMatchObject({ to: '+15550001111', message: 'answer' });
    });

    it('should skip publication without a bus', async () => {
      const channel = new EventBridgeNotificationChannel(createTestConfig());

      await channel.notifyCaller('+15550001111', 'answer');

      expect(mockSend).not.toHaveBeenCalled();
    });

    it('should throw when the entry is rejected', async () => {
      mockSend.mockResolvedValue({ FailedEntryCount: 1, Entries: [{ ErrorMessage: 'bus not found' }] });
      const channel = new EventBridgeNotificationChannel(createTestConfig({ outboundEventBusName: 'test-bus' }));

      await expect(channel.notifySupervisor('help!', 'req-1'))
        .rejects.toThrow('Failed to publish supervisor.alert.created: bus not found');
    });
  });
});
