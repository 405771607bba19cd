import { createTestConfig, loadRuntimeConfig, validateRuntimeConfig } from './config.js';

describe('config', () => {
  describe('loadRuntimeConfig', () => {
    it('should apply defaults', () => {
      const config = loadRuntimeConfig({});

      expect(config.awsRegion).toBe('us-east-1');
      expect(config.helpRequestsTable).toBe('Deskloop-help-requests');
      expect(config.historyLimit).toBe(10);
      expect(config.escalationContextTurns).toBe(5);
      expect(config.helpRequestTimeoutHours).toBe(24);
      expect(config.statsWindow).toBe(1000);
      expect(config.maxCallDurationMs).toBe(3600000);
      expect(config.outboundEventBusName).toBeUndefined();
      expect(config.business.name).toBe('Luxe Hair Salon');
    });

    it('should read and coerce environment variables', () => {
      const config = loadRuntimeConfig({
        AWS_REGION: 'eu-west-1',
        HELP_REQUEST_TIMEOUT_HOURS: '0.5',
        HISTORY_LIMIT: '20',
        OUTBOUND_EVENT_BUS_NAME: 'desk-bus',
        BUSINESS_NAME: 'Corner Barbers',
      });

      expect(config.awsRegion).toBe('eu-west-1');
      expect(config.helpRequestTimeoutHours).toBe(0.5);
      expect(config.historyLimit).toBe(20);
      expect(config.outboundEventBusName).toBe('desk-bus');
      expect(config.business.name).toBe('Corner Barbers');
    });

    it('should treat blank optional values as unset', () => {
      expect(loadRuntimeConfig({ DASHBOARD_URL: '  ' }).dashboardUrl).toBeUndefined();
    });

    it('should reject invalid numbers', () => {
      expect(() => loadRuntimeConfig({ HISTORY_LIMIT: 'lots' }))
        .toThrow(/^Invalid runtime configuration: HISTORY_LIMIT: /);
    });
  });

  describe('validateRuntimeConfig', () => {
    it('should report missing table names', () => {
      expect(() => validateRuntimeConfig(createTestConfig({ knowledgeTable: '' })))
        .toThrow('Missing required configuration: knowledgeTable');
    });

    it('should warn when the escalation window exceeds the history limit', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      validateRuntimeConfig(createTestConfig({ historyLimit: 2, escalationContextTurns: 5 }));

      expect(warn).toHaveBeenCalledTimes(1);
      warn.mockRestore();
    });
  });
});
