/**
 * Property 6: Structured Logging and Masking
 *
 * For any log entry, the logger SHALL emit the service name, level and
 * correlation id, and SHALL mask email addresses, bearer tokens, credential
 * assignments and sensitive metadata fields before anything is stored or
 * forwarded.
 *
 * @file src/backend/shared/src/logging/logger.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  InMemoryTelemetryClient,
  LogEntrySchema,
  LogLevel,
  createLogger,
  getLogger,
  isSensitiveFieldName,
  maskSensitiveObject,
  maskSensitiveString,
  resetLogger,
  setLogger,
} from '../../src/backend/shared/src/logging/logger.js';

// Property test configuration
const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const validEmail = fc
  .tuple(
    fc.stringOf(fc.constantFrom(...'abcdefghijklmnopqrstuvwxyz0123456789'.split('')), {
      minLength: 1,
      maxLength: 10,
    }),
    fc.stringOf(fc.constantFrom(...'abcdefghijklmnopqrstuvwxyz'.split('')), { minLength: 2, maxLength: 10 }),
    fc.constantFrom('com', 'org', 'net', 'io', 'dev')
  )
  .map(([local, domain, tld]) => `${local}@${domain}.${tld}`);

const plainWordArb = fc.constantFrom('deploy', 'docker', 'then', 'run', 'tests', 'fix', 'the', 'bug');

const plainTextArb = fc.array(plainWordArb, { minLength: 1, maxLength: 6 }).map((words) => words.join(' '));

function quietLogger(options: Parameters<typeof createLogger>[0] = {}) {
  return createLogger({ enableConsole: false, ...options });
}

describe('Property 6: Structured Logging and Masking', () => {
  describe('string masking', () => {
    it('should mask any email address embedded in text', () => {
      fc.assert(
        fc.property(plainTextArb, validEmail, plainTextArb, (before, email, after) => {
          const masked = maskSensitiveString(`${before} ${email} ${after}`);

          expect(masked).toBe(`${before} [EMAIL_MASKED] ${after}`);
        }),
        propertyConfig
      );
    });

    it('should leave text without sensitive values unchanged', () => {
      fc.assert(
        fc.property(plainTextArb, (text) => {
          expect(maskSensitiveString(text)).toBe(text);
        }),
        propertyConfig
      );
    });

    it('should mask bearer tokens and credential assignments', () => {
      expect(maskSensitiveString('call with Bearer test-token-123 please')).toBe(
        'call with Bearer [TOKEN_MASKED] please'
      );
      expect(maskSensitiveString('set api_key=test-secret and retry')).toBe(
        'set api_key=[SECRET_MASKED] and retry'
      );
      expect(maskSensitiveString('password: hunter2')).toBe('password=[SECRET_MASKED]');
    });
  });

  describe('object masking', () => {
    it('should recognise sensitive field names regardless of case', () => {
      expect(isSensitiveFieldName('password')).toBe(true);
      expect(isSensitiveFieldName('API_TOKEN')).toBe(true);
      expect(isSensitiveFieldName('apiKey')).toBe(true);
      expect(isSensitiveFieldName('classifier')).toBe(false);
    });

    it('should mask sensitive fields and strings in nested values', () => {
      expect(
        maskSensitiveObject({
          classifier: 'complexity',
          token: 'test-secret',
          request: { text: 'mail dev@example.com', tags: ['Bearer abc'] },
          confidence: 0.9,
        })
      ).toEqual({
        classifier: 'complexity',
        token: '[MASKED]',
        request: { text: 'mail [EMAIL_MASKED]', tags: ['Bearer [TOKEN_MASKED]'] },
        confidence: 0.9,
      });
    });
  });

  describe('logger', () => {
    it('should produce schema-valid entries for every level at or above the minimum', () => {
      const logger = quietLogger({ minLevel: LogLevel.DEBUG });

      logger.debug('debug message');
      logger.info('info message', { classifier: 'intent' });
      logger.warn('warn message');
      logger.error('error message', new Error('boom'));

      const entries = logger.getLogEntries();
      expect(entries.map((entry) => entry.level)).toEqual(['debug', 'info', 'warn', 'error']);
      entries.forEach((entry) => {
        expect(LogEntrySchema.safeParse(entry).success).toBe(true);
        expect(entry.service).toBe('classifier-runtime');
      });
      expect(entries[3].error?.message).toBe('boom');
    });

    it('should drop entries below the minimum level', () => {
      const logger = quietLogger({ minLevel: LogLevel.WARN });

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');

      expect(logger.isLevelEnabled('debug')).toBe(false);
      expect(logger.isLevelEnabled('error')).toBe(true);
      expect(logger.getLogEntries().map((entry) => entry.message)).toEqual(['shown']);
    });

    it('should mask messages and metadata before storing them', () => {
      const logger = quietLogger();

      logger.info('Classifying text from dev@example.com', { secret: 'test-secret', text: 'token=abc' });

      const [entry] = logger.getLogEntries();
      expect(entry.message).toBe('Classifying text from [EMAIL_MASKED]');
      expect(entry.metadata).toEqual({ secret: '[MASKED]', text: 'token=[SECRET_MASKED]' });
    });

    it('should keep values when masking is disabled', () => {
      const logger = quietLogger({ maskSensitive: false });

      logger.info('from dev@example.com');

      expect(logger.getLogEntries()[0].message).toBe('from dev@example.com');
    });

    it('should tag child entries with the correlation id and share the entry list', () => {
      fc.assert(
        fc.property(fc.uuid(), (correlationId) => {
          const logger = quietLogger();
          const child = logger.child(correlationId);

          child.info('child entry');
          logger.info('parent entry');

          const entries = logger.getLogEntries();
          expect(child.getCorrelationId()).toBe(correlationId);
          expect(entries.map((entry) => entry.correlationId)).toEqual([correlationId, undefined]);
        }),
        propertyConfig
      );
    });

    it('should forward traces and exceptions to the telemetry client', () => {
      const telemetry = new InMemoryTelemetryClient();
      const logger = quietLogger({ telemetryClient: telemetry });
      logger.setCorrelationId('req-1');

      logger.warn('Low confidence', { classifier: 'intent' });
      logger.error('Artifact rejected', new Error('bad shape'));
      logger.flush();

      expect(telemetry.traces).toEqual([
        {
          message: 'Low confidence',
          severity: 2,
          properties: {
            service: 'classifier-runtime',
            correlationId: 'req-1',
            metadata: '{"classifier":"intent"}',
          },
        },
      ]);
      expect(telemetry.exceptions).toHaveLength(1);
      expect(telemetry.exceptions[0].exception.message).toBe('bad shape');
      expect(telemetry.flushCount).toBe(1);
    });

    it('should retain at most the configured number of recent entries', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 20 }), fc.integer({ min: 0, max: 60 }), (maxEntries, calls) => {
          const logger = quietLogger({ maxEntries });
          const child = logger.child('req-1');
          for (let i = 0; i < calls; i++) {
            (i % 2 === 0 ? logger : child).info(`entry ${i}`);
          }

          const entries = logger.getLogEntries();
          expect(entries).toHaveLength(Math.min(maxEntries, calls));
          expect(child.getLogEntries()).toEqual(entries);
          if (entries.length > 0) {
            expect(entries[entries.length - 1].message).toBe(`entry ${calls - 1}`);
          }
        }),
        propertyConfig
      );
    });

    it('should keep the default entry window bounded', () => {
      const logger = quietLogger({ minLevel: LogLevel.DEBUG });
      for (let i = 0; i < 2500; i++) {
        logger.debug('Text classified', { call: i });
      }

      const entries = logger.getLogEntries();
      expect(entries).toHaveLength(1000);
      expect(entries[0].metadata).toEqual({ call: 1500 });
    });

    it('should empty the entry list on clear', () => {
      const logger = quietLogger();
      logger.info('one');
      logger.clearLogEntries();

      expect(logger.getLogEntries()).toEqual([]);
    });
  });

  describe('global logger', () => {
    it('should serve the installed logger until reset', () => {
      const installed = quietLogger();
      setLogger(installed);

      expect(getLogger()).toBe(installed);

      resetLogger();
      const fresh = getLogger();
      expect(fresh).not.toBe(installed);
      expect(getLogger()).toBe(fresh);
      resetLogger();
    });
  });
});
