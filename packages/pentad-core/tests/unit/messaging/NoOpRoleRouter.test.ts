/**
 * Unit tests for offline messaging
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NoOpRoleRouter } from '../../../src/messaging/NoOpRoleRouter.js';
import { NoOpMessageBus } from '../../../src/messaging/NoOpMessageBus.js';
import { RecordingLogger } from '../../mocks/RecordingLogger.js';

describe('NoOpRoleRouter', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('should log sends and report success', () => {
    const router = new NoOpRoleRouter('governor', logger);

    expect(router.sendActivity('startup', { a: 1 })).toBe(true);
    expect(router.sendProtocolUpdate('pattern_detected', {})).toBe(true);

    expect(logger.entries).toEqual([
      { level: 'info', message: '[OFFLINE] Activity: governor.activity.startup', meta: { data: { a: 1 } } },
      { level: 'info', message: '[OFFLINE] Protocol update: protocol.pattern_detected', meta: { data: {} } },
    ]);
  });

  it('should warn about a forbidden send but still report success', () => {
    const router = new NoOpRoleRouter('fixer', logger);

    expect(router.sendFeatureInsight('x', {})).toBe(true);
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'Only insight can publish to feature.insights',
        meta: { role: 'fixer', exchange: 'feature.insights' },
      },
      { level: 'info', message: '[OFFLINE] Feature insight: feature.x', meta: { data: {} } },
    ]);
  });

  it('should accept listeners without attaching them', async () => {
    const router = new NoOpRoleRouter('insight', logger);

    expect(await router.listenOnRoleQueue(() => undefined)).toBe(true);
    expect(logger.messages('info')).toEqual(['[OFFLINE] Listening on insight.code-changes disabled']);
  });

  it('should still enforce listen permissions', async () => {
    const router = new NoOpRoleRouter('auditor', logger);

    expect(await router.listenForProtocolUpdates(() => undefined)).toBe(false);
  });

  it('should return at once from startConsuming and close', async () => {
    const router = new NoOpRoleRouter('fixer', logger);

    await expect(router.startConsuming('blocking')).resolves.toBeUndefined();
    await expect(router.close()).resolves.toBeUndefined();
    expect(router.online).toBe(false);
  });
});

describe('NoOpMessageBus', () => {
  it('should refuse every operation deterministically', async () => {
    const bus = new NoOpMessageBus();

    expect(await bus.connect()).toBe('disconnected');
    expect(bus.isConnected()).toBe(false);
    expect(await bus.declareTopology()).toBe(false);
    expect(await bus.declareQueue({ queue: 'q', bindings: [] })).toBe(false);
    expect(bus.publish('agent.activities', 'fixer.activity.x', {}, 'fixer')).toBe(false);
    expect(bus.subscribe('q', () => undefined, 'fixer')).toBe(false);
  });

  it('should log dropped messages at debug', () => {
    const logger = new RecordingLogger();
    new NoOpMessageBus(logger).publish('code.changes', 'fixer.code.x', {}, 'fixer');

    expect(logger.entries).toEqual([
      { level: 'debug', message: 'Message dropped, bus is offline', meta: { routingKey: 'fixer.code.x' } },
    ]);
  });
});
