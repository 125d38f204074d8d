/**
 * Telegram bot commands and inline-button callbacks, run against a real
 * engine. Nothing is sent: only the reply text is checked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { RawAlert } from '../engine/deduplicator.js';

vi.mock('../config.js', () => ({
  config: {
    telegramBotToken: '',
    telegramChatId: '1000',
    telegramPollingInterval: 2000,
    telegramListenerEnabled: false,
  },
}));

import { RemediationEngine } from '../engine/engine.js';
import {
  createCallbackHandler,
  createCommandHandler,
  splitMessage,
  type CallbackHandler,
  type CommandHandler,
} from '../services/telegram-listener.js';
import { FakeClock, fakeCollaborator } from './helpers.js';

function alert(name: string, fingerprint: string, extraLabels: Record<string, string> = {}): RawAlert {
  return {
    labels: { alertname: name, instance: 'web1', severity: 'warning', ...extraLabels },
    fingerprint,
  };
}

describe('Telegram commands', () => {
  let engine: RemediationEngine;
  let command: CommandHandler;
  let callback: CallbackHandler;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    engine = new RemediationEngine({ collaborator: fakeCollaborator(), clock: new FakeClock().read });
    command = createCommandHandler(engine);
    callback = createCallbackHandler(engine);

    await engine.ingestAlerts([
      alert('HighLatency', 'fp-ab-1'),
      alert('HighLatency', 'fp-ab-2'),
      alert('ServiceDown', 'fp-svc-0001', { service: 'nginx' }),
    ]);
    await engine.whenIdle();
  });

  afterEach(async () => {
    await engine.whenIdle();
    vi.restoreAllMocks();
  });

  it('shows help, with or without the bot name', async () => {
    expect((await command('/help', 'ops')).split('\n')[0]).toBe('🛠️ Remediation bot');
    expect(await command('/help@warden_bot', 'ops')).toBe(await command('/start', 'ops'));
  });

  it('lists issues and stats', async () => {
    expect(await command('/issues', 'ops')).toBe(
      [
        '🟠 fp-ab-1 HighLatency on web1 [FIRING]',
        '🟠 fp-ab-2 HighLatency on web1 [FIRING]',
        '🟠 fp-svc-0 ServiceDown on web1 [FIRING]',
      ].join('\n'),
    );
    const stats = (await command('/stats', 'ops')).split('\n');
    expect(stats[1]).toBe('Active issues: 3 (firing 3, acked 0, silenced 0)');
    expect(stats[6]).toBe('Require approval: off');
  });

  it('acknowledges by exact id or unique prefix', async () => {
    expect(await command('/ack', 'ops')).toBe('Usage: /ack <id>');
    expect(await command('/ack zzz', 'ops')).toBe('No active issue matches "zzz"');
    expect(await command('/ack fp-ab', 'ops')).toBe('"fp-ab" matches 2 issues; use a longer id');
    expect(await command('/ack fp-ab-1', 'ops')).toBe('👀 Acknowledged HighLatency on web1');
    expect(await command('/ack fp-ab-1', 'ops')).toBe('Issue fp-ab-1 is not firing (status ACKNOWLEDGED)');
    expect(engine.dedup.get('fp-ab-1')?.acknowledgedBy).toBe('ops');
  });

  it('silences with a default or given duration', async () => {
    expect(await command('/silence', 'ops')).toBe('Usage: /silence <id> [minutes]');
    expect(await command('/silence fp-ab-2 soon', 'ops')).toBe('Minutes must be a positive whole number');
    expect(await command('/silence fp-ab-2 15', 'ops')).toBe('🔕 Silenced HighLatency on web1 for 15m');
    expect(await command('/silence fp-ab-1', 'ops')).toBe('🔕 Silenced HighLatency on web1 for 60m');
  });

  it('approves and lists the resulting action', async () => {
    expect(await command('/actions', 'ops')).toBe('No remediation actions recorded.');
    expect(await command('/approve', 'ops')).toBe('Usage: /approve <id>');

    expect(await command('/approve fp-svc', 'ops')).toBe('Approved; running Restart service nginx on web1');
    await engine.whenIdle();

    expect(await command('/actions 5', 'ops')).toMatch(
      /^[0-9a-f]{8} service_restart service:web1:nginx \[SUCCESS\] - done$/,
    );
  });

  it('rejects by id and reports unknown ids', async () => {
    expect(await command('/reject nope', 'ops')).toBe('No pending approval matches "nope" (not found or expired)');
    expect(await command('/reject fp-svc-0001', 'ops')).toBe('Rejected Restart service nginx on web1');
  });

  it('reports predictions and health', async () => {
    expect(await command('/predictions', 'ops')).toBe('🔮 No predicted issues.');
    const report = (await command('/report', 'ops')).split('\n');
    expect(report[0]).toBe('🩺 Health report');
    expect(report[3]).toBe('Pending approvals: 1');
  });

  it('hints at /help for unknown commands', async () => {
    expect(await command('/reboot now', 'ops')).toBe('Unknown command /reboot. Type /help for the list.');
  });

  it('handles approval buttons', () => {
    expect(callback('delete:fp-svc-0001', 'ops')).toBe('Unknown action');
    expect(callback('approve', 'ops')).toBe('Unknown action');
    expect(callback('reject:fp-svc-0001', 'ops')).toBe('Rejected Restart service nginx on web1');
    expect(callback('approve:fp-svc-0001', 'ops')).toBe('No pending approval matches "fp-svc-0001" (not found or expired)');
  });
});

describe('splitMessage', () => {
  it('keeps short messages whole', () => {
    expect(splitMessage('short', 10)).toEqual(['short']);
  });

  it('prefers line breaks', () => {
    expect(splitMessage('aaaa\nbbbb\ncccc', 10)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('hard-splits text without break points', () => {
    expect(splitMessage('x'.repeat(25), 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });
});
