/**
 * Unit tests for alert normalization and the issue lifecycle.
 * Simulated clock, no I/O.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  Deduplicator,
  localFingerprint,
  normalizeAlert,
  type RawAlert,
} from '../engine/deduplicator.js';
import { IngestionError } from '../engine/errors.js';
import { MINUTE_MS } from '../engine/types.js';

const T0 = Date.UTC(2026, 0, 1, 12, 0, 0);

function alert(overrides: Partial<RawAlert> = {}): RawAlert {
  return {
    status: 'firing',
    labels: { alertname: 'ContainerDown', instance: 'nginx', severity: 'warning' },
    annotations: { summary: 'nginx is down' },
    fingerprint: 'fp-nginx-0001',
    ...overrides,
  };
}

describe('normalizeAlert', () => {
  it('maps an Alertmanager alert onto a sighting', () => {
    const sighting = normalizeAlert(
      alert({
        annotations: { description: 'Container nginx exited', summary: 'nginx is down' },
        startsAt: '2026-01-01T11:55:00Z',
      }),
    );

    expect(sighting.fingerprint).toBe('fp-nginx-0001');
    expect(sighting.issueType).toBe('container_stopped');
    expect(sighting.component).toBe('nginx');
    expect(sighting.severity).toBe('WARNING');
    expect(sighting.description).toBe('Container nginx exited');
    expect(sighting.firing).toBe(true);
    expect(sighting.observedAt).toBe(Date.UTC(2026, 0, 1, 11, 55, 0));
  });

  it('falls back to summary, then alert name, for the description', () => {
    expect(normalizeAlert(alert()).description).toBe('nginx is down');
    expect(normalizeAlert(alert({ annotations: {} })).description).toBe('ContainerDown');
  });

  it('derives a stable fingerprint when none is given', () => {
    const a = normalizeAlert(alert({ fingerprint: undefined }));
    const b = normalizeAlert(alert({ fingerprint: undefined }));
    expect(a.fingerprint).toMatch(/^[0-9a-f]{16}$/);
    expect(a.fingerprint).toBe(b.fingerprint);
  });

  it('uses the node label when instance is missing', () => {
    const sighting = normalizeAlert(alert({ labels: { alertname: 'HostDown', node: 'pve2' } }));
    expect(sighting.component).toBe('pve2');
    expect(sighting.issueType).toBe('host_down');
  });

  it('maps unknown alert names and severities', () => {
    const sighting = normalizeAlert(alert({ labels: { alertname: 'WeirdThing', severity: 'page-me' } }));
    expect(sighting.issueType).toBe('prometheus_weirdthing');
    expect(sighting.severity).toBe('INFO');
    expect(sighting.suggestedFix).toBe('Investigate WeirdThing alert');
    expect(sighting.component).toBe('unknown');
  });

  it('treats critical and error as CRITICAL', () => {
    expect(normalizeAlert(alert({ labels: { alertname: 'X', severity: 'critical' } })).severity).toBe('CRITICAL');
    expect(normalizeAlert(alert({ labels: { alertname: 'X', severity: 'ERROR' } })).severity).toBe('CRITICAL');
  });

  it('rejects alerts without an alertname', () => {
    expect(() => normalizeAlert({ labels: { instance: 'x' } })).toThrow(IngestionError);
    expect(() => normalizeAlert('not an alert')).toThrow(IngestionError);
  });
});

describe('Deduplicator', () => {
  let now: number;
  let dedup: Deduplicator;

  beforeEach(() => {
    now = T0;
    dedup = new Deduplicator({ clock: () => now, resolvedRetentionMs: 60 * MINUTE_MS });
  });

  it('creates one issue for repeated sightings of a fingerprint', async () => {
    const onNew = vi.fn();
    dedup.onNewIssue(onNew);

    const first = await dedup.ingest(alert());
    now += MINUTE_MS;
    const second = await dedup.ingest(alert({ annotations: { summary: 'still down' } }));

    expect(first.outcome).toBe('created');
    expect(second.outcome).toBe('updated');
    expect(onNew).toHaveBeenCalledTimes(1);
    expect(dedup.getActiveIssues()).toHaveLength(1);
    const issue = dedup.get('fp-nginx-0001');
    expect(issue?.description).toBe('still down');
    expect(issue?.startedAt).toBe(T0);
    expect(issue?.updatedAt).toBe(T0 + MINUTE_MS);
  });

  it('creates a single issue when the same alert arrives concurrently', async () => {
    const results = await Promise.all([dedup.ingest(alert()), dedup.ingest(alert()), dedup.ingest(alert())]);
    expect(results.map((r) => r.outcome)).toEqual(['created', 'updated', 'updated']);
    expect(dedup.getActiveIssues()).toHaveLength(1);
  });

  it('ignores a resolved alert for an unknown fingerprint', async () => {
    const result = await dedup.ingest(alert({ status: 'resolved' }));
    expect(result).toEqual({ outcome: 'ignored', issue: null });
    expect(dedup.getActiveIssues()).toHaveLength(0);
  });

  it('clears the acknowledgement when the issue resolves', async () => {
    const onResolved = vi.fn();
    dedup.onResolved(onResolved);
    await dedup.ingest(alert());
    await dedup.acknowledge('fp-nginx', 'alice');

    now += 5 * MINUTE_MS;
    const result = await dedup.ingest(alert({ status: 'resolved' }));

    expect(result.outcome).toBe('resolved');
    expect(result.issue?.status).toBe('RESOLVED');
    expect(result.issue?.resolvedAt).toBe(T0 + 5 * MINUTE_MS);
    expect(result.issue?.acknowledgedAt).toBeUndefined();
    expect(result.issue?.acknowledgedBy).toBeUndefined();
    expect(onResolved).toHaveBeenCalledTimes(1);
    expect(dedup.getActiveIssues()).toHaveLength(0);
  });

  it('opens a fresh issue when a resolved fingerprint fires again', async () => {
    await dedup.ingest(alert());
    await dedup.ingest(alert({ status: 'resolved' }));
    now += MINUTE_MS;
    const again = await dedup.ingest(alert());

    expect(again.outcome).toBe('created');
    expect(again.issue?.status).toBe('FIRING');
    expect(again.issue?.startedAt).toBe(T0 + MINUTE_MS);
  });

  it('skips malformed alerts in a batch and keeps going', async () => {
    const result = await dedup.ingestBatch([
      alert(),
      { labels: { severity: 'critical' } },
      alert({ fingerprint: 'fp-redis-0002', labels: { alertname: 'ContainerDown', instance: 'redis' } }),
    ]);

    expect(result.processed).toBe(2);
    expect(result.created).toBe(2);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.index).toBe(1);
    expect(result.errors[0]?.reason).toBe('invalid_alert');
  });

  it('acknowledges only FIRING issues', async () => {
    await dedup.ingest(alert());
    const acked = await dedup.acknowledge('fp-nginx-0001', 'alice');
    expect(acked?.status).toBe('ACKNOWLEDGED');
    expect(acked?.acknowledgedBy).toBe('alice');
    expect(acked?.acknowledgedAt).toBe(T0);

    expect(await dedup.acknowledge('fp-nginx-0001', 'bob')).toBeNull();
  });

  it('rejects an ambiguous prefix and accepts a unique one', async () => {
    await dedup.ingest(alert({ fingerprint: 'abc111' }));
    await dedup.ingest(alert({ fingerprint: 'abc222' }));

    const ambiguous = dedup.find('abc');
    expect(ambiguous.kind).toBe('ambiguous');
    expect(await dedup.acknowledge('abc', 'alice')).toBeNull();

    const unique = dedup.find('abc2');
    expect(unique.kind).toBe('found');
    expect((await dedup.acknowledge('abc2', 'alice'))?.fingerprint).toBe('abc222');
  });

  it('prefers an exact match over a longer id sharing the prefix', async () => {
    await dedup.ingest(alert({ fingerprint: 'abc' }));
    await dedup.ingest(alert({ fingerprint: 'abcdef' }));
    const found = dedup.find('abc');
    expect(found.kind === 'found' && found.id).toBe('abc');
  });

  it('lifts a silence once its window elapses', async () => {
    await dedup.ingest(alert());
    const silenced = await dedup.silence('fp-nginx-0001', 30);
    expect(silenced?.status).toBe('SILENCED');
    expect(silenced?.silencedUntil).toBe(T0 + 30 * MINUTE_MS);

    now += 29 * MINUTE_MS;
    expect(await dedup.expireSilences()).toHaveLength(0);

    now += MINUTE_MS;
    const lifted = await dedup.expireSilences();
    expect(lifted).toHaveLength(1);
    expect(lifted[0]?.status).toBe('FIRING');
    expect(lifted[0]?.silencedUntil).toBeUndefined();
  });

  it('returns an acknowledged issue to ACKNOWLEDGED when its silence lapses', async () => {
    await dedup.ingest(alert());
    await dedup.acknowledge('fp-nginx-0001', 'alice');
    await dedup.silence('fp-nginx-0001', 30);

    now += 30 * MINUTE_MS;
    const [lifted] = await dedup.expireSilences();

    expect(lifted?.status).toBe('ACKNOWLEDGED');
    expect(lifted?.acknowledgedBy).toBe('alice');
    expect(lifted?.acknowledgedAt).toBe(T0);
  });

  it('refuses a non-positive silence', async () => {
    await dedup.ingest(alert());
    expect(await dedup.silence('fp-nginx-0001', 0)).toBeNull();
  });

  it('keeps running callbacks when one throws', async () => {
    const good = vi.fn();
    dedup.onNewIssue(() => {
      throw new Error('boom');
    });
    dedup.onNewIssue(good);

    const result = await dedup.ingest(alert());
    expect(result.outcome).toBe('created');
    expect(good).toHaveBeenCalledTimes(1);
  });

  it('counts issues by status and severity', async () => {
    await dedup.ingest(alert({ fingerprint: 'a1', labels: { alertname: 'X', severity: 'critical' } }));
    await dedup.ingest(alert({ fingerprint: 'b1', labels: { alertname: 'X', severity: 'warning' } }));
    await dedup.ingest(alert({ fingerprint: 'c1', labels: { alertname: 'X' } }));
    await dedup.acknowledge('b1', 'alice');
    await dedup.silence('c1', 10);

    expect(dedup.getStats()).toEqual({
      total: 3,
      firing: 1,
      acknowledged: 1,
      silenced: 1,
      resolved: 0,
      critical: 1,
      warning: 1,
      info: 1,
    });
  });

  it('drops resolved issues after the retention window', async () => {
    await dedup.ingest(alert());
    await dedup.resolve('fp-nginx-0001');
    expect(dedup.getResolvedSince(T0)).toHaveLength(1);

    now += 60 * MINUTE_MS;
    expect(dedup.cleanupResolved()).toBe(0);
    now += 1;
    expect(dedup.cleanupResolved()).toBe(1);
  });

  it('fingerprints local issues by source, component and type', () => {
    expect(localFingerprint('health', 'pve1', 'high_disk')).toBe(localFingerprint('health', 'pve1', 'high_disk'));
    expect(localFingerprint('health', 'pve1', 'high_disk')).not.toBe(localFingerprint('trend', 'pve1', 'high_disk'));
  });
});
