import { MetricsService, getMetricsService } from '../../src/server/services/MetricsService';

jest.mock('../../src/server/utils/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

describe('MetricsService', () => {
  beforeEach(() => {
    MetricsService.resetInstance();
  });

  afterAll(() => {
    MetricsService.resetInstance();
  });

  const metricLines = async (): Promise<string[]> => (await getMetricsService().getMetrics()).split('\n');

  it('is a singleton until reset', () => {
    const first = getMetricsService();

    expect(getMetricsService()).toBe(first);
    expect(first.isInitialized()).toBe(true);

    MetricsService.resetInstance();
    expect(getMetricsService()).not.toBe(first);
  });

  it('counts serializer activity', async () => {
    const metrics = getMetricsService();
    metrics.recordEventQueued();
    metrics.recordEventQueued();
    metrics.recordEventReplayed();
    metrics.recordEventDropped('empty_attachment');
    metrics.recordReplayFailure();

    const lines = await metricLines();

    expect(lines).toContain('parlor_events_queued_total 2');
    expect(lines).toContain('parlor_events_replayed_total 1');
    expect(lines).toContain('parlor_events_dropped_total{reason="empty_attachment"} 1');
    expect(lines).toContain('parlor_replay_failures_total 1');
  });

  it('tracks sessions, moves and snapshots', async () => {
    const metrics = getMetricsService();
    metrics.setActiveSessions(3);
    metrics.recordSessionTransition('start');
    metrics.recordMove('hazard');
    metrics.recordRulePluginFailure('snakes_ladders', 'resolveMove');
    metrics.recordSnapshotSaved('autosave');
    metrics.recordSnapshotLoaded(true);

    const lines = await metricLines();

    expect(lines).toContain('parlor_sessions_active 3');
    expect(lines).toContain('parlor_session_transitions_total{transition="start"} 1');
    expect(lines).toContain('parlor_moves_total{outcome="hazard"} 1');
    expect(lines).toContain(
      'parlor_rule_plugin_failures_total{game_type="snakes_ladders",operation="resolveMove"} 1'
    );
    expect(lines).toContain('parlor_snapshots_saved_total{kind="autosave"} 1');
    expect(lines).toContain('parlor_snapshots_loaded_total{sanitized="true"} 1');
  });

  it('records lock hold times in a histogram', async () => {
    getMetricsService().recordLockHold(0.02);

    const lines = await metricLines();

    expect(lines).toContain('parlor_lock_hold_seconds_bucket{le="0.01"} 0');
    expect(lines).toContain('parlor_lock_hold_seconds_bucket{le="0.05"} 1');
    expect(lines).toContain('parlor_lock_hold_seconds_count 1');
  });
});
