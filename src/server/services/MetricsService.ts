/**
 * MetricsService - Centralized Prometheus metrics collection for the bot.
 *
 * This service provides:
 * - Command serializer metrics (queued, replayed and dropped events, lock hold time)
 * - Session metrics (active sessions, lifecycle transitions)
 * - Turn metrics (moves by outcome, rule plugin failures)
 * - Persistence metrics (snapshot writes and loads)
 *
 * All metrics are registered with the default prom-client registry and exposed
 * via the /metrics endpoint for Prometheus scraping.
 */

import client, { Registry, Counter, Histogram, Gauge } from 'prom-client';
import { logger } from '../utils/logger';
import type { SnapshotKind } from '../../shared/types/session';

/**
 * Why a captured event (or part of one) never reached dispatch.
 */
export type DropReason = 'empty_attachment' | 'attachment_read_failed' | 'reentrant_lock';

/**
 * Move outcome for turn metrics.
 */
export type MoveOutcome = 'plain' | 'hazard' | 'shortcut' | 'goal';

/**
 * Singleton MetricsService class that manages all Prometheus metrics.
 */
export class MetricsService {
  private static instance: MetricsService | null = null;
  private readonly registry: Registry;
  private initialized = false;

  // ===================
  // Serializer Metrics
  // ===================

  /** Counter: Events captured while a session lock was held */
  public readonly eventsQueuedTotal: Counter<string>;

  /** Counter: Queued events replayed through dispatch */
  public readonly eventsReplayedTotal: Counter<string>;

  /** Counter: Events or attachments dropped, by reason */
  public readonly eventsDroppedTotal: Counter<'reason'>;

  /** Counter: Replays whose dispatch threw */
  public readonly replayFailuresTotal: Counter<string>;

  /** Histogram: Time a session lock was held, in seconds */
  public readonly lockHoldSeconds: Histogram<string>;

  // ===================
  // Session Metrics
  // ===================

  /** Gauge: Sessions currently registered in memory */
  public readonly sessionsActive: Gauge<string>;

  /** Counter: Session lifecycle transitions */
  public readonly sessionTransitionsTotal: Counter<'transition'>;

  // ===================
  // Turn Metrics
  // ===================

  /** Counter: Resolved moves by outcome */
  public readonly movesTotal: Counter<'outcome'>;

  /** Counter: Exceptions raised by game-type rule logic */
  public readonly rulePluginFailuresTotal: Counter<'game_type' | 'operation'>;

  // ===================
  // Persistence Metrics
  // ===================

  /** Counter: Snapshots written, by kind */
  public readonly snapshotsSavedTotal: Counter<'kind'>;

  /** Counter: Snapshot loads, by whether sanitization produced warnings */
  public readonly snapshotsLoadedTotal: Counter<'sanitized'>;

  /**
   * Private constructor - use getInstance() instead.
   */
  private constructor() {
    this.registry = client.register;

    this.eventsQueuedTotal = new Counter({
      name: 'parlor_events_queued_total',
      help: 'Inbound events captured and queued while a session lock was held',
    });

    this.eventsReplayedTotal = new Counter({
      name: 'parlor_events_replayed_total',
      help: 'Queued events replayed through the dispatch path',
    });

    this.eventsDroppedTotal = new Counter({
      name: 'parlor_events_dropped_total',
      help: 'Events or attachments dropped before dispatch',
      labelNames: ['reason'] as const,
    });

    this.replayFailuresTotal = new Counter({
      name: 'parlor_replay_failures_total',
      help: 'Replayed events whose dispatch raised an error',
    });

    this.lockHoldSeconds = new Histogram({
      name: 'parlor_lock_hold_seconds',
      help: 'Duration a session lock was held in seconds',
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2.5, 5, 10],
    });

    this.sessionsActive = new Gauge({
      name: 'parlor_sessions_active',
      help: 'Game sessions currently held in memory',
    });

    this.sessionTransitionsTotal = new Counter({
      name: 'parlor_session_transitions_total',
      help: 'Session lifecycle transitions',
      labelNames: ['transition'] as const,
    });

    this.movesTotal = new Counter({
      name: 'parlor_moves_total',
      help: 'Resolved moves by outcome',
      labelNames: ['outcome'] as const,
    });

    this.rulePluginFailuresTotal = new Counter({
      name: 'parlor_rule_plugin_failures_total',
      help: 'Exceptions raised by game-specific rule logic',
      labelNames: ['game_type', 'operation'] as const,
    });

    this.snapshotsSavedTotal = new Counter({
      name: 'parlor_snapshots_saved_total',
      help: 'Session snapshots written to disk',
      labelNames: ['kind'] as const,
    });

    this.snapshotsLoadedTotal = new Counter({
      name: 'parlor_snapshots_loaded_total',
      help: 'Session snapshots loaded from disk',
      labelNames: ['sanitized'] as const,
    });

    this.initialized = true;
    logger.info('MetricsService initialized');
  }

  /**
   * Get the singleton MetricsService instance.
   */
  public static getInstance(): MetricsService {
    if (!MetricsService.instance) {
      MetricsService.instance = new MetricsService();
    }
    return MetricsService.instance;
  }

  /**
   * Reset the singleton instance (for testing only).
   */
  public static resetInstance(): void {
    if (MetricsService.instance) {
      client.register.clear();
      MetricsService.instance = null;
    }
  }

  /**
   * Get metrics in Prometheus text format.
   */
  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Get the content type for metrics response.
   */
  public getContentType(): string {
    return this.registry.contentType;
  }

  /**
   * Check if the service is initialized.
   */
  public isInitialized(): boolean {
    return this.initialized;
  }

  // ===================
  // Serializer Helpers
  // ===================

  public recordEventQueued(): void {
    this.eventsQueuedTotal.inc();
  }

  public recordEventReplayed(): void {
    this.eventsReplayedTotal.inc();
  }

  public recordEventDropped(reason: DropReason): void {
    this.eventsDroppedTotal.labels(reason).inc();
  }

  public recordReplayFailure(): void {
    this.replayFailuresTotal.inc();
  }

  public recordLockHold(durationSeconds: number): void {
    this.lockHoldSeconds.observe(durationSeconds);
  }

  // ===================
  // Session Helpers
  // ===================

  public setActiveSessions(count: number): void {
    this.sessionsActive.set(count);
  }

  public recordSessionTransition(transition: string): void {
    this.sessionTransitionsTotal.labels(transition).inc();
  }

  // ===================
  // Turn Helpers
  // ===================

  public recordMove(outcome: MoveOutcome): void {
    this.movesTotal.labels(outcome).inc();
  }

  public recordRulePluginFailure(gameType: string, operation: string): void {
    this.rulePluginFailuresTotal.labels(gameType, operation).inc();
  }

  // ===================
  // Persistence Helpers
  // ===================

  public recordSnapshotSaved(kind: SnapshotKind): void {
    this.snapshotsSavedTotal.labels(kind).inc();
  }

  public recordSnapshotLoaded(sanitized: boolean): void {
    this.snapshotsLoadedTotal.labels(sanitized ? 'true' : 'false').inc();
  }
}

// Singleton getter for convenience
export const getMetricsService = (): MetricsService => MetricsService.getInstance();

export default MetricsService;
