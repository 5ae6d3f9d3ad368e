import { randomUUID } from 'node:crypto';
import type { BaseLogger } from 'pino';
import type { EventHandler } from '../domain/index.js';
import type { ReplayManager, ReplayOptions, ReplaySummary } from './replay-manager.js';

export interface ReplaySessionStatus {
  replay_id: string;
  simulation_id: string;
  status: 'running';
  started_at: string;
  speed_multiplier: number | null;
  event_types: string[] | null;
  processed: number;
  total: number | null;
}

interface ActiveSession {
  status: ReplaySessionStatus;
  controller: AbortController;
  done: Promise<ReplaySummary | null>;
}

export type SessionOptions = Omit<ReplayOptions, 'signal' | 'onProgress'>;

/**
 * Background replays addressable by id.
 *
 * Only running sessions are tracked: a session leaves the registry as
 * soon as it finishes, fails or is stopped, and its outcome goes to the
 * log.
 */
export class ReplaySessionRegistry {
  private readonly sessions: Map<string, ActiveSession> = new Map();

  constructor(
    private readonly replayManager: ReplayManager,
    private readonly log: BaseLogger,
  ) {}

  /**
   * Starts a replay without waiting for it and returns its id.
   * Option errors surface through the log, like any other failure.
   */
  start(simulationId: string, handler: EventHandler, options: SessionOptions = {}): string {
    const replayId = randomUUID();
    const controller = new AbortController();

    const status: ReplaySessionStatus = {
      replay_id: replayId,
      simulation_id: simulationId,
      status: 'running',
      started_at: new Date().toISOString(),
      speed_multiplier: options.speedMultiplier ?? null,
      event_types: options.eventTypes ? [...options.eventTypes] : null,
      processed: 0,
      total: null,
    };

    const done = this.replayManager
      .replayEvents(simulationId, handler, {
        ...options,
        signal: controller.signal,
        onProgress: (progress) => {
          status.processed = progress.processed;
          status.total = progress.total;
        },
      })
      .then((summary) => {
        this.log.info({ replay_id: replayId, ...summary }, 'Replay session completed');
        return summary;
      })
      .catch((err: unknown) => {
        if (controller.signal.aborted) {
          this.log.info({ replay_id: replayId, processed: status.processed }, 'Replay session stopped');
        } else {
          this.log.error({ err, replay_id: replayId }, 'Replay session failed');
        }
        return null;
      })
      .finally(() => {
        this.sessions.delete(replayId);
      });

    this.sessions.set(replayId, { status, controller, done });
    this.log.info({ replay_id: replayId, simulation_id: simulationId }, 'Replay session started');

    return replayId;
  }

  /** Aborts a running session. `false` if the id is unknown or already finished. */
  stop(replayId: string): boolean {
    const session = this.sessions.get(replayId);
    if (!session) return false;
    session.controller.abort();
    return true;
  }

  status(replayId: string): ReplaySessionStatus | null {
    const session = this.sessions.get(replayId);
    return session ? { ...session.status } : null;
  }

  /** Resolves when the session ends; `null` if it failed, was stopped or is unknown. */
  async wait(replayId: string): Promise<ReplaySummary | null> {
    const session = this.sessions.get(replayId);
    return session ? session.done : null;
  }

  activeCount(): number {
    return this.sessions.size;
  }

  /** Aborts every running session and waits for them to unwind. */
  async stopAll(): Promise<void> {
    const pending = [...this.sessions.values()];
    for (const session of pending) session.controller.abort();
    await Promise.all(pending.map((s) => s.done));
  }
}
