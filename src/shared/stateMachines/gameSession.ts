import type { SessionRecord } from '../types/session';

/**
 * Explicit lifecycle view of a session, derived from the started/paused/ended
 * flags on {@link SessionRecord}. The flags stay the source of truth (they
 * are what snapshots persist); this module gives callers an intent-focused
 * lens and the one place transitions are validated.
 *
 *   not_started → active ⇄ paused
 *   active | paused → ended (terminal)
 */

export type GameSessionStatus = 'not_started' | 'active' | 'paused' | 'ended';

export type SessionTransition = 'start' | 'pause' | 'resume' | 'end';

export type TransitionResult =
  | { ok: true; from: GameSessionStatus; to: GameSessionStatus }
  | { ok: false; from: GameSessionStatus; reason: string };

type SessionFlags = Pick<SessionRecord, 'started' | 'paused' | 'ended'>;

export function deriveGameSessionStatus(flags: SessionFlags): GameSessionStatus {
  if (flags.ended) {
    return 'ended';
  }
  if (!flags.started) {
    return 'not_started';
  }
  return flags.paused ? 'paused' : 'active';
}

const TRANSITIONS: Record<SessionTransition, Partial<Record<GameSessionStatus, GameSessionStatus>>> = {
  start: { not_started: 'active' },
  pause: { active: 'paused' },
  resume: { paused: 'active' },
  end: { not_started: 'ended', active: 'ended', paused: 'ended' },
};

const REJECTION_REASONS: Record<GameSessionStatus, string> = {
  not_started: 'The game has not started yet.',
  active: 'The game is already running.',
  paused: 'The game is paused.',
  ended: 'The game has already ended.',
};

export function planTransition(flags: SessionFlags, transition: SessionTransition): TransitionResult {
  const from = deriveGameSessionStatus(flags);
  const to = TRANSITIONS[transition][from];
  if (!to) {
    return { ok: false, from, reason: REJECTION_REASONS[from] };
  }
  return { ok: true, from, to };
}

/**
 * Apply a validated transition to the session flags in place.
 */
export function applyTransition(flags: SessionFlags, to: GameSessionStatus): void {
  switch (to) {
    case 'not_started':
      flags.started = false;
      flags.paused = false;
      flags.ended = false;
      return;
    case 'active':
      flags.started = true;
      flags.paused = false;
      return;
    case 'paused':
      flags.paused = true;
      return;
    case 'ended':
      flags.ended = true;
      flags.paused = false;
      return;
  }
}
