import {
  applyTransition,
  deriveGameSessionStatus,
  planTransition,
} from '../../src/shared/stateMachines/gameSession';

const flags = (started: boolean, paused: boolean, ended: boolean) => ({ started, paused, ended });

describe('game session state machine', () => {
  it('derives status from the session flags', () => {
    expect(deriveGameSessionStatus(flags(false, false, false))).toBe('not_started');
    expect(deriveGameSessionStatus(flags(true, false, false))).toBe('active');
    expect(deriveGameSessionStatus(flags(true, true, false))).toBe('paused');
    expect(deriveGameSessionStatus(flags(true, true, true))).toBe('ended');
  });

  it('plans the allowed transitions', () => {
    expect(planTransition(flags(false, false, false), 'start')).toEqual({ ok: true, from: 'not_started', to: 'active' });
    expect(planTransition(flags(true, false, false), 'pause')).toEqual({ ok: true, from: 'active', to: 'paused' });
    expect(planTransition(flags(true, true, false), 'end')).toEqual({ ok: true, from: 'paused', to: 'ended' });
  });

  it('explains rejected transitions', () => {
    expect(planTransition(flags(false, false, false), 'pause')).toEqual({
      ok: false,
      from: 'not_started',
      reason: 'The game has not started yet.',
    });
    expect(planTransition(flags(true, false, false), 'resume')).toMatchObject({
      ok: false,
      reason: 'The game is already running.',
    });
    expect(planTransition(flags(true, false, true), 'end')).toMatchObject({
      ok: false,
      reason: 'The game has already ended.',
    });
  });

  it('applies transitions to the flags in place', () => {
    const session = flags(true, true, false);

    applyTransition(session, 'ended');

    expect(session).toEqual({ started: true, paused: false, ended: true });
    expect(deriveGameSessionStatus(session)).toBe('ended');
  });
});
