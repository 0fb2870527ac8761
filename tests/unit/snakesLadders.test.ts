import { SnakesLaddersRules } from '../../src/shared/engine/rules';
import { BoardConfigSchema } from '../../src/shared/validation/schemas';
import { createParticipant, type SessionRecord } from '../../src/shared/types/session';

const board = BoardConfigSchema.parse({
  gridCols: 10,
  gridRows: 10,
  goalTile: 100,
  hazards: { '16': 6 },
  shortcuts: { '4': 14 },
});

function createSession(rules: SnakesLaddersRules): SessionRecord {
  return {
    sessionId: 'chan-1',
    gameType: 'snakes_ladders',
    operatorId: 'op',
    started: true,
    paused: false,
    ended: false,
    turnNumber: 1,
    participants: new Map(),
    nextSequence: 1,
    enabledPacks: [],
    ruleState: rules.createState(),
  };
}

function addPlayer(session: SessionRecord, rules: SnakesLaddersRules, id: string): void {
  session.participants.set(id, createParticipant(id, session.nextSequence));
  session.nextSequence += 1;
  rules.addParticipant(session, id);
}

describe('SnakesLaddersRules', () => {
  let rules: SnakesLaddersRules;
  let session: SessionRecord;

  beforeEach(() => {
    rules = new SnakesLaddersRules(board);
    session = createSession(rules);
  });

  describe('movement', () => {
    it('applies a hazard and names it in the description', () => {
      addPlayer(session, rules, 'alice');
      rules.placeToken(session, 'alice', 10);

      const outcome = rules.resolveMove(session, 'alice', 6);

      expect(outcome.from).toBe(10);
      expect(outcome.landed).toBe(16);
      expect(outcome.to).toBe(6);
      expect(outcome.redirect).toEqual({ kind: 'hazard', from: 16, to: 6 });
      expect(rules.describeMove(outcome, 'Rook')).toBe(
        'Rook rolled a 6 and moved from 10 to 16. Hazard! Slid down from 16 to 6.'
      );
      expect(session.participants.get('alice')?.coordinate).toBe('F1');
    });

    it('applies a shortcut once without chaining', () => {
      addPlayer(session, rules, 'alice');

      const outcome = rules.resolveMove(session, 'alice', 3);

      expect(outcome.to).toBe(14);
      expect(rules.describeMove(outcome, 'Rook')).toBe(
        'Rook rolled a 3 and moved from 1 to 4. Shortcut! Climbed up from 4 to 14.'
      );
    });

    it('clamps overshooting rolls to the goal tile', () => {
      addPlayer(session, rules, 'alice');
      rules.placeToken(session, 'alice', 97);

      const outcome = rules.resolveMove(session, 'alice', 6);

      expect(outcome.landed).toBe(100);
      expect(outcome.to).toBe(100);
      expect(outcome.win).toEqual({ newlyFinished: ['alice'], gameOver: true, winners: ['alice'] });
      expect(rules.describeMove(outcome, 'Rook')).toBe(
        'Rook rolled a 6 and moved from 97 to 100. Rook reached the goal on turn 1!'
      );
    });

    it('advances the turn counter once everyone eligible has acted', () => {
      addPlayer(session, rules, 'alice');
      addPlayer(session, rules, 'bob');

      const first = rules.resolveMove(session, 'alice', 1);
      expect(first.cycleAdvanced).toBe(false);
      expect(session.turnNumber).toBe(1);

      const second = rules.resolveMove(session, 'bob', 1);
      expect(second.cycleAdvanced).toBe(true);
      expect(second.turnNumber).toBe(1);
      expect(session.turnNumber).toBe(2);
      expect(rules.nextParticipant(session)).toBe('alice');
    });
  });

  describe('eligibility', () => {
    beforeEach(() => {
      addPlayer(session, rules, 'alice');
      addPlayer(session, rules, 'bob');
    });

    it('follows join order', () => {
      expect(rules.checkEligibility(session, 'bob')).toEqual({
        allowed: false,
        nextParticipantId: 'alice',
        reason: 'It is not your turn.',
      });
      expect(rules.checkEligibility(session, 'alice')).toEqual({ allowed: true, nextParticipantId: 'alice' });
    });

    it('rejects a second roll in the same cycle', () => {
      rules.resolveMove(session, 'alice', 2);

      expect(rules.checkEligibility(session, 'alice').reason).toBe('You have already rolled this turn.');
      expect(rules.checkEligibility(session, 'bob').allowed).toBe(true);
    });

    it('rejects strangers', () => {
      expect(rules.checkEligibility(session, 'zed').reason).toBe('You are not part of this game.');
    });
  });

  describe('win detection', () => {
    it('crowns every participant who reached the goal on the earliest turn', () => {
      addPlayer(session, rules, 'alice');
      addPlayer(session, rules, 'bob');
      addPlayer(session, rules, 'carol');
      rules.placeToken(session, 'alice', 97);
      rules.placeToken(session, 'bob', 98);
      rules.placeToken(session, 'carol', 10);

      rules.resolveMove(session, 'alice', 3);
      rules.resolveMove(session, 'bob', 2);
      const carolFirst = rules.resolveMove(session, 'carol', 1);
      expect(carolFirst.win.gameOver).toBe(false);
      expect(session.turnNumber).toBe(2);

      rules.placeToken(session, 'carol', 99);
      const final = rules.resolveMove(session, 'carol', 1);

      expect(final.win.gameOver).toBe(true);
      expect(final.win.winners).toEqual(['alice', 'bob']);
      expect(rules.standingOf(session, 'carol')).toEqual({
        tile: 100,
        forfeited: false,
        finished: true,
        winner: false,
        goalTurn: 2,
      });
    });

    it('excludes forfeited participants from winning', () => {
      addPlayer(session, rules, 'alice');
      addPlayer(session, rules, 'bob');
      rules.placeToken(session, 'alice', 99);
      rules.resolveMove(session, 'alice', 1);
      expect(rules.standingOf(session, 'alice').winner).toBe(true);

      rules.forfeitParticipant(session, 'alice');

      expect(rules.standingOf(session, 'alice').winner).toBe(false);
      expect(rules.checkWin(session).winners).toEqual([]);
    });
  });

  describe('forfeit and rejoin', () => {
    beforeEach(() => {
      addPlayer(session, rules, 'alice');
      addPlayer(session, rules, 'bob');
      addPlayer(session, rules, 'carol');
    });

    it('keeps the forfeited participant in turn order and on the board', () => {
      rules.placeToken(session, 'bob', 30);

      expect(rules.forfeitParticipant(session, 'bob')).toBe(true);

      const state = session.ruleState;
      expect(state.turnOrder).toEqual(['alice', 'bob', 'carol']);
      expect(rules.tileOf(session, 'bob')).toBe(30);
      rules.resolveMove(session, 'alice', 1);
      expect(rules.nextParticipant(session)).toBe('carol');
      expect(rules.checkEligibility(session, 'bob').reason).toBe('You have left this game.');
    });

    it('restores the preserved position on rejoin without duplicating turn order', () => {
      rules.placeToken(session, 'bob', 30);
      rules.forfeitParticipant(session, 'bob');

      rules.addParticipant(session, 'bob');

      expect(rules.tileOf(session, 'bob')).toBe(30);
      expect(rules.standingOf(session, 'bob').forfeited).toBe(false);
      expect(session.ruleState.turnOrder).toEqual(['alice', 'bob', 'carol']);
      expect(session.participants.get('bob')?.coordinate).toBe('J3');
    });

    it('reports unknown participants', () => {
      expect(rules.forfeitParticipant(session, 'zed')).toBe(false);
    });
  });

  describe('deserialize', () => {
    it('strips unknown ids, duplicates and non-numeric values', () => {
      const { state, warnings } = rules.deserialize(
        {
          tiles: { a: '12', z: 5, b: 'x' },
          turnOrder: ['a', 'a', 'z'],
          forfeited: 'nope',
          winners: ['b'],
        },
        ['a', 'b']
      );

      expect(state.turnOrder).toEqual(['a', 'b']);
      expect([...state.tiles]).toEqual([['a', 12]]);
      expect([...state.forfeited]).toEqual([]);
      expect([...state.winners]).toEqual(['b']);
      expect(warnings).toEqual([
        'turnOrder: removed duplicate a',
        'turnOrder: stripped unknown participant z',
        'tiles: stripped unknown participant z',
        'tiles: discarded non-numeric value for b',
        'forfeited is not a list; ignored',
      ]);
    });

    it('warns when the turn order is empty despite existing participants', () => {
      const { state, warnings } = rules.deserialize({}, ['a', 'b']);

      expect(state.turnOrder).toEqual(['a', 'b']);
      expect(warnings).toEqual([
        'turn order was empty although 2 participant(s) exist; rebuilt from join order',
      ]);
    });

    it('reads back what serialize wrote', () => {
      addPlayer(session, rules, 'alice');
      addPlayer(session, rules, 'bob');
      rules.resolveMove(session, 'alice', 5);
      rules.forfeitParticipant(session, 'bob');

      const { state, warnings } = rules.deserialize(rules.serialize(session.ruleState), ['alice', 'bob']);

      expect(warnings).toEqual([]);
      expect(state.tiles.get('alice')).toBe(6);
      expect([...state.forfeited]).toEqual(['bob']);
      expect([...state.actedThisCycle]).toEqual(['alice']);
    });
  });
});
