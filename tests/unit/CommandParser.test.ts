import {
  helpText,
  isMutating,
  parseCommand,
  parseMention,
  requiresOperator,
} from '../../src/server/game/CommandParser';

describe('CommandParser', () => {
  describe('parseCommand', () => {
    it('ignores ordinary chat', () => {
      expect(parseCommand('hello there')).toBeNull();
      expect(parseCommand('!')).toBeNull();
    });

    it('is case-insensitive and tolerates surrounding whitespace', () => {
      expect(parseCommand('  !HELP ')).toEqual({ ok: true, command: { kind: 'help' } });
    });

    it('parses start with and without a game type', () => {
      expect(parseCommand('!start Snakes_Ladders')).toEqual({
        ok: true,
        command: { kind: 'start', gameType: 'snakes_ladders' },
      });
      expect(parseCommand('!start')).toEqual({ ok: true, command: { kind: 'start', gameType: null } });
    });

    it('keeps multi-word roles', () => {
      expect(parseCommand('!join Rook the  Bold')).toEqual({
        ok: true,
        command: { kind: 'join', role: 'Rook the Bold' },
      });
    });

    it('reads mentions for operator commands', () => {
      expect(parseCommand('!add <@123> Queen')).toEqual({
        ok: true,
        command: { kind: 'add', participantId: '123', role: 'Queen' },
      });
      expect(parseCommand('!add <@!456>')).toEqual({
        ok: true,
        command: { kind: 'add', participantId: '456', role: null },
      });
      expect(parseCommand('!add bob')).toEqual({ ok: false, error: 'Usage: !add @player [role]' });
    });

    it('distinguishes reversible and permanent swaps', () => {
      expect(parseCommand('!swap <@1> <@2>')).toEqual({
        ok: true,
        command: { kind: 'swap', a: '1', b: '2', permanent: false },
      });
      expect(parseCommand('!swapperm <@1> <@2>')).toEqual({
        ok: true,
        command: { kind: 'swap', a: '1', b: '2', permanent: true },
      });
    });

    it('parses rolls for self, for others and with a chosen value', () => {
      expect(parseCommand('!roll')).toEqual({
        ok: true,
        command: { kind: 'roll', participantId: null, value: null },
      });
      expect(parseCommand('!roll <@7> 4')).toEqual({
        ok: true,
        command: { kind: 'roll', participantId: '7', value: 4 },
      });
      expect(parseCommand('!roll <@7> four')).toEqual({
        ok: false,
        error: 'Roll value must be a whole number, got "four".',
      });
      expect(parseCommand('!roll <@7> 4 5')).toEqual({ ok: false, error: 'Usage: !roll [@player [value]]' });
    });

    it('parses moves', () => {
      expect(parseCommand('!move <@7> C4')).toEqual({
        ok: true,
        command: { kind: 'move', participantId: '7', coordinate: 'C4' },
      });
    });

    it('reports unknown commands and missing arguments', () => {
      expect(parseCommand('!dance')).toEqual({
        ok: false,
        error: 'Unknown command !dance. Type !help for the list.',
      });
      expect(parseCommand('!load')).toEqual({ ok: false, error: 'Usage: !load <save id|latest>' });
      expect(parseCommand('!constructor')).toEqual({
        ok: false,
        error: 'Unknown command !constructor. Type !help for the list.',
      });
    });
  });

  describe('parseMention', () => {
    it('accepts both mention forms', () => {
      expect(parseMention('<@42>')).toBe('42');
      expect(parseMention('<@!42>')).toBe('42');
      expect(parseMention('@42')).toBeNull();
      expect(parseMention(undefined)).toBeNull();
    });
  });

  describe('requiresOperator', () => {
    it('lets anyone roll for themselves but not for others', () => {
      expect(requiresOperator({ kind: 'roll', participantId: null, value: null })).toBe(false);
      expect(requiresOperator({ kind: 'roll', participantId: '7', value: null })).toBe(true);
    });

    it('follows the command table', () => {
      expect(requiresOperator({ kind: 'join', role: null })).toBe(false);
      expect(requiresOperator({ kind: 'end' })).toBe(true);
      expect(requiresOperator({ kind: 'swap', a: '1', b: '2', permanent: true })).toBe(true);
      expect(requiresOperator({ kind: 'saves' })).toBe(false);
    });
  });

  it('counts only state-changing commands as mutations', () => {
    expect(isMutating({ kind: 'roll', participantId: null, value: null })).toBe(true);
    expect(isMutating({ kind: 'players' })).toBe(false);
    expect(isMutating({ kind: 'save' })).toBe(false);
  });

  it('lists every command in the help text', () => {
    const lines = helpText().split('\n');

    expect(lines[0]).toBe('Commands:');
    expect(lines).toContain('!end: End the game and delete its saves. (operator)');
    expect(lines).toContain('!board: Show the board.');
    expect(lines).toHaveLength(21);
  });
});
