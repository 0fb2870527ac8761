/**
 * Text command surface. Parsing is pure: it never looks at session state,
 * so permission and status checks happen in the session manager.
 */

export const COMMAND_PREFIX = '!';

export type GameCommand =
  /** With a game type: open a new session. Without: begin play in the open one. */
  | { kind: 'start'; gameType: string | null }
  | { kind: 'end' }
  | { kind: 'pause' }
  | { kind: 'resume' }
  | { kind: 'join'; role: string | null }
  | { kind: 'add'; participantId: string; role: string | null }
  | { kind: 'leave' }
  | { kind: 'forfeit'; participantId: string }
  | { kind: 'assign'; participantId: string; role: string }
  | { kind: 'swap'; a: string; b: string; permanent: boolean }
  | { kind: 'unswap'; participantId: string }
  | { kind: 'move'; participantId: string; coordinate: string }
  /** `participantId` null means the author rolls for themselves. */
  | { kind: 'roll'; participantId: string | null; value: number | null }
  | { kind: 'players' }
  | { kind: 'save' }
  | { kind: 'load'; snapshotId: string }
  | { kind: 'saves' }
  | { kind: 'board' }
  | { kind: 'help' };

export type CommandKind = GameCommand['kind'];

export type ParseResult = { ok: true; command: GameCommand } | { ok: false; error: string };

interface CommandSpec {
  usage: string;
  summary: string;
  operatorOnly: boolean;
  parse(args: string[]): GameCommand | string;
}

const MENTION_PATTERN = /^<@!?([^<>\s]+)>$/;

/** Extract the participant id from a `<@id>` mention. */
export function parseMention(token: string | undefined): string | null {
  if (token === undefined) {
    return null;
  }
  const match = MENTION_PATTERN.exec(token);
  return match ? match[1] : null;
}

const restOrNull = (args: string[]): string | null => {
  const text = args.join(' ').trim();
  return text.length > 0 ? text : null;
};

const COMMANDS: Record<string, CommandSpec> = {
  start: {
    usage: '!start [game type]',
    summary: 'Open a game in this channel (you become its operator), then !start again to begin play.',
    operatorOnly: false,
    parse: ([gameType]) => ({ kind: 'start', gameType: gameType ? gameType.toLowerCase() : null }),
  },
  end: {
    usage: '!end',
    summary: 'End the game and delete its saves.',
    operatorOnly: true,
    parse: () => ({ kind: 'end' }),
  },
  pause: {
    usage: '!pause',
    summary: 'Pause the game.',
    operatorOnly: true,
    parse: () => ({ kind: 'pause' }),
  },
  resume: {
    usage: '!resume',
    summary: 'Resume a paused game.',
    operatorOnly: true,
    parse: () => ({ kind: 'resume' }),
  },
  join: {
    usage: '!join [role]',
    summary: 'Join the game, optionally as a specific character.',
    operatorOnly: false,
    parse: (args) => ({ kind: 'join', role: restOrNull(args) }),
  },
  add: {
    usage: '!add @player [role]',
    summary: 'Add a player to the game.',
    operatorOnly: true,
    parse: ([target, ...rest]) => {
      const participantId = parseMention(target);
      return participantId ? { kind: 'add', participantId, role: restOrNull(rest) } : 'Usage: !add @player [role]';
    },
  },
  leave: {
    usage: '!leave',
    summary: 'Leave the game. Your position is kept if you come back.',
    operatorOnly: false,
    parse: () => ({ kind: 'leave' }),
  },
  forfeit: {
    usage: '!forfeit @player',
    summary: 'Remove a player from play.',
    operatorOnly: true,
    parse: ([target]) => {
      const participantId = parseMention(target);
      return participantId ? { kind: 'forfeit', participantId } : 'Usage: !forfeit @player';
    },
  },
  assign: {
    usage: '!assign @player <role>',
    summary: 'Give a player a character.',
    operatorOnly: true,
    parse: ([target, ...rest]) => {
      const participantId = parseMention(target);
      const role = restOrNull(rest);
      return participantId && role ? { kind: 'assign', participantId, role } : 'Usage: !assign @player <role>';
    },
  },
  swap: {
    usage: '!swap @a @b',
    summary: "Swap two players' roles (reversible with !unswap).",
    operatorOnly: true,
    parse: ([first, second]) => {
      const a = parseMention(first);
      const b = parseMention(second);
      return a && b ? { kind: 'swap', a, b, permanent: false } : 'Usage: !swap @a @b';
    },
  },
  swapperm: {
    usage: '!swapperm @a @b',
    summary: "Swap two players' roles permanently.",
    operatorOnly: true,
    parse: ([first, second]) => {
      const a = parseMention(first);
      const b = parseMention(second);
      return a && b ? { kind: 'swap', a, b, permanent: true } : 'Usage: !swapperm @a @b';
    },
  },
  unswap: {
    usage: '!unswap @player',
    summary: 'Undo every reversible swap involving a player.',
    operatorOnly: true,
    parse: ([target]) => {
      const participantId = parseMention(target);
      return participantId ? { kind: 'unswap', participantId } : 'Usage: !unswap @player';
    },
  },
  move: {
    usage: '!move @player <coordinate>',
    summary: 'Place a token on a square, e.g. !move @player C4.',
    operatorOnly: true,
    parse: ([target, coordinate]) => {
      const participantId = parseMention(target);
      return participantId && coordinate
        ? { kind: 'move', participantId, coordinate }
        : 'Usage: !move @player <coordinate>';
    },
  },
  roll: {
    usage: '!roll [@player [value]]',
    summary: 'Roll the die. Operators may roll for a player and choose the value.',
    operatorOnly: false,
    parse: ([target, rawValue, ...extra]) => {
      if (target === undefined) {
        return { kind: 'roll', participantId: null, value: null };
      }
      const participantId = parseMention(target);
      if (!participantId || extra.length > 0) {
        return 'Usage: !roll [@player [value]]';
      }
      if (rawValue === undefined) {
        return { kind: 'roll', participantId, value: null };
      }
      if (!/^\d+$/.test(rawValue)) {
        return `Roll value must be a whole number, got "${rawValue}".`;
      }
      return { kind: 'roll', participantId, value: Number.parseInt(rawValue, 10) };
    },
  },
  players: {
    usage: '!players',
    summary: 'List players, roles and positions.',
    operatorOnly: false,
    parse: () => ({ kind: 'players' }),
  },
  save: {
    usage: '!save',
    summary: 'Save the game.',
    operatorOnly: true,
    parse: () => ({ kind: 'save' }),
  },
  load: {
    usage: '!load <save id|latest>',
    summary: 'Restore a saved game.',
    operatorOnly: true,
    parse: ([snapshotId]) => (snapshotId ? { kind: 'load', snapshotId } : 'Usage: !load <save id|latest>'),
  },
  saves: {
    usage: '!saves',
    summary: 'List saved games for this channel.',
    operatorOnly: false,
    parse: () => ({ kind: 'saves' }),
  },
  board: {
    usage: '!board',
    summary: 'Show the board.',
    operatorOnly: false,
    parse: () => ({ kind: 'board' }),
  },
  help: {
    usage: '!help',
    summary: 'Show this list.',
    operatorOnly: false,
    parse: () => ({ kind: 'help' }),
  },
};

/**
 * Parse one chat line. Returns null when the text is not a command at all,
 * so ordinary chat passes through untouched.
 */
export function parseCommand(text: string): ParseResult | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith(COMMAND_PREFIX)) {
    return null;
  }

  const [head = '', ...args] = trimmed.slice(COMMAND_PREFIX.length).split(/\s+/);
  const name = head.toLowerCase();
  if (!name) {
    return null;
  }

  const spec = Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!spec) {
    return { ok: false, error: `Unknown command ${COMMAND_PREFIX}${name}. Type !help for the list.` };
  }

  const parsed = spec.parse(args.filter((arg) => arg.length > 0));
  return typeof parsed === 'string' ? { ok: false, error: parsed } : { ok: true, command: parsed };
}

/**
 * Whether the command needs the session operator (or an admin). A plain
 * `!roll` is the author's own move; rolling for someone else is not.
 */
export function requiresOperator(command: GameCommand): boolean {
  if (command.kind === 'roll') {
    return command.participantId !== null;
  }
  const spec = COMMANDS[command.kind];
  return spec ? spec.operatorOnly : false;
}

/** Commands that change session state and count towards autosave. */
const MUTATING_KINDS: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'start',
  'pause',
  'resume',
  'join',
  'add',
  'leave',
  'forfeit',
  'assign',
  'swap',
  'unswap',
  'move',
  'roll',
]);

export function isMutating(command: GameCommand): boolean {
  return MUTATING_KINDS.has(command.kind);
}

export function helpText(): string {
  const lines = ['Commands:'];
  for (const spec of Object.values(COMMANDS)) {
    lines.push(`${spec.usage}: ${spec.summary}${spec.operatorOnly ? ' (operator)' : ''}`);
  }
  return lines.join('\n');
}
