import { z } from 'zod';

// Board configuration
// Tile redirections are keyed by the landing tile (JSON object keys are
// strings) and map to the tile the token ends on.
const TileMapSchema = z.record(z.string().regex(/^\d+$/), z.number().int().min(1));

export const BoardConfigSchema = z
  .object({
    gridCols: z.number().int().min(2).max(26),
    gridRows: z.number().int().min(2).max(99),
    goalTile: z.number().int().min(2),
    startTile: z.number().int().min(1).default(1),
    dieSides: z.number().int().min(2).max(100).default(6),
    hazards: TileMapSchema.default({}),
    shortcuts: TileMapSchema.default({}),
    /** Informational text shown when a move ends on the tile. No effect on play. */
    tileNotes: z.record(z.string().regex(/^\d+$/), z.string().min(1)).default({}),
  })
  .superRefine((cfg, ctx) => {
    const maxTile = cfg.gridCols * cfg.gridRows;
    if (cfg.goalTile > maxTile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['goalTile'],
        message: `goalTile must be at most ${maxTile}`,
      });
    }
    if (cfg.startTile >= cfg.goalTile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['startTile'],
        message: 'startTile must be below goalTile',
      });
    }
    for (const [from, to] of Object.entries(cfg.hazards)) {
      if (to >= Number(from) || Number(from) > cfg.goalTile) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['hazards', from],
          message: 'hazards must move down and start on the board',
        });
      }
    }
    for (const [from, to] of Object.entries(cfg.shortcuts)) {
      if (to <= Number(from) || to > cfg.goalTile) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['shortcuts', from],
          message: 'shortcuts must move up without passing the goal',
        });
      }
      if (from in cfg.hazards) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['shortcuts', from],
          message: 'a tile cannot be both a hazard and a shortcut',
        });
      }
    }
  });

export type BoardConfig = z.output<typeof BoardConfigSchema>;

// Snapshot validation
// NOTE: Snapshots are parsed leniently. Only the envelope is strict; the
// participant list and rule payload are sanitized field by field so a
// partially damaged file can still be restored.
export const SnapshotEnvelopeSchema = z.object({
  version: z.literal(1),
  sessionId: z.string().min(1),
  gameType: z.string().min(1),
  operatorId: z.string().min(1),
  kind: z.enum(['autosave', 'manual']),
  /** Monotonic per-kind save counter; autosave slots rotate on it. */
  generation: z.number().int().min(1).optional(),
  savedAt: z.string(),
  turnNumber: z.unknown(),
  started: z.boolean().default(false),
  paused: z.boolean().default(false),
  ended: z.boolean().default(false),
  nextSequence: z.unknown(),
  enabledPacks: z.array(z.string()).default([]),
  participants: z.array(z.unknown()).default([]),
  ruleState: z.record(z.string(), z.unknown()).default({}),
});

export type SnapshotEnvelope = z.infer<typeof SnapshotEnvelopeSchema>;

export const SnapshotParticipantSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()),
  role: z.string().nullable().default(null),
  coordinate: z.string().nullable().default(null),
  sequence: z.unknown(),
  display: z
    .object({
      background: z.string().nullable().default(null),
      outfit: z.string().nullable().default(null),
    })
    .default({ background: null, outfit: null }),
  swappedWith: z.union([z.string(), z.number()]).optional(),
});

// Character pack configuration
export const CharacterPackEntrySchema = z
  .object({
    name: z.string().default('Unknown'),
    file: z.string().min(1).optional(),
  })
  .catchall(z.unknown());

export type CharacterPackEntry = z.infer<typeof CharacterPackEntrySchema>;

export const CharacterPackConfigSchema = z.union([
  z.array(z.unknown()),
  z
    .object({
      alwaysShowFacesOnBoard: z.boolean().default(true),
      packs: z.array(z.unknown()).default([]),
    })
    .passthrough(),
]);

export const CharacterSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().optional(),
    avatar: z.string().optional(),
  })
  .passthrough();

export type CharacterDefinition = z.infer<typeof CharacterSchema>;
