// ─────────────────────────────────────────────
//  RulesetLoader
//  Reads the role and terrain tables and validates them with zod.
//  Call loadRuleset() once at startup; the result is read-only.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { Ruleset } from '@/engine/data/types/Ruleset';
import { ROLE_IDS } from '@/engine/data/types/Unit';
import { TERRAIN_KEYS } from '@/engine/data/types/Terrain';
import { ConfigError } from './ConfigError';

import rolesJson from '@/assets/data/roles.json';
import terrainsJson from '@/assets/data/terrains.json';

const period = z.number().int().positive();
const radius = z.number().int().nonnegative();

const abilitySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('heal'), period, radius, amount: z.number().positive() }),
  z.object({ kind: z.literal('shield'), period, radius, reduction: z.number().min(0).max(1) }),
  z.object({ kind: z.literal('rally'), period, radius, bonus: z.number().nonnegative() }),
  z.object({ kind: z.literal('repair'), period, radius, amount: z.number().positive() }),
  z.object({ kind: z.literal('wall'), period }),
]);

const roleSchema = z.object({
  id: z.enum(ROLE_IDS),
  name: z.string().min(1),
  hp: z.number().int().positive(),
  damage: z.number().int().nonnegative(),
  speed: z.number().int().positive(),
  cost: z.number().int().positive(),
  visionBonus: z.number().int().nonnegative(),
  maxAlive: z.number().int().positive().optional(),
  ability: abilitySchema,
});

const terrainSchema = z.object({
  key: z.enum(TERRAIN_KEYS),
  name: z.string().min(1),
  glyph: z.string().length(1),
  walkable: z.boolean(),
  entryDelay: z.number().int().nonnegative(),
  buildable: z.boolean(),
});

const rulesetSchema = z
  .object({
    roles: z.object({
      infantry: roleSchema,
      tank: roleSchema,
      scout: roleSchema,
      shieldbearer: roleSchema,
      medic: roleSchema,
      engineer: roleSchema,
      repairbot: roleSchema,
      spotter: roleSchema,
      commander: roleSchema,
    }),
    terrains: z.object({
      open: terrainSchema,
      forest: terrainSchema,
      wall: terrainSchema,
      water: terrainSchema,
    }),
  })
  .superRefine((table, ctx) => {
    for (const id of ROLE_IDS) {
      if (table.roles[id].id !== id) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['roles', id, 'id'], message: `expected "${id}"` });
      }
    }
    const glyphs = new Set<string>();
    for (const key of TERRAIN_KEYS) {
      const terrain = table.terrains[key];
      if (terrain.key !== key) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['terrains', key, 'key'], message: `expected "${key}"` });
      }
      if (glyphs.has(terrain.glyph)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['terrains', key, 'glyph'], message: `duplicate glyph "${terrain.glyph}"` });
      }
      glyphs.add(terrain.glyph);
    }
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Validate raw role/terrain tables. Throws ConfigError listing every problem. */
export function parseRuleset(raw: unknown): Ruleset {
  const result = rulesetSchema.safeParse(raw);
  if (!result.success) throw new ConfigError('ruleset', formatIssues(result.error));
  return result.data;
}

/** The bundled default ruleset */
export function loadRuleset(): Ruleset {
  return parseRuleset({ roles: rolesJson, terrains: terrainsJson });
}
