import { readFileSync } from 'fs';
import { z } from 'zod';
import builtInCatalog from '../../data/encounters.json';

/**
 * Encounter catalog: which bosses form which encounter, and which
 * in-log signals mark victory or the challenge variant.
 * Loaded once, validated, then frozen.
 */

const SpeciesIdSchema = z.number().int().min(0).max(0xffff);

export const VictoryTriggerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('bossDeath'), require: z.enum(['any', 'all']).default('any') }),
  z.object({ kind: z.literal('buffOnBoss'), buffId: z.number().int().nonnegative() }),
  z.object({ kind: z.literal('speciesSpawn'), speciesId: SpeciesIdSchema }),
  z.object({
    kind: z.literal('playersOutlastBoss'),
    marginMs: z.number().int().nonnegative().default(1000),
  }),
  // buff lands on a boss at or after the last cast of `phaseSkillId`; needs `requiredSkillId` cast at all
  z.object({
    kind: z.literal('buffOnBossAfterSkill'),
    buffId: z.number().int().nonnegative(),
    requiredSkillId: z.number().int().nonnegative(),
    phaseSkillId: z.number().int().nonnegative(),
  }),
  // players stay in combat past the moment the attack target of gadget `parentName` goes untargetable
  z.object({
    kind: z.literal('playersOutlastAttackTarget'),
    parentName: z.string().min(1),
    marginMs: z.number().int().nonnegative().default(1000),
  }),
]);

export const ChallengeConditionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('buffApplied'), buffId: z.number().int().nonnegative() }),
  z.object({ kind: z.literal('maxHealthAtLeast'), health: z.number().int().positive() }),
  z.object({
    kind: z.literal('buffInterval'),
    buffId: z.number().int().nonnegative(),
    maxIntervalMs: z.number().int().positive(),
    // gaps at or below this are duplicated application records
    duplicateWindowMs: z.number().int().nonnegative().default(50),
  }),
  z.object({ kind: z.literal('speciesPresent'), speciesIds: z.array(SpeciesIdSchema).min(1) }),
  z.object({ kind: z.literal('always') }),
]);

const BossSchema = z.object({
  speciesId: SpeciesIdSchema,
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
});

export const EncounterDefinitionSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/, 'encounter ids are lowercase kebab-case'),
  name: z.string().min(1),
  category: z.enum(['raid', 'fractal', 'strike', 'golem']),
  bosses: z.array(BossSchema).min(1),
  aliases: z.array(z.string().min(1)).default([]),
  victory: z.array(VictoryTriggerSchema).default([]),
  challenge: z.array(ChallengeConditionSchema).min(1).optional(),
});

const GameModeEntrySchema = z.object({
  contentId: z.number().int().min(0).max(0xffff),
  mode: z.enum(['wvw']),
  name: z.string().min(1),
});

export const EncounterCatalogSchema = z.object({
  version: z.literal(1),
  gameModes: z.array(GameModeEntrySchema).default([]),
  encounters: z.array(EncounterDefinitionSchema),
});

export type VictoryTrigger = z.infer<typeof VictoryTriggerSchema>;
export type ChallengeCondition = z.infer<typeof ChallengeConditionSchema>;
export type EncounterDefinition = z.infer<typeof EncounterDefinitionSchema>;
export type GameModeEntry = z.infer<typeof GameModeEntrySchema>;
export type EncounterCatalogData = z.infer<typeof EncounterCatalogSchema>;

/**
 * Error thrown when catalog data does not match the schema or contradicts itself
 */
export class CatalogValidationError extends Error {
  public readonly source: string;
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid encounter catalog ${source}: ${issues.join('; ')}`);
    this.name = this.constructor.name;
    this.source = source;
    this.issues = issues;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validate raw catalog data
 */
export function parseEncounterCatalog(data: unknown, source: string): EncounterCatalogData {
  const result = EncounterCatalogSchema.safeParse(data);
  if (!result.success) {
    throw new CatalogValidationError(
      source,
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/**
 * Overlay `extra` on `base`: encounters replace by id, game modes by content id
 */
export function mergeCatalogData(base: EncounterCatalogData, extra: EncounterCatalogData): EncounterCatalogData {
  const encounters = new Map(base.encounters.map((encounter) => [encounter.id, encounter] as const));
  for (const encounter of extra.encounters) {
    encounters.set(encounter.id, encounter);
  }
  const gameModes = new Map(base.gameModes.map((mode) => [mode.contentId, mode] as const));
  for (const mode of extra.gameModes) {
    gameModes.set(mode.contentId, mode);
  }
  return { version: 1, gameModes: [...gameModes.values()], encounters: [...encounters.values()] };
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Immutable lookup over validated catalog data
 */
export class EncounterCatalog {
  private readonly bySpecies = new Map<number, EncounterDefinition>();
  private readonly byId = new Map<string, EncounterDefinition>();
  private readonly byName = new Map<string, EncounterDefinition>();
  private readonly gameModes = new Map<number, GameModeEntry>();
  public readonly encounters: readonly EncounterDefinition[];

  constructor(data: EncounterCatalogData, source: string = 'catalog') {
    const issues: string[] = [];
    const frozen = deepFreeze(data);

    for (const encounter of frozen.encounters) {
      if (this.byId.has(encounter.id)) {
        issues.push(`duplicate encounter id "${encounter.id}"`);
      }
      this.byId.set(encounter.id, encounter);

      for (const boss of encounter.bosses) {
        const owner = this.bySpecies.get(boss.speciesId);
        if (owner && owner.id !== encounter.id) {
          issues.push(`species ${boss.speciesId} belongs to both "${owner.id}" and "${encounter.id}"`);
        }
        this.bySpecies.set(boss.speciesId, encounter);
      }

      const names = [
        encounter.id,
        encounter.name,
        ...encounter.aliases,
        ...encounter.bosses.flatMap((boss) => [boss.name, ...boss.aliases]),
      ];
      for (const name of names) {
        const key = normalizeName(name);
        const owner = this.byName.get(key);
        if (owner && owner.id !== encounter.id) {
          issues.push(`name "${name}" belongs to both "${owner.id}" and "${encounter.id}"`);
        }
        this.byName.set(key, encounter);
      }
    }

    for (const mode of frozen.gameModes) {
      if (this.bySpecies.has(mode.contentId)) {
        issues.push(`content id ${mode.contentId} is both a game mode and a boss`);
      }
      this.gameModes.set(mode.contentId, mode);
    }

    if (issues.length > 0) {
      throw new CatalogValidationError(source, issues);
    }
    this.encounters = frozen.encounters;
  }

  public findBySpecies(speciesId: number): EncounterDefinition | null {
    return this.bySpecies.get(speciesId) ?? null;
  }

  public findById(id: string): EncounterDefinition | null {
    return this.byId.get(id) ?? null;
  }

  /**
   * Look up by encounter name, boss name or alias, case-insensitively
   */
  public findByName(name: string): EncounterDefinition | null {
    return this.byName.get(normalizeName(name)) ?? null;
  }

  public gameModeFor(contentId: number): GameModeEntry | null {
    return this.gameModes.get(contentId) ?? null;
  }

  public isBossSpecies(encounter: EncounterDefinition, speciesId: number): boolean {
    return encounter.bosses.some((boss) => boss.speciesId === speciesId);
  }
}

/**
 * Read and validate a catalog file
 */
export function readCatalogFile(path: string): EncounterCatalogData {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogValidationError(path, [`cannot read catalog: ${reason}`]);
  }
  return parseEncounterCatalog(data, path);
}

/**
 * Built-in catalog, with the file at `extraCatalogPath` merged over it when given
 */
export function loadEncounterCatalog(extraCatalogPath: string | null = null): EncounterCatalog {
  const base = parseEncounterCatalog(builtInCatalog, 'built-in');
  if (!extraCatalogPath) {
    return new EncounterCatalog(base, 'built-in');
  }
  return new EncounterCatalog(mergeCatalogData(base, readCatalogFile(extraCatalogPath)), extraCatalogPath);
}
