import professionData from '../../data/professions.json';

/**
 * Profession and elite specialization lookups for player agents
 */

export interface EliteSpecInfo {
  id: number;
  name: string;
  profession: number;
}

const PROFESSION_NAMES = new Map<number, string>(
  professionData.professions.map((profession): [number, string] => [profession.id, profession.name])
);

const ELITE_SPECS = new Map<number, EliteSpecInfo>(
  professionData.eliteSpecs.map((spec): [number, EliteSpecInfo] => [spec.id, { ...spec }])
);

/**
 * Get profession name from its id, null when unknown
 */
export function getProfessionName(professionId: number): string | null {
  return PROFESSION_NAMES.get(professionId) ?? null;
}

/**
 * Get elite specialization from its id. Id 0 means no elite specialization.
 */
export function getEliteSpec(eliteSpecId: number): EliteSpecInfo | null {
  return ELITE_SPECS.get(eliteSpecId) ?? null;
}

/**
 * Display name for a player build, e.g. "Firebrand" or "Guardian" without an elite
 * Falls back to the ids when they are not in the table
 */
export function describePlayerBuild(professionId: number, eliteSpecId: number): string {
  const elite = getEliteSpec(eliteSpecId);
  if (elite) {
    return elite.name;
  }
  const profession = getProfessionName(professionId);
  if (eliteSpecId === 0 && profession) {
    return profession;
  }
  return `${profession ?? `Profession ${professionId}`} (spec ${eliteSpecId})`;
}

/**
 * Parse a profession name case-insensitively
 */
export function parseProfession(name: string): number | null {
  const wanted = name.trim().toLowerCase();
  for (const [id, professionName] of PROFESSION_NAMES) {
    if (professionName.toLowerCase() === wanted) {
      return id;
    }
  }
  return null;
}

/**
 * Parse an elite specialization name case-insensitively
 */
export function parseEliteSpec(name: string): EliteSpecInfo | null {
  const wanted = name.trim().toLowerCase();
  for (const spec of ELITE_SPECS.values()) {
    if (spec.name.toLowerCase() === wanted) {
      return spec;
    }
  }
  return null;
}
