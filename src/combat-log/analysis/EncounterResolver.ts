import type { EncounterCatalog, EncounterDefinition, GameModeEntry } from '../constants/EncounterCatalog';
import { isCharacter } from '../types/Agent';
import type { Log } from '../types/Log';

export type EncounterIdentity =
  | { kind: 'encounter'; encounter: EncounterDefinition }
  | { kind: 'gameMode'; mode: GameModeEntry }
  | { kind: 'unrecognized' };

/**
 * Decide which encounter a log records.
 * Order: header content id as boss species, header content id as game mode,
 * then the boss species among the log's characters when they agree on one encounter.
 */
export function resolveEncounter(log: Log, catalog: EncounterCatalog): EncounterIdentity {
  const byContentId = catalog.findBySpecies(log.contentId);
  if (byContentId) {
    return { kind: 'encounter', encounter: byContentId };
  }

  const mode = catalog.gameModeFor(log.contentId);
  if (mode) {
    return { kind: 'gameMode', mode };
  }

  const candidates = new Map<string, EncounterDefinition>();
  for (const agent of log.agents) {
    if (!isCharacter(agent)) {
      continue;
    }
    const encounter = catalog.findBySpecies(agent.kind.speciesId);
    if (encounter) {
      candidates.set(encounter.id, encounter);
    }
  }
  if (candidates.size === 1) {
    const [encounter] = candidates.values();
    return { kind: 'encounter', encounter };
  }

  return { kind: 'unrecognized' };
}
