import type { AgentVariant } from '../types/Agent';

/** Elite code marking a non-player agent */
export const NON_PLAYER_ELITE = 0xffffffff;

/** Upper half of the profession code marking a gadget */
export const GADGET_PROFESSION_MARKER = 0xffff;

/**
 * Decide whether an agent-table record is a player, a character or a gadget
 */
export function classifyAgentVariant(profession: number, elite: number): AgentVariant {
  if (elite !== NON_PLAYER_ELITE) {
    return { type: 'player', profession, eliteSpec: elite };
  }

  const upper = (profession >>> 16) & 0xffff;
  const lower = profession & 0xffff;
  if (upper === GADGET_PROFESSION_MARKER) {
    return { type: 'gadget', volatileId: lower };
  }
  return { type: 'character', speciesId: lower };
}
