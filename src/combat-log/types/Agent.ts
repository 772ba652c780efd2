/**
 * Variant decided from the profession and elite codes alone
 */
export type AgentVariant =
  | { type: 'player'; profession: number; eliteSpec: number }
  | { type: 'character'; speciesId: number }
  | { type: 'gadget'; volatileId: number };

export interface PlayerKind {
  type: 'player';
  profession: number;
  eliteSpec: number;
  characterName: string;
  /** Account name as written by the addon, including its leading colon */
  accountName: string;
  /** Squad subgroup, null when the name buffer carries no number */
  subgroup: number | null;
}

export interface CharacterKind {
  type: 'character';
  speciesId: number;
  name: string;
}

/**
 * Gadget ids are volatile: only meaningful inside the log that produced them
 */
export interface GadgetKind {
  type: 'gadget';
  volatileId: number;
  name: string;
}

export type AgentKind = PlayerKind | CharacterKind | GadgetKind;

/**
 * Half-open span `[firstAware, lastAware)` during which an agent held `instanceId`
 */
export interface AwareInterval {
  readonly instanceId: number;
  readonly firstAware: number;
  readonly lastAware: number;
}

export interface Agent {
  readonly address: bigint;
  readonly kind: AgentKind;
  readonly toughness: number;
  readonly concentration: number;
  readonly healing: number;
  readonly condition: number;
  /** Instance id of the latest aware interval, 0 when the agent never acted */
  readonly instanceId: number;
  readonly awareIntervals: readonly AwareInterval[];
  /** Start of the first aware interval, 0 when the agent never acted */
  readonly firstAware: number;
  /** End of the last aware interval, 0 when the agent never acted */
  readonly lastAware: number;
  /** Root of the master chain; never the agent itself */
  readonly masterAddress: bigint | null;
}

export function isPlayer(agent: Agent): agent is Agent & { kind: PlayerKind } {
  return agent.kind.type === 'player';
}

export function isCharacter(agent: Agent): agent is Agent & { kind: CharacterKind } {
  return agent.kind.type === 'character';
}

export function isGadget(agent: Agent): agent is Agent & { kind: GadgetKind } {
  return agent.kind.type === 'gadget';
}

/**
 * Display name of any agent kind
 */
export function getAgentName(agent: Agent): string {
  switch (agent.kind.type) {
    case 'player':
      return agent.kind.characterName;
    case 'character':
    case 'gadget':
      return agent.kind.name;
  }
}
