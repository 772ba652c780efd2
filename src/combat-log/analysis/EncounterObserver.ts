import type { EncounterDefinition } from '../constants/EncounterCatalog';
import { isCharacter, isGadget, isPlayer, type Agent } from '../types/Agent';
import type { CombatEvent, StateChange } from '../types/CombatEvent';

export type LifeState = 'alive' | 'dead' | 'despawned';

/**
 * Everything the trigger rules look at, collected in one pass over the events
 */
export interface EncounterObservations {
  pointOfView: bigint | null;
  /** Source address of every reward marker, in order */
  rewardSources: bigint[];
  logEnded: boolean;
  /** Species ids of all character agents in the log */
  speciesInLog: Set<number>;
  bossSpeciesInLog: Set<number>;
  deadBossSpecies: Set<number>;
  bossStates: Map<bigint, LifeState>;
  playerStates: Map<bigint, LifeState>;
  /** buff id → latest time it was applied to a boss */
  buffsOnBoss: Map<number, number>;
  appliedBuffs: Set<number>;
  spawnedSpecies: Set<number>;
  /** skill id → start of its latest cast */
  lastSkillCast: Map<number, number>;
  /** Latest time any agent became targetable */
  lastTargetableTime: number | null;
  /** agent → latest time it became untargetable */
  lastUntargetable: Map<bigint, number>;
  /** Gadget name → latest attack target reported under a gadget of that name */
  attackTargetsByParent: Map<string, bigint>;
  /** buff id → destination → application times, for interval-watched buffs only */
  buffApplications: Map<number, Map<bigint, number[]>>;
  lastPlayerExitCombat: number | null;
  lastBossExitCombat: number | null;
  /** Highest max-health reported for any boss, null when none was reported */
  bossMaxHealth: number | null;
}

function latest(current: number | null, time: number): number {
  return current === null ? time : Math.max(current, time);
}

/**
 * Single-use state machine fed the classified events of one log in order
 */
export class EncounterObserver {
  private readonly species = new Map<bigint, number>();
  private readonly bossAddresses = new Set<bigint>();
  private readonly gadgetNames = new Map<bigint, string>();
  private readonly intervalBuffs: Set<number>;
  private readonly state: EncounterObservations;

  constructor(encounter: EncounterDefinition, agents: readonly Agent[]) {
    const bossSpecies = new Set(encounter.bosses.map((boss) => boss.speciesId));
    this.intervalBuffs = new Set(
      (encounter.challenge ?? []).flatMap((condition) =>
        condition.kind === 'buffInterval' ? [condition.buffId] : []
      )
    );
    this.state = {
      pointOfView: null,
      rewardSources: [],
      logEnded: false,
      speciesInLog: new Set(),
      bossSpeciesInLog: new Set(),
      deadBossSpecies: new Set(),
      bossStates: new Map(),
      playerStates: new Map(),
      buffsOnBoss: new Map(),
      appliedBuffs: new Set(),
      spawnedSpecies: new Set(),
      lastSkillCast: new Map(),
      lastTargetableTime: null,
      lastUntargetable: new Map(),
      attackTargetsByParent: new Map(),
      buffApplications: new Map(),
      lastPlayerExitCombat: null,
      lastBossExitCombat: null,
      bossMaxHealth: null,
    };

    for (const agent of agents) {
      if (isPlayer(agent)) {
        this.state.playerStates.set(agent.address, 'alive');
      } else if (isCharacter(agent)) {
        const speciesId = agent.kind.speciesId;
        this.species.set(agent.address, speciesId);
        this.state.speciesInLog.add(speciesId);
        if (bossSpecies.has(speciesId)) {
          this.bossAddresses.add(agent.address);
          this.state.bossSpeciesInLog.add(speciesId);
          this.state.bossStates.set(agent.address, 'alive');
        }
      } else if (isGadget(agent)) {
        this.gadgetNames.set(agent.address, agent.kind.name);
      }
    }
  }

  public observe(event: CombatEvent): void {
    switch (event.payload.kind) {
      case 'stateChange':
        this.observeStateChange(event.time, event.payload.change);
        break;
      case 'buff':
        if (event.payload.effect.type === 'application') {
          this.observeBuffApplication(event.time, event.payload.buffId, event.destinationAddress);
        }
        break;
      case 'activation':
        if (event.payload.activation === 'normal' || event.payload.activation === 'quickness') {
          this.state.lastSkillCast.set(event.payload.skillId, event.time);
        }
        break;
      case 'buffRemoval':
      case 'physical':
      case 'unknown':
        break;
    }
  }

  public finish(): EncounterObservations {
    return this.state;
  }

  private observeStateChange(time: number, change: StateChange): void {
    switch (change.type) {
      case 'pointOfView':
        this.state.pointOfView = change.agent;
        break;
      case 'reward':
        this.state.rewardSources.push(change.agent);
        break;
      case 'logEnd':
        this.state.logEnded = true;
        break;
      case 'changeDead': {
        this.setLifeState(change.agent, 'dead');
        const speciesId = this.species.get(change.agent);
        if (speciesId !== undefined && this.bossAddresses.has(change.agent)) {
          this.state.deadBossSpecies.add(speciesId);
        }
        break;
      }
      case 'despawn':
        this.setLifeState(change.agent, 'despawned');
        break;
      case 'spawn': {
        this.setLifeState(change.agent, 'alive');
        const speciesId = this.species.get(change.agent);
        if (speciesId !== undefined) {
          this.state.spawnedSpecies.add(speciesId);
        }
        break;
      }
      case 'changeUp':
      case 'changeDown':
        this.setLifeState(change.agent, 'alive');
        break;
      case 'exitCombat':
        if (this.state.playerStates.has(change.agent)) {
          this.state.lastPlayerExitCombat = latest(this.state.lastPlayerExitCombat, time);
        } else if (this.bossAddresses.has(change.agent)) {
          this.state.lastBossExitCombat = latest(this.state.lastBossExitCombat, time);
        }
        break;
      case 'maxHealthUpdate':
        if (this.bossAddresses.has(change.agent)) {
          this.state.bossMaxHealth = Math.max(this.state.bossMaxHealth ?? 0, change.maxHealth);
        }
        break;
      case 'targetable':
        if (change.targetable) {
          this.state.lastTargetableTime = latest(this.state.lastTargetableTime, time);
        } else {
          const previous = this.state.lastUntargetable.get(change.agent) ?? null;
          this.state.lastUntargetable.set(change.agent, latest(previous, time));
        }
        break;
      case 'attackTarget': {
        const parentName = this.gadgetNames.get(change.parent);
        if (parentName !== undefined) {
          this.state.attackTargetsByParent.set(parentName, change.agent);
        }
        break;
      }
      default:
        break;
    }
  }

  private observeBuffApplication(time: number, buffId: number, destination: bigint): void {
    this.state.appliedBuffs.add(buffId);
    if (this.bossAddresses.has(destination)) {
      this.state.buffsOnBoss.set(buffId, latest(this.state.buffsOnBoss.get(buffId) ?? null, time));
    }
    if (!this.intervalBuffs.has(buffId)) {
      return;
    }
    let byDestination = this.state.buffApplications.get(buffId);
    if (!byDestination) {
      byDestination = new Map();
      this.state.buffApplications.set(buffId, byDestination);
    }
    const times = byDestination.get(destination);
    if (times) {
      times.push(time);
    } else {
      byDestination.set(destination, [time]);
    }
  }

  private setLifeState(address: bigint, state: LifeState): void {
    if (this.state.playerStates.has(address)) {
      this.state.playerStates.set(address, state);
    } else if (this.state.bossStates.has(address)) {
      this.state.bossStates.set(address, state);
    }
  }
}
