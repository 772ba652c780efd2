/**
 * Classified combat events. Every raw record maps to exactly one payload variant.
 */

export type StateChange =
  | { type: 'enterCombat'; agent: bigint; subgroup: number }
  | { type: 'exitCombat'; agent: bigint }
  | { type: 'changeUp'; agent: bigint }
  | { type: 'changeDead'; agent: bigint }
  | { type: 'changeDown'; agent: bigint }
  | { type: 'spawn'; agent: bigint }
  | { type: 'despawn'; agent: bigint }
  // 10000 = 100%
  | { type: 'healthUpdate'; agent: bigint; health: number }
  | { type: 'logStart'; serverTimestamp: number; localTimestamp: number }
  | { type: 'logEnd'; serverTimestamp: number; localTimestamp: number }
  | { type: 'weaponSwap'; agent: bigint; set: number }
  | { type: 'maxHealthUpdate'; agent: bigint; maxHealth: number }
  | { type: 'pointOfView'; agent: bigint }
  | { type: 'language'; language: number }
  | { type: 'build'; build: number }
  | { type: 'shardId'; shardId: number }
  | { type: 'reward'; agent: bigint; rewardId: number; rewardType: number }
  | { type: 'position'; agent: bigint; x: number; y: number; z: number }
  | { type: 'velocity'; agent: bigint; x: number; y: number; z: number }
  | { type: 'facing'; agent: bigint; x: number; y: number }
  | { type: 'teamChange'; agent: bigint; teamId: number }
  | { type: 'attackTarget'; agent: bigint; parent: bigint; targetable: boolean }
  | { type: 'targetable'; agent: bigint; targetable: boolean }
  | { type: 'mapId'; mapId: number };

export type ActivationKind = 'normal' | 'quickness' | 'cancelFire' | 'cancelCancel' | 'reset';

export type BuffRemovalKind = 'all' | 'single' | 'manual';

export type PhysicalResult =
  | 'normal'
  | 'critical'
  | 'glance'
  | 'block'
  | 'evade'
  | 'interrupt'
  | 'absorb'
  | 'blind'
  | 'killingBlow'
  | 'downed';

export type BuffEffect =
  | { type: 'application'; duration: number; overstack: number }
  | { type: 'negatedTick' }
  /** Positive damage, negative healing */
  | { type: 'damageTick'; damage: number };

/**
 * Why a record was classified as unknown
 */
export type UnknownReason =
  | 'unhandledStateChange'
  | 'unrecognizedStateChange'
  | 'unrecognizedActivation'
  | 'unrecognizedBuffRemoval'
  | 'ambiguousBuff'
  | 'unrecognizedResult';

export type EventPayload =
  | { kind: 'stateChange'; change: StateChange }
  /** `durationMs` is the elapsed channel for cancels, the expected animation otherwise */
  | { kind: 'activation'; activation: ActivationKind; skillId: number; durationMs: number }
  | {
      kind: 'buffRemoval';
      removal: BuffRemovalKind;
      buffId: number;
      totalDuration: number;
      longestStack: number;
    }
  | { kind: 'buff'; buffId: number; effect: BuffEffect }
  | { kind: 'physical'; skillId: number; damage: number; result: PhysicalResult }
  | { kind: 'unknown'; reason: UnknownReason; code: number };

export type Iff = 'friend' | 'foe' | 'unknown';

export interface CombatEvent {
  readonly time: number;
  readonly sourceAddress: bigint;
  readonly destinationAddress: bigint;
  readonly skillId: number;
  readonly sourceInstanceId: number;
  readonly destinationInstanceId: number;
  readonly iff: Iff;
  readonly isNinety: boolean;
  readonly isFifty: boolean;
  readonly isMoving: boolean;
  readonly isFlanking: boolean;
  readonly isShields: boolean;
  readonly isOffcycle: boolean;
  readonly payload: EventPayload;
}
