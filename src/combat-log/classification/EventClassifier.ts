import {
  ActivationCode,
  BuffRemoveCode,
  IffCode,
  LAST_KNOWN_STATE_CHANGE,
  StateChangeCode,
} from '../constants/EventCodes';
import type {
  ActivationKind,
  BuffRemovalKind,
  CombatEvent,
  EventPayload,
  Iff,
  PhysicalResult,
  StateChange,
  UnknownReason,
} from '../types/CombatEvent';
import type { DiagnosticSink } from '../types/Diagnostics';
import type { RawEvent } from '../types/RawRecords';

const ACTIVATIONS: Record<number, ActivationKind> = {
  [ActivationCode.NORMAL]: 'normal',
  [ActivationCode.QUICKNESS]: 'quickness',
  [ActivationCode.CANCEL_FIRE]: 'cancelFire',
  [ActivationCode.CANCEL_CANCEL]: 'cancelCancel',
  [ActivationCode.RESET]: 'reset',
};

const BUFF_REMOVALS: Record<number, BuffRemovalKind> = {
  [BuffRemoveCode.ALL]: 'all',
  [BuffRemoveCode.SINGLE]: 'single',
  [BuffRemoveCode.MANUAL]: 'manual',
};

// Indexed by PhysicalResultCode
const PHYSICAL_RESULTS: readonly PhysicalResult[] = [
  'normal',
  'critical',
  'glance',
  'block',
  'evade',
  'interrupt',
  'absorb',
  'blind',
  'killingBlow',
  'downed',
];

const floatView = new DataView(new ArrayBuffer(4));

function float32FromBits(bits: number): number {
  floatView.setUint32(0, bits >>> 0, true);
  return floatView.getFloat32(0, true);
}

function upperBits(value: bigint): number {
  return Number((value >> 32n) & 0xffffffffn);
}

function lowerBits(value: bigint): number {
  return Number(value & 0xffffffffn);
}

function toIff(code: number): Iff {
  switch (code) {
    case IffCode.FRIEND:
      return 'friend';
    case IffCode.FOE:
      return 'foe';
    default:
      return 'unknown';
  }
}

/**
 * Map a state-change record, or null when this decoder has no variant for its code
 */
function classifyStateChange(raw: RawEvent): StateChange | null {
  const agent = raw.sourceAddress;
  const target = raw.destinationAddress;

  switch (raw.stateChange) {
    case StateChangeCode.ENTER_COMBAT:
      return { type: 'enterCombat', agent, subgroup: Number(target) };
    case StateChangeCode.EXIT_COMBAT:
      return { type: 'exitCombat', agent };
    case StateChangeCode.CHANGE_UP:
      return { type: 'changeUp', agent };
    case StateChangeCode.CHANGE_DEAD:
      return { type: 'changeDead', agent };
    case StateChangeCode.CHANGE_DOWN:
      return { type: 'changeDown', agent };
    case StateChangeCode.SPAWN:
      return { type: 'spawn', agent };
    case StateChangeCode.DESPAWN:
      return { type: 'despawn', agent };
    case StateChangeCode.HEALTH_UPDATE:
      return { type: 'healthUpdate', agent, health: Number(target & 0xffffn) };
    case StateChangeCode.LOG_START:
      return { type: 'logStart', serverTimestamp: raw.value >>> 0, localTimestamp: raw.buffDamage >>> 0 };
    case StateChangeCode.LOG_END:
      return { type: 'logEnd', serverTimestamp: raw.value >>> 0, localTimestamp: raw.buffDamage >>> 0 };
    case StateChangeCode.WEAPON_SWAP:
      return { type: 'weaponSwap', agent, set: Number(target) };
    case StateChangeCode.MAX_HEALTH_UPDATE:
      return { type: 'maxHealthUpdate', agent, maxHealth: Number(target) };
    case StateChangeCode.POINT_OF_VIEW:
      return { type: 'pointOfView', agent };
    case StateChangeCode.LANGUAGE:
      return { type: 'language', language: Number(agent) };
    case StateChangeCode.GW_BUILD:
      return { type: 'build', build: Number(agent) };
    case StateChangeCode.SHARD_ID:
      return { type: 'shardId', shardId: Number(agent) };
    case StateChangeCode.REWARD:
      return { type: 'reward', agent, rewardId: Number(target), rewardType: raw.value };
    case StateChangeCode.POSITION:
      return {
        type: 'position',
        agent,
        x: float32FromBits(upperBits(target)),
        y: float32FromBits(lowerBits(target)),
        z: float32FromBits(raw.value),
      };
    case StateChangeCode.VELOCITY:
      return {
        type: 'velocity',
        agent,
        x: float32FromBits(upperBits(target)),
        y: float32FromBits(lowerBits(target)),
        z: float32FromBits(raw.value),
      };
    case StateChangeCode.FACING:
      return {
        type: 'facing',
        agent,
        x: float32FromBits(upperBits(target)),
        y: float32FromBits(lowerBits(target)),
      };
    case StateChangeCode.TEAM_CHANGE:
      return { type: 'teamChange', agent, teamId: Number(target) };
    case StateChangeCode.ATTACK_TARGET:
      return { type: 'attackTarget', agent, parent: target, targetable: raw.value !== 0 };
    case StateChangeCode.TARGETABLE:
      return { type: 'targetable', agent, targetable: target !== 0n };
    case StateChangeCode.MAP_ID:
      return { type: 'mapId', mapId: Number(agent) };
    default:
      return null;
  }
}

function classifyBuff(raw: RawEvent): EventPayload {
  const buffId = raw.skillId;
  if (raw.buffDamage === 0 && raw.value !== 0) {
    return {
      kind: 'buff',
      buffId,
      effect: { type: 'application', duration: raw.value, overstack: raw.overstackValue },
    };
  }
  if (raw.buffDamage === 0 && raw.value === 0) {
    return { kind: 'buff', buffId, effect: { type: 'negatedTick' } };
  }
  if (raw.value === 0) {
    return { kind: 'buff', buffId, effect: { type: 'damageTick', damage: raw.buffDamage } };
  }
  return { kind: 'unknown', reason: 'ambiguousBuff', code: raw.buff };
}

/**
 * Map one raw record to exactly one payload variant.
 * Precedence: state change, activation, buff removal, buff, physical.
 */
export function classifyPayload(raw: RawEvent): EventPayload {
  if (raw.stateChange !== StateChangeCode.NONE) {
    const change = classifyStateChange(raw);
    if (change) {
      return { kind: 'stateChange', change };
    }
    const reason =
      raw.stateChange > LAST_KNOWN_STATE_CHANGE ? 'unrecognizedStateChange' : 'unhandledStateChange';
    return { kind: 'unknown', reason, code: raw.stateChange };
  }

  if (raw.activation !== ActivationCode.NONE) {
    const activation = ACTIVATIONS[raw.activation];
    if (!activation) {
      return { kind: 'unknown', reason: 'unrecognizedActivation', code: raw.activation };
    }
    return { kind: 'activation', activation, skillId: raw.skillId, durationMs: raw.value };
  }

  if (raw.buffRemove !== BuffRemoveCode.NONE) {
    const removal = BUFF_REMOVALS[raw.buffRemove];
    if (!removal) {
      return { kind: 'unknown', reason: 'unrecognizedBuffRemoval', code: raw.buffRemove };
    }
    return {
      kind: 'buffRemoval',
      removal,
      buffId: raw.skillId,
      totalDuration: raw.value,
      longestStack: raw.buffDamage,
    };
  }

  if (raw.buff !== 0) {
    return classifyBuff(raw);
  }

  const result = PHYSICAL_RESULTS[raw.result];
  if (!result) {
    return { kind: 'unknown', reason: 'unrecognizedResult', code: raw.result };
  }
  return { kind: 'physical', skillId: raw.skillId, damage: raw.value, result };
}

/**
 * Classify a raw record, keeping its addressing and condition flags
 */
export function classifyEvent(raw: RawEvent): CombatEvent {
  return {
    time: raw.time,
    sourceAddress: raw.sourceAddress,
    destinationAddress: raw.destinationAddress,
    skillId: raw.skillId,
    sourceInstanceId: raw.sourceInstanceId,
    destinationInstanceId: raw.destinationInstanceId,
    iff: toIff(raw.iff),
    isNinety: raw.isNinety,
    isFifty: raw.isFifty,
    isMoving: raw.isMoving,
    isFlanking: raw.isFlanking,
    isShields: raw.isShields,
    isOffcycle: raw.isOffcycle,
    payload: classifyPayload(raw),
  };
}

const UNRECOGNIZED_FIELDS: Partial<Record<UnknownReason, string>> = {
  unrecognizedStateChange: 'stateChange',
  unrecognizedActivation: 'activation',
  unrecognizedBuffRemoval: 'buffRemove',
  unrecognizedResult: 'result',
};

/**
 * Classify every record in order, counting unrecognized discriminants in `diagnostics`
 */
export function classifyEvents(raws: readonly RawEvent[], diagnostics: DiagnosticSink): CombatEvent[] {
  const events: CombatEvent[] = [];
  for (const raw of raws) {
    const event = classifyEvent(raw);
    if (event.payload.kind === 'unknown') {
      const field = UNRECOGNIZED_FIELDS[event.payload.reason];
      if (field) {
        diagnostics.countUnrecognized(field, event.payload.code);
      }
    }
    events.push(event);
  }
  return events;
}
