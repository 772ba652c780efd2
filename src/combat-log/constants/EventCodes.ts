/**
 * Numeric discriminants written into EVTC event records
 */

/**
 * State-change codes. Codes above SKILL_TIMING are newer than this decoder.
 */
export enum StateChangeCode {
  NONE = 0,
  ENTER_COMBAT = 1,
  EXIT_COMBAT = 2,
  CHANGE_UP = 3,
  CHANGE_DEAD = 4,
  CHANGE_DOWN = 5,
  SPAWN = 6,
  DESPAWN = 7,
  HEALTH_UPDATE = 8,
  LOG_START = 9,
  LOG_END = 10,
  WEAPON_SWAP = 11,
  MAX_HEALTH_UPDATE = 12,
  POINT_OF_VIEW = 13,
  LANGUAGE = 14,
  GW_BUILD = 15,
  SHARD_ID = 16,
  REWARD = 17,
  BUFF_INITIAL = 18,
  POSITION = 19,
  VELOCITY = 20,
  FACING = 21,
  TEAM_CHANGE = 22,
  ATTACK_TARGET = 23,
  TARGETABLE = 24,
  MAP_ID = 25,
  REPL_INFO = 26,
  STACK_ACTIVE = 27,
  STACK_RESET = 28,
  GUILD = 29,
  BUFF_INFO = 30,
  BUFF_FORMULA = 31,
  SKILL_INFO = 32,
  SKILL_TIMING = 33,
}

/** Highest state-change code this decoder knows the meaning of */
export const LAST_KNOWN_STATE_CHANGE = StateChangeCode.SKILL_TIMING;

export enum ActivationCode {
  NONE = 0,
  NORMAL = 1,
  QUICKNESS = 2,
  CANCEL_FIRE = 3,
  CANCEL_CANCEL = 4,
  RESET = 5,
}

export enum BuffRemoveCode {
  NONE = 0,
  ALL = 1,
  SINGLE = 2,
  MANUAL = 3,
}

export enum PhysicalResultCode {
  NORMAL = 0,
  CRIT = 1,
  GLANCE = 2,
  BLOCK = 3,
  EVADE = 4,
  INTERRUPT = 5,
  ABSORB = 6,
  BLIND = 7,
  KILLING_BLOW = 8,
  DOWNED = 9,
}

export enum IffCode {
  FRIEND = 0,
  FOE = 1,
  UNKNOWN = 2,
}

export enum LanguageCode {
  ENGLISH = 0,
  FRENCH = 2,
  GERMAN = 3,
  SPANISH = 4,
}

/**
 * Weapon set ids carried by weapon swap events
 */
export const WEAPON_SET_NAMES: Record<number, string> = {
  0: 'water-0',
  1: 'water-1',
  4: 'land-0',
  5: 'land-1',
} as const;

/**
 * Name of a weapon set id; unmapped ids keep their number
 */
export function getWeaponSetName(set: number): string {
  return WEAPON_SET_NAMES[set] ?? `unknown-${set}`;
}
