import type { DecodeDiagnostic } from './Diagnostics';

/**
 * Raw structural records as they appear in an EVTC byte stream.
 * Nothing here is interpreted beyond fixed-width field extraction.
 */

/**
 * Event record layouts known to the decoder, keyed by the header revision byte
 */
export enum EventRevision {
  Legacy = 0,
  Current = 1,
}

export interface RawHeader {
  /** arcdps build string, usually a `yyyymmdd` date */
  revision: string;
  /** Header revision byte selecting the event record layout */
  eventRevision: number;
  /** Boss species id or area id of the recorded content */
  contentId: number;
}

export interface RawAgent {
  address: bigint;
  profession: number;
  elite: number;
  toughness: number;
  concentration: number;
  healing: number;
  condition: number;
  /** First NUL-terminated segment of the name buffer */
  name: string;
  /** Full 64-byte name buffer; players pack account and subgroup after the first NUL */
  nameBytes: Uint8Array;
}

export interface RawSkill {
  id: number;
  name: string;
}

export interface RawEvent {
  time: number;
  sourceAddress: bigint;
  destinationAddress: bigint;
  value: number;
  buffDamage: number;
  overstackValue: number;
  skillId: number;
  sourceInstanceId: number;
  destinationInstanceId: number;
  sourceMasterInstanceId: number;
  destinationMasterInstanceId: number;
  iff: number;
  buff: number;
  result: number;
  activation: number;
  buffRemove: number;
  isNinety: boolean;
  isFifty: boolean;
  isMoving: boolean;
  stateChange: number;
  isFlanking: boolean;
  isShields: boolean;
  isOffcycle: boolean;
  /** Internal bytes the addon writes but documents no meaning for */
  reserved: Uint8Array;
}

/**
 * Complete record set produced by the decoder
 */
export interface RawEvtc {
  header: RawHeader;
  agents: RawAgent[];
  skills: RawSkill[];
  events: RawEvent[];
  diagnostics: DecodeDiagnostic[];
}
