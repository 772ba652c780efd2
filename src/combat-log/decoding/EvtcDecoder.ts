import log from '../../logging/logger';
import { BinaryCursor } from './BinaryCursor';
import { decodeNulTerminated } from './NameBuffer';
import { BadMagicError } from '../types/DecodeErrors';
import { DiagnosticCode, DiagnosticSink } from '../types/Diagnostics';
import {
  EventRevision,
  type RawAgent,
  type RawEvent,
  type RawEvtc,
  type RawHeader,
  type RawSkill,
} from '../types/RawRecords';

export const EVTC_MAGIC = 'EVTC';
export const HEADER_SIZE = 16;
export const AGENT_RECORD_SIZE = 96;
export const SKILL_RECORD_SIZE = 68;
export const EVENT_RECORD_SIZE = 64;
export const NAME_BUFFER_SIZE = 64;

/**
 * Decoded section plus the offset right after it
 */
export interface Section<T> {
  value: T;
  offset: number;
}

function readName(cursor: BinaryCursor, section: string, diagnostics: DiagnosticSink): {
  name: string;
  bytes: Uint8Array;
} {
  const offset = cursor.offset;
  const bytes = cursor.bytes(NAME_BUFFER_SIZE, section);
  const decoded = decodeNulTerminated(bytes);
  if (!decoded.valid) {
    diagnostics.add({
      code: DiagnosticCode.INVALID_TEXT,
      message: `Invalid UTF-8 in ${section} name, kept "${decoded.text}"`,
      offset,
    });
  }
  return { name: decoded.text, bytes };
}

/**
 * Parse the fixed 16-byte header: magic, build string, revision byte, content id
 */
export function decodeHeader(bytes: Buffer): Section<RawHeader> {
  const magic = bytes.subarray(0, EVTC_MAGIC.length).toString('latin1');
  if (magic !== EVTC_MAGIC) {
    throw new BadMagicError(magic);
  }

  const cursor = new BinaryCursor(bytes, EVTC_MAGIC.length);
  cursor.require(HEADER_SIZE - EVTC_MAGIC.length, 'header');

  const revision = decodeNulTerminated(cursor.bytes(8, 'header')).text;
  const eventRevision = cursor.u8('header');
  const contentId = cursor.u16('header');
  cursor.skip(1, 'header');

  return {
    value: { revision, eventRevision, contentId },
    offset: cursor.offset,
  };
}

/**
 * Parse the agent table: u32 count followed by 96-byte records
 */
export function decodeAgentTable(
  bytes: Buffer,
  offset: number,
  diagnostics: DiagnosticSink
): Section<RawAgent[]> {
  const cursor = new BinaryCursor(bytes, offset);
  const count = cursor.u32('agent count');
  cursor.require(count * AGENT_RECORD_SIZE, 'agent table');

  const agents: RawAgent[] = [];
  for (let i = 0; i < count; i++) {
    const address = cursor.u64('agent');
    const profession = cursor.u32('agent');
    const elite = cursor.u32('agent');
    const toughness = cursor.i16('agent');
    const concentration = cursor.i16('agent');
    const healing = cursor.i16('agent');
    cursor.skip(2, 'agent');
    const condition = cursor.i16('agent');
    cursor.skip(2, 'agent');
    const { name, bytes: nameBytes } = readName(cursor, 'agent', diagnostics);
    cursor.skip(4, 'agent');

    agents.push({ address, profession, elite, toughness, concentration, healing, condition, name, nameBytes });
  }

  return { value: agents, offset: cursor.offset };
}

/**
 * Parse the skill table: u32 count followed by 68-byte records
 */
export function decodeSkillTable(
  bytes: Buffer,
  offset: number,
  diagnostics: DiagnosticSink
): Section<RawSkill[]> {
  const cursor = new BinaryCursor(bytes, offset);
  const count = cursor.u32('skill count');
  cursor.require(count * SKILL_RECORD_SIZE, 'skill table');

  const skills: RawSkill[] = [];
  for (let i = 0; i < count; i++) {
    const id = cursor.i32('skill');
    const { name } = readName(cursor, 'skill', diagnostics);
    skills.push({ id, name });
  }

  return { value: skills, offset: cursor.offset };
}

function decodeLegacyEvent(cursor: BinaryCursor): RawEvent {
  const time = Number(cursor.u64('event'));
  const sourceAddress = cursor.u64('event');
  const destinationAddress = cursor.u64('event');
  const value = cursor.i32('event');
  const buffDamage = cursor.i32('event');
  const overstackValue = cursor.u16('event');
  const skillId = cursor.u16('event');
  const sourceInstanceId = cursor.u16('event');
  const destinationInstanceId = cursor.u16('event');
  const sourceMasterInstanceId = cursor.u16('event');
  const internal = cursor.bytes(9, 'event');
  const iff = cursor.u8('event');
  const buff = cursor.u8('event');
  const result = cursor.u8('event');
  const activation = cursor.u8('event');
  const buffRemove = cursor.u8('event');
  const isNinety = cursor.u8('event') !== 0;
  const isFifty = cursor.u8('event') !== 0;
  const isMoving = cursor.u8('event') !== 0;
  const stateChange = cursor.u8('event');
  const isFlanking = cursor.u8('event') !== 0;
  const isShields = cursor.u8('event') !== 0;
  const padding = cursor.bytes(2, 'event');

  const reserved = new Uint8Array(internal.length + padding.length);
  reserved.set(internal, 0);
  reserved.set(padding, internal.length);

  return {
    time,
    sourceAddress,
    destinationAddress,
    value,
    buffDamage,
    overstackValue,
    skillId,
    sourceInstanceId,
    destinationInstanceId,
    sourceMasterInstanceId,
    destinationMasterInstanceId: 0,
    iff,
    buff,
    result,
    activation,
    buffRemove,
    isNinety,
    isFifty,
    isMoving,
    stateChange,
    isFlanking,
    isShields,
    isOffcycle: false,
    reserved,
  };
}

function decodeCurrentEvent(cursor: BinaryCursor): RawEvent {
  const time = Number(cursor.u64('event'));
  const sourceAddress = cursor.u64('event');
  const destinationAddress = cursor.u64('event');
  const value = cursor.i32('event');
  const buffDamage = cursor.i32('event');
  const overstackValue = cursor.u32('event');
  const skillId = cursor.u32('event');
  const sourceInstanceId = cursor.u16('event');
  const destinationInstanceId = cursor.u16('event');
  const sourceMasterInstanceId = cursor.u16('event');
  const destinationMasterInstanceId = cursor.u16('event');
  const iff = cursor.u8('event');
  const buff = cursor.u8('event');
  const result = cursor.u8('event');
  const activation = cursor.u8('event');
  const buffRemove = cursor.u8('event');
  const isNinety = cursor.u8('event') !== 0;
  const isFifty = cursor.u8('event') !== 0;
  const isMoving = cursor.u8('event') !== 0;
  const stateChange = cursor.u8('event');
  const isFlanking = cursor.u8('event') !== 0;
  const isShields = cursor.u8('event') !== 0;
  const isOffcycle = cursor.u8('event') !== 0;
  const reserved = cursor.bytes(4, 'event');

  return {
    time,
    sourceAddress,
    destinationAddress,
    value,
    buffDamage,
    overstackValue,
    skillId,
    sourceInstanceId,
    destinationInstanceId,
    sourceMasterInstanceId,
    destinationMasterInstanceId,
    iff,
    buff,
    result,
    activation,
    buffRemove,
    isNinety,
    isFifty,
    isMoving,
    stateChange,
    isFlanking,
    isShields,
    isOffcycle,
    reserved,
  };
}

/**
 * Parse 64-byte event records until the input is exhausted.
 * A trailing partial record means the capture was cut mid-write and fails the decode.
 */
export function decodeEvents(
  bytes: Buffer,
  offset: number,
  eventRevision: number,
  diagnostics: DiagnosticSink
): RawEvent[] {
  let decodeRecord = decodeCurrentEvent;
  if (eventRevision === EventRevision.Legacy) {
    decodeRecord = decodeLegacyEvent;
  } else if (eventRevision !== EventRevision.Current) {
    diagnostics.add({
      code: DiagnosticCode.UNSUPPORTED_REVISION,
      message: `Unsupported event revision ${eventRevision}, decoding with revision ${EventRevision.Current} layout`,
      offset: 12,
    });
  }

  const cursor = new BinaryCursor(bytes, offset);
  const events: RawEvent[] = [];
  while (cursor.remaining > 0) {
    cursor.require(EVENT_RECORD_SIZE, 'event');
    events.push(decodeRecord(cursor));
  }
  return events;
}

/**
 * Decode a complete EVTC buffer into raw records
 */
export function decodeEvtc(bytes: Buffer): RawEvtc {
  const diagnostics = new DiagnosticSink();

  const header = decodeHeader(bytes);
  const agents = decodeAgentTable(bytes, header.offset, diagnostics);
  const skills = decodeSkillTable(bytes, agents.offset, diagnostics);
  const events = decodeEvents(bytes, skills.offset, header.value.eventRevision, diagnostics);

  log.debug('[EvtcDecoder] Decoded raw records', {
    revision: header.value.revision,
    eventRevision: header.value.eventRevision,
    contentId: header.value.contentId,
    agents: agents.value.length,
    skills: skills.value.length,
    events: events.length,
  });

  return {
    header: header.value,
    agents: agents.value,
    skills: skills.value,
    events,
    diagnostics: diagnostics.toArray(),
  };
}
