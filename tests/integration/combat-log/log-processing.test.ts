import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AnalyzerEngine } from '../../../src/combat-log/analysis/AnalyzerEngine';
import { loadEncounterCatalog } from '../../../src/combat-log/constants/EncounterCatalog';
import { StateChangeCode } from '../../../src/combat-log/constants/EventCodes';
import { analyzeLog, processBytes, processFile, processLog, processSource } from '../../../src/combat-log/LogProcessor';
import { ChallengeStatus, Outcome } from '../../../src/combat-log/types/Analysis';
import {
  BadMagicError,
  TruncatedError,
  UnsupportedContainerError,
} from '../../../src/combat-log/types/DecodeErrors';
import { BufferByteSource } from '../../../src/io/FileByteSource';
import { EvtcLogBuilder } from '../../helpers/EvtcLogBuilder';

const GUARDIAN = 0x1000n;
const RANGER = 0x1001n;
const PET = 0x1002n;
const CAIRN = 0x2000n;

/**
 * A short Cairn kill: two players, a pet, the boss, a challenge buff and a reward
 */
function cairnKill(eventRevision: number): EvtcLogBuilder {
  return new EvtcLogBuilder()
    .withHeader({ build: '20240612', eventRevision, contentId: 17194 })
    .addPlayer(GUARDIAN, { profession: 1, elite: 62, character: 'Test Guardian', account: ':Test.1111', subgroup: '1' })
    .addPlayer(RANGER, { profession: 4, elite: 55, character: 'Test Ranger', account: ':Test.2222', subgroup: '2' })
    .addCharacter(PET, 6001, 'Test Pet')
    .addCharacter(CAIRN, 17194, 'Cairn the Indomitable')
    .addSkill(9001, 'Test Strike')
    .addStateChange(0, StateChangeCode.LOG_START, { value: 1700000000, buffDamage: 500 })
    .addStateChange(0, StateChangeCode.GW_BUILD, { sourceAddress: 150000n })
    .addStateChange(0, StateChangeCode.POINT_OF_VIEW, { sourceAddress: GUARDIAN })
    .addStateChange(0, StateChangeCode.MAX_HEALTH_UPDATE, { sourceAddress: CAIRN, destinationAddress: 19999998n })
    .addHit(100, GUARDIAN, 10, { destinationAddress: CAIRN, skillId: 9001 })
    .addHit(150, RANGER, 11, { destinationAddress: CAIRN })
    .addHit(200, PET, 12, { sourceMasterInstanceId: 11, destinationAddress: CAIRN })
    .addHit(250, CAIRN, 13, { destinationAddress: GUARDIAN })
    .addBuffApplication(300, GUARDIAN, 38098, 4000)
    .addHit(400, RANGER, 11)
    .addHit(450, GUARDIAN, 10)
    .addHit(500, CAIRN, 13)
    .addStateChange(900, StateChangeCode.CHANGE_DEAD, { sourceAddress: CAIRN })
    .addStateChange(1000, StateChangeCode.REWARD, { sourceAddress: GUARDIAN, destinationAddress: 55821n, value: 13 })
    .addStateChange(1100, StateChangeCode.LOG_END, { value: 1700000002 });
}

describe('log processing', () => {
  const engine = new AnalyzerEngine(loadEncounterCatalog());
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'evtc-processing-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('decodes, builds and analyzes a complete kill', () => {
    const { log, analysis } = processBytes(cairnKill(1).toBuffer(), engine);

    expect(analysis).toEqual({
      encounterId: 'cairn',
      encounterName: 'Cairn the Indomitable',
      gameMode: 'raid',
      outcome: Outcome.Success,
      challenge: ChallengeStatus.Active,
    });
    expect(log.buildId).toBe(150000);
    expect(log.agents).toHaveLength(4);
    expect(log.events).toHaveLength(15);
    expect(log.skills).toEqual([{ id: 9001, name: 'Test Strike' }]);
    expect(log.diagnostics).toEqual([]);
    expect(log.agents.find((agent) => agent.address === PET)?.masterAddress).toBe(RANGER);
  });

  it('analyzes a built log the same way as the one-shot path', () => {
    const bytes = cairnKill(1).toBuffer();

    expect(analyzeLog(processLog(bytes), engine)).toEqual(processBytes(bytes, engine).analysis);
  });

  it('reads the legacy event layout to the same verdict', () => {
    const { log, analysis } = processBytes(cairnKill(0).toBuffer(), engine);

    expect(log.eventRevision).toBe(0);
    expect(analysis).toMatchObject({ outcome: Outcome.Success, challenge: ChallengeStatus.Active });
  });

  it('reports unknown for the same kill cut short before the boss died', () => {
    const full = cairnKill(1).toBuffer();
    // header, tables, then the first ten events
    const tablesEnd = 16 + 4 + 4 * 96 + 4 + 68;
    const cut = full.subarray(0, tablesEnd + 10 * 64);

    const { analysis } = processBytes(cut, engine);

    expect(analysis).toMatchObject({ outcome: Outcome.Unknown, challenge: ChallengeStatus.Active });
  });

  it('surfaces a cut mid-record as a structural error', () => {
    const full = cairnKill(1).toBuffer();

    expect(() => processBytes(full.subarray(0, full.length - 20), engine)).toThrow(TruncatedError);
  });

  it('processes files from disk, in parallel', async () => {
    const kill = path.join(tempDir, 'kill.evtc');
    const empty = path.join(tempDir, 'empty.evtc');
    fs.writeFileSync(kill, cairnKill(1).toBuffer());
    fs.writeFileSync(empty, new EvtcLogBuilder().toBuffer());

    const [first, second] = await Promise.all([processFile(kill, engine), processFile(empty, engine)]);

    expect(first.analysis.outcome).toBe(Outcome.Success);
    expect(second.analysis).toEqual({
      encounterId: null,
      encounterName: null,
      gameMode: 'unknown',
      outcome: Outcome.Unknown,
      challenge: ChallengeStatus.Unknown,
    });
  });

  it('rejects files that are not logs', async () => {
    const notLog = path.join(tempDir, 'notes.txt');
    const zipped = path.join(tempDir, 'kill.zevtc');
    fs.writeFileSync(notLog, 'plain text, not a combat log');
    fs.writeFileSync(zipped, Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.alloc(60)]));

    await expect(processFile(notLog, engine)).rejects.toBeInstanceOf(BadMagicError);
    await expect(processFile(zipped, engine)).rejects.toBeInstanceOf(UnsupportedContainerError);
  });

  it('gives identical results for identical bytes', async () => {
    const bytes = cairnKill(1).toBuffer();

    const first = await processSource(new BufferByteSource(bytes), engine);
    const second = await processSource(new BufferByteSource(Buffer.from(bytes)), engine);

    expect(second.analysis).toEqual(first.analysis);
    expect(second.log.agents).toEqual(first.log.agents);
    expect(second.log.events).toEqual(first.log.events);
  });
});
