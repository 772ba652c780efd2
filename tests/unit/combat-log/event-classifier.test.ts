import { describe, it, expect } from 'vitest';
import {
  classifyEvent,
  classifyEvents,
  classifyPayload,
} from '../../../src/combat-log/classification/EventClassifier';
import { StateChangeCode } from '../../../src/combat-log/constants/EventCodes';
import { DiagnosticCode, DiagnosticSink } from '../../../src/combat-log/types/Diagnostics';
import type { RawEvent } from '../../../src/combat-log/types/RawRecords';

function rawEvent(fields: Partial<RawEvent> = {}): RawEvent {
  return {
    time: 0,
    sourceAddress: 0x100n,
    destinationAddress: 0x200n,
    value: 0,
    buffDamage: 0,
    overstackValue: 0,
    skillId: 42,
    sourceInstanceId: 1,
    destinationInstanceId: 2,
    sourceMasterInstanceId: 0,
    destinationMasterInstanceId: 0,
    iff: 0,
    buff: 0,
    result: 0,
    activation: 0,
    buffRemove: 0,
    isNinety: false,
    isFifty: false,
    isMoving: false,
    stateChange: 0,
    isFlanking: false,
    isShields: false,
    isOffcycle: false,
    reserved: new Uint8Array(4),
    ...fields,
  };
}

describe('EventClassifier', () => {
  describe('precedence', () => {
    it('prefers the state change over every other flag', () => {
      const payload = classifyPayload(rawEvent({ stateChange: 4, activation: 1, buffRemove: 1, buff: 1 }));

      expect(payload).toEqual({ kind: 'stateChange', change: { type: 'changeDead', agent: 0x100n } });
    });

    it('prefers the activation over buff removal and buff', () => {
      const payload = classifyPayload(rawEvent({ activation: 1, buffRemove: 1, buff: 1, value: 750 }));

      expect(payload).toEqual({ kind: 'activation', activation: 'normal', skillId: 42, durationMs: 750 });
    });

    it('prefers the buff removal over the buff', () => {
      const payload = classifyPayload(rawEvent({ buffRemove: 2, buff: 1, value: 3000, buffDamage: 1000 }));

      expect(payload).toEqual({
        kind: 'buffRemoval',
        removal: 'single',
        buffId: 42,
        totalDuration: 3000,
        longestStack: 1000,
      });
    });
  });

  describe('buff', () => {
    it('reads a value without tick damage as an application', () => {
      expect(classifyPayload(rawEvent({ buff: 1, value: 5000, overstackValue: 120 }))).toEqual({
        kind: 'buff',
        buffId: 42,
        effect: { type: 'application', duration: 5000, overstack: 120 },
      });
    });

    it('reads neither value nor damage as a negated tick', () => {
      expect(classifyPayload(rawEvent({ buff: 1 }))).toEqual({
        kind: 'buff',
        buffId: 42,
        effect: { type: 'negatedTick' },
      });
    });

    it('reads damage without value as a tick, keeping the sign', () => {
      expect(classifyPayload(rawEvent({ buff: 1, buffDamage: -300 }))).toEqual({
        kind: 'buff',
        buffId: 42,
        effect: { type: 'damageTick', damage: -300 },
      });
    });

    it('leaves both value and damage set as unknown', () => {
      expect(classifyPayload(rawEvent({ buff: 1, value: 10, buffDamage: 10 }))).toEqual({
        kind: 'unknown',
        reason: 'ambiguousBuff',
        code: 1,
      });
    });
  });

  describe('physical', () => {
    it('reads damage and result', () => {
      expect(classifyPayload(rawEvent({ value: 1234, result: 1 }))).toEqual({
        kind: 'physical',
        skillId: 42,
        damage: 1234,
        result: 'critical',
      });
    });

    it('classifies an unknown result as unknown', () => {
      expect(classifyPayload(rawEvent({ result: 12 }))).toEqual({
        kind: 'unknown',
        reason: 'unrecognizedResult',
        code: 12,
      });
    });
  });

  describe('state changes', () => {
    it('reads health as hundredths of a percent', () => {
      const payload = classifyPayload(
        rawEvent({ stateChange: StateChangeCode.HEALTH_UPDATE, destinationAddress: 7500n })
      );

      expect(payload).toEqual({
        kind: 'stateChange',
        change: { type: 'healthUpdate', agent: 0x100n, health: 7500 },
      });
    });

    it('reads both timestamps from the log start marker', () => {
      const payload = classifyPayload(
        rawEvent({ stateChange: StateChangeCode.LOG_START, value: 1700000000, buffDamage: 1234 })
      );

      expect(payload).toEqual({
        kind: 'stateChange',
        change: { type: 'logStart', serverTimestamp: 1700000000, localTimestamp: 1234 },
      });
    });

    it('reads position floats from the destination and value bits', () => {
      const payload = classifyPayload(
        rawEvent({
          stateChange: StateChangeCode.POSITION,
          destinationAddress: 0x3fc00000c0000000n,
          value: 0x3e800000,
        })
      );

      expect(payload).toEqual({
        kind: 'stateChange',
        change: { type: 'position', agent: 0x100n, x: 1.5, y: -2, z: 0.25 },
      });
    });

    it('reads reward id and type', () => {
      const payload = classifyPayload(
        rawEvent({ stateChange: StateChangeCode.REWARD, destinationAddress: 55821n, value: 13 })
      );

      expect(payload).toEqual({
        kind: 'stateChange',
        change: { type: 'reward', agent: 0x100n, rewardId: 55821, rewardType: 13 },
      });
    });

    it('reads the game build from the source address', () => {
      const payload = classifyPayload(rawEvent({ stateChange: StateChangeCode.GW_BUILD, sourceAddress: 150000n }));

      expect(payload).toEqual({ kind: 'stateChange', change: { type: 'build', build: 150000 } });
    });

    it('separates known codes without a variant from codes newer than the decoder', () => {
      expect(classifyPayload(rawEvent({ stateChange: StateChangeCode.GUILD }))).toEqual({
        kind: 'unknown',
        reason: 'unhandledStateChange',
        code: 29,
      });
      expect(classifyPayload(rawEvent({ stateChange: 40 }))).toEqual({
        kind: 'unknown',
        reason: 'unrecognizedStateChange',
        code: 40,
      });
    });
  });

  describe('unrecognized flags', () => {
    it('classifies unknown activation and removal codes as unknown', () => {
      expect(classifyPayload(rawEvent({ activation: 9 }))).toEqual({
        kind: 'unknown',
        reason: 'unrecognizedActivation',
        code: 9,
      });
      expect(classifyPayload(rawEvent({ buffRemove: 7 }))).toEqual({
        kind: 'unknown',
        reason: 'unrecognizedBuffRemoval',
        code: 7,
      });
    });
  });

  describe('classifyEvent', () => {
    it('keeps addressing and maps the iff code', () => {
      const event = classifyEvent(rawEvent({ time: 99, iff: 1, isFlanking: true }));

      expect(event).toMatchObject({
        time: 99,
        sourceAddress: 0x100n,
        destinationAddress: 0x200n,
        sourceInstanceId: 1,
        destinationInstanceId: 2,
        iff: 'foe',
        isFlanking: true,
      });
      expect(classifyEvent(rawEvent({ iff: 5 })).iff).toBe('unknown');
    });
  });

  describe('classifyEvents', () => {
    it('keeps every record and folds unrecognized codes into counted diagnostics', () => {
      const sink = new DiagnosticSink();

      const events = classifyEvents(
        [rawEvent({ stateChange: 40 }), rawEvent({ activation: 9 }), rawEvent({ stateChange: 40 })],
        sink
      );

      expect(events).toHaveLength(3);
      expect(sink.toArray()).toEqual([
        { code: DiagnosticCode.UNRECOGNIZED_CODE, message: 'Unrecognized stateChange=40', count: 2 },
        { code: DiagnosticCode.UNRECOGNIZED_CODE, message: 'Unrecognized activation=9', count: 1 },
      ]);
    });
  });
});
