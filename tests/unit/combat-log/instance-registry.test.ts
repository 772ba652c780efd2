import { describe, it, expect } from 'vitest';
import { InstanceRegistry } from '../../../src/combat-log/building/InstanceRegistry';
import type { AwareInterval } from '../../../src/combat-log/types/Agent';
import { InstanceConflictError } from '../../../src/combat-log/types/DecodeErrors';

function registry(entries: Array<[bigint, AwareInterval[]]>): InstanceRegistry {
  return new InstanceRegistry(new Map(entries));
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('InstanceRegistry', () => {
  it('resolves within the half-open interval only', () => {
    const instances = registry([[0xan, [{ instanceId: 5, firstAware: 100, lastAware: 200 }]]]);

    expect(instances.resolve(5, 99)).toBeNull();
    expect(instances.resolve(5, 100)).toBe(0xan);
    expect(instances.resolve(5, 199)).toBe(0xan);
    expect(instances.resolve(5, 200)).toBeNull();
  });

  it('returns null for an instance id nobody held', () => {
    expect(registry([]).resolve(5, 100)).toBeNull();
  });

  it('disambiguates a reused instance id by time', () => {
    const instances = registry([
      [0xbn, [{ instanceId: 5, firstAware: 200, lastAware: 300 }]],
      [0xan, [{ instanceId: 5, firstAware: 100, lastAware: 200 }]],
    ]);

    expect(instances.resolve(5, 150)).toBe(0xan);
    expect(instances.resolve(5, 250)).toBe(0xbn);
    expect(instances.history(5).map((binding) => binding.address)).toEqual([0xan, 0xbn]);
  });

  it('rejects overlapping intervals of different agents', () => {
    const error = captureError(() =>
      registry([
        [0xan, [{ instanceId: 5, firstAware: 100, lastAware: 200 }]],
        [0xbn, [{ instanceId: 5, firstAware: 150, lastAware: 300 }]],
      ])
    );

    expect(error).toBeInstanceOf(InstanceConflictError);
    expect(error).toMatchObject({ instanceId: 5, firstAddress: 0xan, secondAddress: 0xbn, time: 150 });
  });

  it('detects an overlap hidden behind a shorter interval of the first agent', () => {
    const error = captureError(() =>
      registry([
        [
          0xan,
          [
            { instanceId: 5, firstAware: 0, lastAware: 1000 },
            { instanceId: 5, firstAware: 10, lastAware: 20 },
          ],
        ],
        [0xbn, [{ instanceId: 5, firstAware: 30, lastAware: 40 }]],
      ])
    );

    expect(error).toMatchObject({ firstAddress: 0xan, secondAddress: 0xbn, time: 30 });
  });

  it('allows the same id on different agents when the intervals only touch', () => {
    expect(() =>
      registry([
        [0xan, [{ instanceId: 5, firstAware: 100, lastAware: 200 }]],
        [0xbn, [{ instanceId: 5, firstAware: 200, lastAware: 300 }]],
      ])
    ).not.toThrow();
  });
});
