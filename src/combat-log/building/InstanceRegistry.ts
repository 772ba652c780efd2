import type { AwareInterval } from '../types/Agent';
import { InstanceConflictError } from '../types/DecodeErrors';

interface Binding {
  address: bigint;
  interval: AwareInterval;
}

/**
 * Time-keyed lookup from instance id to agent address.
 * Instance ids are recycled, so every lookup needs the time it is asked about.
 */
export class InstanceRegistry {
  private readonly bindings = new Map<number, Binding[]>();

  /**
   * Build from each agent's aware intervals.
   * Throws InstanceConflictError when two agents hold one id over overlapping time.
   */
  constructor(intervalsByAddress: ReadonlyMap<bigint, readonly AwareInterval[]>) {
    for (const [address, intervals] of intervalsByAddress) {
      for (const interval of intervals) {
        const list = this.bindings.get(interval.instanceId) ?? [];
        list.push({ address, interval });
        this.bindings.set(interval.instanceId, list);
      }
    }

    for (const [instanceId, list] of this.bindings) {
      list.sort((a, b) => a.interval.firstAware - b.interval.firstAware);
      // furthest end seen so far and who owns it
      let reach: Binding | null = null;
      for (const current of list) {
        if (
          reach &&
          reach.address !== current.address &&
          current.interval.firstAware < reach.interval.lastAware
        ) {
          throw new InstanceConflictError(
            instanceId,
            reach.address,
            current.address,
            current.interval.firstAware
          );
        }
        if (!reach || current.interval.lastAware > reach.interval.lastAware) {
          reach = current;
        }
      }
    }
  }

  /**
   * Address holding `instanceId` at `time`, or null when nobody held it then
   */
  public resolve(instanceId: number, time: number): bigint | null {
    const list = this.bindings.get(instanceId);
    if (!list) {
      return null;
    }
    for (const binding of list) {
      if (binding.interval.firstAware <= time && time < binding.interval.lastAware) {
        return binding.address;
      }
    }
    return null;
  }

  /**
   * All bindings ever made for `instanceId`, ordered by start time
   */
  public history(instanceId: number): Array<{ address: bigint; interval: AwareInterval }> {
    return (this.bindings.get(instanceId) ?? []).map((binding) => ({ ...binding }));
  }
}
