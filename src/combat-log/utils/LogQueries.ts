import {
  isCharacter,
  isGadget,
  isPlayer,
  type Agent,
  type CharacterKind,
  type GadgetKind,
  type PlayerKind,
} from '../types/Agent';
import type { CombatEvent, StateChange } from '../types/CombatEvent';
import type { Log } from '../types/Log';

/**
 * Read-only queries over a finished Log
 */

export function getPlayers(log: Log): Array<Agent & { kind: PlayerKind }> {
  return log.agents.filter(isPlayer);
}

export function getCharacters(log: Log): Array<Agent & { kind: CharacterKind }> {
  return log.agents.filter(isCharacter);
}

export function getGadgets(log: Log): Array<Agent & { kind: GadgetKind }> {
  return log.agents.filter(isGadget);
}

export function getAgentByAddress(log: Log, address: bigint): Agent | null {
  return log.agents.find((agent) => agent.address === address) ?? null;
}

/**
 * Agent that held `instanceId` at `time`; instance ids are reused, so the time is required
 */
export function getAgentByInstance(log: Log, instanceId: number, time: number): Agent | null {
  for (const agent of log.agents) {
    for (const interval of agent.awareIntervals) {
      if (interval.instanceId === instanceId && interval.firstAware <= time && time < interval.lastAware) {
        return agent;
      }
    }
  }
  return null;
}

/**
 * Minions whose resolved master is `address`
 */
export function getMinions(log: Log, address: bigint): Agent[] {
  return log.agents.filter((agent) => agent.masterAddress === address);
}

/**
 * Narrow an event to a state change of the given type
 */
export function getStateChange<T extends StateChange['type']>(
  event: CombatEvent,
  type: T
): Extract<StateChange, { type: T }> | null {
  if (event.payload.kind !== 'stateChange') {
    return null;
  }
  const change = event.payload.change;
  return isStateChangeOfType(change, type) ? change : null;
}

function isStateChangeOfType<T extends StateChange['type']>(
  change: StateChange,
  type: T
): change is Extract<StateChange, { type: T }> {
  return change.type === type;
}

/**
 * The player who recorded the log, null when the log has no point-of-view marker
 */
export function getPointOfView(log: Log): Agent | null {
  for (const event of log.events) {
    const change = getStateChange(event, 'pointOfView');
    if (change) {
      return getAgentByAddress(log, change.agent);
    }
  }
  return null;
}

/**
 * Whether a reward marker was recorded
 */
export function wasRewarded(log: Log): boolean {
  return log.events.some((event) => getStateChange(event, 'reward') !== null);
}

/**
 * Whether the log contains its end marker, i.e. the capture was not cut short
 */
export function isComplete(log: Log): boolean {
  return log.events.some((event) => getStateChange(event, 'logEnd') !== null);
}

/**
 * Milliseconds between the first and the last event
 */
export function getDuration(log: Log): number {
  if (log.events.length === 0) {
    return 0;
  }
  return log.events[log.events.length - 1].time - log.events[0].time;
}

/**
 * Server timestamps (unix seconds) from the start and end markers
 */
export function getLogTimestamps(log: Log): { start: number | null; end: number | null } {
  let start: number | null = null;
  let end: number | null = null;
  for (const event of log.events) {
    const begin = getStateChange(event, 'logStart');
    if (begin && start === null) {
      start = begin.serverTimestamp;
    }
    const finish = getStateChange(event, 'logEnd');
    if (finish) {
      end = finish.serverTimestamp;
    }
  }
  return { start, end };
}
