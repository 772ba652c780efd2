import log from '../../logging/logger';
import { classifyAgentVariant } from './AgentVariant';
import { InstanceRegistry } from './InstanceRegistry';
import { classifyEvents } from '../classification/EventClassifier';
import { StateChangeCode } from '../constants/EventCodes';
import { decodeNameSegments } from '../decoding/NameBuffer';
import type { Agent, AgentKind, AwareInterval } from '../types/Agent';
import type { CombatEvent } from '../types/CombatEvent';
import { DuplicateAgentError } from '../types/DecodeErrors';
import { DiagnosticCode, DiagnosticSink } from '../types/Diagnostics';
import type { Log, Skill } from '../types/Log';
import type { RawAgent, RawEvtc } from '../types/RawRecords';

/**
 * Mutable agent state while the passes run
 */
interface AgentDraft {
  raw: RawAgent;
  kind: AgentKind;
  intervals: Array<{ instanceId: number; firstAware: number; lastAware: number }>;
  /** A despawn was seen since the last sighting */
  despawned: boolean;
  master: bigint | null;
}

function toHex(address: bigint): string {
  return `0x${address.toString(16)}`;
}

function deepFreezeEvent(event: CombatEvent): CombatEvent {
  if (event.payload.kind === 'stateChange') {
    Object.freeze(event.payload.change);
  } else if (event.payload.kind === 'buff') {
    Object.freeze(event.payload.effect);
  }
  Object.freeze(event.payload);
  return Object.freeze(event);
}

function deepFreezeAgent(agent: Agent): Agent {
  for (const interval of agent.awareIntervals) {
    Object.freeze(interval);
  }
  Object.freeze(agent.awareIntervals);
  Object.freeze(agent.kind);
  return Object.freeze(agent);
}

/**
 * Builds the semantic Log from raw records.
 *
 * Passes run strictly in order, each over the complete raw event list:
 * 1. seed agents from the agent table
 * 2. record aware intervals per instance id
 * 3. resolve minion masters against the interval set at event time
 * 4. classify events
 */
export class DomainBuilder {
  public build(raw: RawEvtc): Log {
    const diagnostics = new DiagnosticSink();
    diagnostics.addAll(raw.diagnostics);

    const drafts = this.seedAgents(raw.agents, diagnostics);
    this.collectAwareIntervals(raw, drafts);
    const registry = new InstanceRegistry(
      new Map([...drafts].map(([address, draft]): [bigint, AwareInterval[]] => [address, draft.intervals]))
    );
    this.assignMasters(raw, drafts, registry);
    const masters = this.resolveMasterChains(drafts, diagnostics);

    const events = classifyEvents(raw.events, diagnostics);

    const agents = [...drafts.values()].map((draft) =>
      this.finishAgent(draft, masters.get(draft.raw.address) ?? null)
    );
    const skills: Skill[] = raw.skills.map((skill) => Object.freeze({ id: skill.id, name: skill.name }));

    let buildId: number | null = null;
    for (const event of events) {
      if (event.payload.kind === 'stateChange' && event.payload.change.type === 'build') {
        buildId = event.payload.change.build;
        break;
      }
    }

    const collected = diagnostics.toArray();
    for (const diagnostic of collected) {
      log.warn('[DomainBuilder] Recovered from malformed data', diagnostic);
    }

    return Object.freeze({
      revision: raw.header.revision,
      eventRevision: raw.header.eventRevision,
      contentId: raw.header.contentId,
      buildId,
      agents: Object.freeze(agents),
      skills: Object.freeze(skills),
      events: Object.freeze(events.map(deepFreezeEvent)),
      diagnostics: Object.freeze(collected.map((diagnostic) => Object.freeze(diagnostic))),
    });
  }

  /**
   * Pass 1: one draft per agent-table record
   */
  private seedAgents(rawAgents: readonly RawAgent[], diagnostics: DiagnosticSink): Map<bigint, AgentDraft> {
    const drafts = new Map<bigint, AgentDraft>();
    for (const raw of rawAgents) {
      if (drafts.has(raw.address)) {
        throw new DuplicateAgentError(raw.address);
      }
      drafts.set(raw.address, {
        raw,
        kind: this.buildKind(raw, diagnostics),
        intervals: [],
        despawned: false,
        master: null,
      });
    }
    return drafts;
  }

  private buildKind(raw: RawAgent, diagnostics: DiagnosticSink): AgentKind {
    const variant = classifyAgentVariant(raw.profession, raw.elite);
    switch (variant.type) {
      case 'character':
        return { type: 'character', speciesId: variant.speciesId, name: raw.name };
      case 'gadget':
        return { type: 'gadget', volatileId: variant.volatileId, name: raw.name };
      case 'player': {
        // character name, account name, subgroup digit
        const [, account, subgroup] = decodeNameSegments(raw.nameBytes, 3);
        if ((account && !account.valid) || (subgroup && !subgroup.valid)) {
          diagnostics.add({
            code: DiagnosticCode.INVALID_TEXT,
            message: `Invalid UTF-8 in player name of ${toHex(raw.address)}`,
          });
        }
        const subgroupText = subgroup?.text.trim() ?? '';
        return {
          type: 'player',
          profession: variant.profession,
          eliteSpec: variant.eliteSpec,
          characterName: raw.name,
          accountName: account?.text ?? '',
          subgroup: /^\d+$/.test(subgroupText) ? Number(subgroupText) : null,
        };
      }
    }
  }

  /**
   * Pass 2: extend or open aware intervals from non-state-change events.
   * A new interval opens on first sight, after a despawn, or when the instance id changes.
   */
  private collectAwareIntervals(raw: RawEvtc, drafts: Map<bigint, AgentDraft>): void {
    for (const event of raw.events) {
      const draft = drafts.get(event.sourceAddress);
      if (!draft) {
        continue;
      }

      if (event.stateChange === StateChangeCode.DESPAWN) {
        draft.despawned = true;
        continue;
      }
      if (event.stateChange !== StateChangeCode.NONE || event.sourceInstanceId === 0) {
        continue;
      }

      const current = draft.intervals[draft.intervals.length - 1];
      if (!current || draft.despawned || current.instanceId !== event.sourceInstanceId) {
        draft.intervals.push({
          instanceId: event.sourceInstanceId,
          firstAware: event.time,
          lastAware: event.time,
        });
        draft.despawned = false;
      } else {
        current.lastAware = event.time;
      }
    }
  }

  /**
   * Pass 3: bind each minion to whoever held its master instance id at event time
   */
  private assignMasters(raw: RawEvtc, drafts: Map<bigint, AgentDraft>, registry: InstanceRegistry): void {
    for (const event of raw.events) {
      if (event.sourceMasterInstanceId === 0) {
        continue;
      }
      const minion = drafts.get(event.sourceAddress);
      if (!minion) {
        continue;
      }
      const master = registry.resolve(event.sourceMasterInstanceId, event.time);
      if (master === null || master === event.sourceAddress) {
        continue;
      }
      minion.master = master;
    }
  }

  /**
   * Follow master links to their root; agents caught in a loop get no master
   */
  private resolveMasterChains(
    drafts: Map<bigint, AgentDraft>,
    diagnostics: DiagnosticSink
  ): Map<bigint, bigint | null> {
    const resolved = new Map<bigint, bigint | null>();

    for (const [address, draft] of drafts) {
      if (draft.master === null) {
        resolved.set(address, null);
        continue;
      }

      const seen = new Set<bigint>([address]);
      let current = draft.master;
      let root: bigint | null = null;
      while (root === null) {
        if (seen.has(current)) {
          diagnostics.add({
            code: DiagnosticCode.MASTER_CYCLE,
            message: `Master chain of ${toHex(address)} loops back to ${toHex(current)}`,
          });
          break;
        }
        seen.add(current);
        const next = drafts.get(current)?.master ?? null;
        if (next === null) {
          root = current;
        } else {
          current = next;
        }
      }
      resolved.set(address, root);
    }

    return resolved;
  }

  private finishAgent(draft: AgentDraft, masterAddress: bigint | null): Agent {
    const intervals: AwareInterval[] = draft.intervals.map((interval) => ({ ...interval }));
    const first = intervals[0];
    const last = intervals[intervals.length - 1];
    return deepFreezeAgent({
      address: draft.raw.address,
      kind: draft.kind,
      toughness: draft.raw.toughness,
      concentration: draft.raw.concentration,
      healing: draft.raw.healing,
      condition: draft.raw.condition,
      instanceId: last ? last.instanceId : 0,
      awareIntervals: intervals,
      firstAware: first ? first.firstAware : 0,
      lastAware: last ? last.lastAware : 0,
      masterAddress,
    });
  }
}
