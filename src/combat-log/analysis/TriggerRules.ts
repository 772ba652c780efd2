import type { ChallengeCondition, VictoryTrigger } from '../constants/EncounterCatalog';
import { ChallengeStatus } from '../types/Analysis';
import type { EncounterObservations } from './EncounterObserver';

/**
 * A reward counts when it went to the recording player. Without a point-of-view
 * marker any reward counts; source 0 is a reward the addon did not attribute.
 */
export function isRewardAccepted(observations: EncounterObservations): boolean {
  const pov = observations.pointOfView;
  return observations.rewardSources.some((source) => pov === null || source === 0n || source === pov);
}

export function isVictoryTriggered(trigger: VictoryTrigger, observations: EncounterObservations): boolean {
  switch (trigger.kind) {
    case 'bossDeath': {
      if (observations.bossSpeciesInLog.size === 0) {
        return false;
      }
      if (trigger.require === 'any') {
        return observations.deadBossSpecies.size > 0;
      }
      return [...observations.bossSpeciesInLog].every((speciesId) => observations.deadBossSpecies.has(speciesId));
    }
    case 'buffOnBoss':
      return observations.buffsOnBoss.has(trigger.buffId);
    case 'speciesSpawn':
      return observations.spawnedSpecies.has(trigger.speciesId);
    case 'playersOutlastBoss': {
      const bossExit = observations.lastBossExitCombat;
      const playerExit = observations.lastPlayerExitCombat;
      return bossExit !== null && playerExit !== null && playerExit > bossExit + trigger.marginMs;
    }
    case 'buffOnBossAfterSkill': {
      if (!observations.lastSkillCast.has(trigger.requiredSkillId)) {
        return false;
      }
      // no phase cast: the whole log is the phase
      const phaseStart = observations.lastSkillCast.get(trigger.phaseSkillId) ?? 0;
      const applied = observations.buffsOnBoss.get(trigger.buffId);
      return applied !== undefined && applied >= phaseStart;
    }
    case 'playersOutlastAttackTarget': {
      if (observations.lastTargetableTime === null) {
        return false;
      }
      const target = observations.attackTargetsByParent.get(trigger.parentName);
      const untargetable = target === undefined ? undefined : observations.lastUntargetable.get(target);
      const playerExit = observations.lastPlayerExitCombat;
      return untargetable !== undefined && playerExit !== null && playerExit > untargetable + trigger.marginMs;
    }
  }
}

/**
 * Smallest gap between applications on the destination that received the buff most often,
 * ignoring gaps inside the duplicate window. Null when fewer than two distinct applications.
 */
export function shortestApplicationInterval(
  times: readonly number[] | undefined,
  duplicateWindowMs: number
): number | null {
  if (!times) {
    return null;
  }
  let shortest: number | null = null;
  for (let i = 1; i < times.length; i++) {
    const gap = times[i] - times[i - 1];
    if (gap > duplicateWindowMs && (shortest === null || gap < shortest)) {
      shortest = gap;
    }
  }
  return shortest;
}

function mostFrequentTarget(byDestination: Map<bigint, number[]> | undefined): number[] | undefined {
  let best: number[] | undefined;
  for (const times of byDestination?.values() ?? []) {
    if (!best || times.length > best.length) {
      best = times;
    }
  }
  return best;
}

/**
 * Evaluate one challenge condition. `decided` is true when the log is complete,
 * so an absent marker can be read as absence.
 */
export function evaluateChallengeCondition(
  condition: ChallengeCondition,
  observations: EncounterObservations,
  decided: boolean
): ChallengeStatus {
  const absent = decided ? ChallengeStatus.Inactive : ChallengeStatus.Unknown;
  switch (condition.kind) {
    case 'always':
      return ChallengeStatus.Active;
    case 'buffApplied':
      return observations.appliedBuffs.has(condition.buffId) ? ChallengeStatus.Active : absent;
    case 'speciesPresent':
      return condition.speciesIds.some((speciesId) => observations.speciesInLog.has(speciesId))
        ? ChallengeStatus.Active
        : absent;
    case 'maxHealthAtLeast': {
      const maxHealth = observations.bossMaxHealth;
      if (maxHealth === null) {
        return ChallengeStatus.Unknown;
      }
      return maxHealth >= condition.health ? ChallengeStatus.Active : ChallengeStatus.Inactive;
    }
    case 'buffInterval': {
      const times = mostFrequentTarget(observations.buffApplications.get(condition.buffId));
      const shortest = shortestApplicationInterval(times, condition.duplicateWindowMs);
      if (shortest === null) {
        return absent;
      }
      return shortest <= condition.maxIntervalMs ? ChallengeStatus.Active : ChallengeStatus.Inactive;
    }
  }
}

/**
 * Conditions are alternatives: any Active wins, then any Unknown
 */
export function combineChallengeStatuses(statuses: readonly ChallengeStatus[]): ChallengeStatus {
  if (statuses.includes(ChallengeStatus.Active)) {
    return ChallengeStatus.Active;
  }
  if (statuses.includes(ChallengeStatus.Unknown)) {
    return ChallengeStatus.Unknown;
  }
  return ChallengeStatus.Inactive;
}
