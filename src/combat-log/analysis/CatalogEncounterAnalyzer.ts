import log from '../../logging/logger';
import type { EncounterDefinition } from '../constants/EncounterCatalog';
import {
  ChallengeStatus,
  Outcome,
  type EncounterAnalyzer,
  type Verdict,
} from '../types/Analysis';
import type { Log } from '../types/Log';
import { EncounterObserver, type EncounterObservations, type LifeState } from './EncounterObserver';
import {
  combineChallengeStatuses,
  evaluateChallengeCondition,
  isRewardAccepted,
  isVictoryTriggered,
} from './TriggerRules';

function allGone(states: Iterable<LifeState>, isGone: (state: LifeState) => boolean): boolean {
  let count = 0;
  for (const state of states) {
    if (!isGone(state)) {
      return false;
    }
    count++;
  }
  return count > 0;
}

/**
 * Analyzer driven by one catalog entry
 */
export class CatalogEncounterAnalyzer implements EncounterAnalyzer {
  private readonly deathIsVictory: boolean;

  constructor(private readonly encounter: EncounterDefinition) {
    this.deathIsVictory = encounter.victory.some((trigger) => trigger.kind === 'bossDeath');
  }

  public analyze(combatLog: Log): Verdict {
    const observer = new EncounterObserver(this.encounter, combatLog.agents);
    for (const event of combatLog.events) {
      observer.observe(event);
    }
    const observations = observer.finish();

    const outcome = this.decideOutcome(observations);
    const challenge = this.decideChallenge(observations);

    log.debug(`[CatalogEncounterAnalyzer] ${this.encounter.id}`, {
      outcome,
      challenge,
      logEnded: observations.logEnded,
    });
    return { outcome, challenge };
  }

  private decideOutcome(observations: EncounterObservations): Outcome {
    if (isRewardAccepted(observations)) {
      return Outcome.Success;
    }
    if (this.encounter.victory.some((trigger) => isVictoryTriggered(trigger, observations))) {
      return Outcome.Success;
    }

    const bossesLost = allGone(
      observations.bossStates.values(),
      (state) => state === 'despawned' || (state === 'dead' && !this.deathIsVictory)
    );
    const squadLost = allGone(observations.playerStates.values(), (state) => state === 'dead');
    if (bossesLost || squadLost) {
      return Outcome.Failure;
    }
    return Outcome.Unknown;
  }

  private decideChallenge(observations: EncounterObservations): ChallengeStatus | null {
    const conditions = this.encounter.challenge;
    if (!conditions) {
      return null;
    }
    return combineChallengeStatuses(
      conditions.map((condition) => evaluateChallengeCondition(condition, observations, observations.logEnded))
    );
  }
}

/**
 * Used for game modes and logs no catalog entry claims
 */
export class FallbackAnalyzer implements EncounterAnalyzer {
  public analyze(): Verdict {
    return { outcome: Outcome.Unknown, challenge: ChallengeStatus.Unknown };
  }
}
