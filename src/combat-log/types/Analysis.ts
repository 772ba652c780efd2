import type { Log } from './Log';

export enum Outcome {
  Success = 'Success',
  Failure = 'Failure',
  Unknown = 'Unknown',
}

export enum ChallengeStatus {
  Active = 'Active',
  Inactive = 'Inactive',
  Unknown = 'Unknown',
}

export type EncounterCategory = 'raid' | 'fractal' | 'strike' | 'golem';

export type GameMode = EncounterCategory | 'wvw' | 'unknown';

export interface AnalysisResult {
  /** Catalog id of the resolved encounter, null for the generic fallback */
  encounterId: string | null;
  encounterName: string | null;
  gameMode: GameMode;
  outcome: Outcome;
  /** Null when the encounter has no challenge variant */
  challenge: ChallengeStatus | null;
}

/**
 * What a single analyzer decides for one log
 */
export interface Verdict {
  outcome: Outcome;
  challenge: ChallengeStatus | null;
}

/**
 * Per-encounter analysis. Implementations keep no state between calls.
 */
export interface EncounterAnalyzer {
  analyze(log: Log): Verdict;
}
