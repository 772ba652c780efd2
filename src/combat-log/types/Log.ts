import type { Agent } from './Agent';
import type { CombatEvent } from './CombatEvent';
import type { DecodeDiagnostic } from './Diagnostics';

export interface Skill {
  readonly id: number;
  readonly name: string;
}

/**
 * Finished, frozen model of one recorded encounter
 */
export interface Log {
  /** arcdps build string from the header */
  readonly revision: string;
  readonly eventRevision: number;
  readonly contentId: number;
  /** Game build from the build state change, null when the log carries none */
  readonly buildId: number | null;
  readonly agents: readonly Agent[];
  readonly skills: readonly Skill[];
  /** Non-decreasing time order, as recorded */
  readonly events: readonly CombatEvent[];
  readonly diagnostics: readonly DecodeDiagnostic[];
}
