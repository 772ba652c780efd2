import log from '../../logging/logger';
import { AnalyzerConfig, type AnalyzerSettings } from '../../config/AnalyzerConfig';
import { loadEncounterCatalog, type EncounterCatalog } from '../constants/EncounterCatalog';
import type { AnalysisResult, EncounterAnalyzer } from '../types/Analysis';
import type { Log } from '../types/Log';
import { CatalogEncounterAnalyzer, FallbackAnalyzer } from './CatalogEncounterAnalyzer';
import { resolveEncounter } from './EncounterResolver';

/**
 * Registry of encounter analyzers, built once from a frozen catalog.
 * `analyze` holds no state between calls, so one engine can serve concurrent callers.
 */
export class AnalyzerEngine {
  private readonly analyzers: ReadonlyMap<string, EncounterAnalyzer>;
  private readonly fallback: EncounterAnalyzer = new FallbackAnalyzer();

  constructor(private readonly catalog: EncounterCatalog) {
    const analyzers = new Map<string, EncounterAnalyzer>();
    for (const encounter of catalog.encounters) {
      analyzers.set(encounter.id, new CatalogEncounterAnalyzer(encounter));
    }
    this.analyzers = analyzers;
  }

  /**
   * Engine over the built-in catalog plus the configured extra catalog, if any
   */
  public static fromSettings(settings: AnalyzerSettings = AnalyzerConfig.load()): AnalyzerEngine {
    return new AnalyzerEngine(loadEncounterCatalog(settings.encounterCatalogPath));
  }

  public analyze(combatLog: Log): AnalysisResult {
    const identity = resolveEncounter(combatLog, this.catalog);

    switch (identity.kind) {
      case 'encounter': {
        const { encounter } = identity;
        const analyzer = this.analyzers.get(encounter.id) ?? this.fallback;
        const verdict = analyzer.analyze(combatLog);
        return {
          encounterId: encounter.id,
          encounterName: encounter.name,
          gameMode: encounter.category,
          ...verdict,
        };
      }
      case 'gameMode':
        return {
          encounterId: null,
          encounterName: identity.mode.name,
          gameMode: identity.mode.mode,
          ...this.fallback.analyze(combatLog),
        };
      case 'unrecognized':
        log.info('[AnalyzerEngine] No encounter matches log', { contentId: combatLog.contentId });
        return {
          encounterId: null,
          encounterName: null,
          gameMode: 'unknown',
          ...this.fallback.analyze(combatLog),
        };
    }
  }
}
