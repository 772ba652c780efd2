export { analyzeLog, processLog, processBytes, processFile, processSource, type ProcessedLog } from './combat-log/LogProcessor';
export { decodeEvtc } from './combat-log/decoding/EvtcDecoder';
export { DomainBuilder } from './combat-log/building/DomainBuilder';
export { classifyEvent, classifyEvents, classifyPayload } from './combat-log/classification/EventClassifier';
export { AnalyzerEngine } from './combat-log/analysis/AnalyzerEngine';
export { resolveEncounter, type EncounterIdentity } from './combat-log/analysis/EncounterResolver';
export {
  CatalogValidationError,
  EncounterCatalog,
  loadEncounterCatalog,
  parseEncounterCatalog,
  type ChallengeCondition,
  type EncounterCatalogData,
  type EncounterDefinition,
  type VictoryTrigger,
} from './combat-log/constants/EncounterCatalog';
export * from './combat-log/constants/EventCodes';
export * from './combat-log/constants/Professions';
export * from './combat-log/utils/LogQueries';
export * from './combat-log/types/Agent';
export * from './combat-log/types/Analysis';
export type * from './combat-log/types/CombatEvent';
export * from './combat-log/types/DecodeErrors';
export * from './combat-log/types/Diagnostics';
export type { Log, Skill } from './combat-log/types/Log';
export * from './combat-log/types/RawRecords';
export { AnalyzerConfig, type AnalyzerSettings } from './config/AnalyzerConfig';
export { configureLogging } from './logging/logger';
export { BufferByteSource, FileByteSource, type ByteSource } from './io/FileByteSource';
