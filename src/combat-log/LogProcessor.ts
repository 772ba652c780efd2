import log from '../logging/logger';
import { FileByteSource, type ByteSource } from '../io/FileByteSource';
import { AnalyzerEngine } from './analysis/AnalyzerEngine';
import { DomainBuilder } from './building/DomainBuilder';
import { decodeEvtc } from './decoding/EvtcDecoder';
import type { AnalysisResult } from './types/Analysis';
import type { Log } from './types/Log';

export interface ProcessedLog {
  log: Log;
  analysis: AnalysisResult;
}

let defaultEngine: AnalyzerEngine | null = null;

function getDefaultEngine(): AnalyzerEngine {
  if (!defaultEngine) {
    defaultEngine = AnalyzerEngine.fromSettings();
  }
  return defaultEngine;
}

/**
 * Decode raw bytes and build the frozen Log. Structural errors are thrown.
 */
export function processLog(bytes: Buffer): Log {
  return new DomainBuilder().build(decodeEvtc(bytes));
}

/**
 * Outcome and challenge verdict for a built Log
 */
export function analyzeLog(combatLog: Log, engine: AnalyzerEngine = getDefaultEngine()): AnalysisResult {
  return engine.analyze(combatLog);
}

/**
 * Decode, build and analyze one log held in memory
 */
export function processBytes(bytes: Buffer, engine: AnalyzerEngine = getDefaultEngine()): ProcessedLog {
  const combatLog = processLog(bytes);
  const analysis = analyzeLog(combatLog, engine);
  log.info('[LogProcessor] Processed log', {
    encounter: analysis.encounterId,
    outcome: analysis.outcome,
    challenge: analysis.challenge,
    events: combatLog.events.length,
    diagnostics: combatLog.diagnostics.length,
  });
  return { log: combatLog, analysis };
}

/**
 * Read everything from a byte source, then process it
 */
export async function processSource(
  source: ByteSource,
  engine: AnalyzerEngine = getDefaultEngine()
): Promise<ProcessedLog> {
  const bytes = await source.read();
  return processBytes(bytes, engine);
}

/**
 * Process a plain log file from disk
 */
export async function processFile(path: string, engine: AnalyzerEngine = getDefaultEngine()): Promise<ProcessedLog> {
  try {
    return await processSource(new FileByteSource(path), engine);
  } catch (error) {
    log.error('[LogProcessor] Failed to process log file', { path, error });
    throw error;
  }
}
