import log from 'electron-log/node';
import { AnalyzerConfig, type AnalyzerSettings } from '../config/AnalyzerConfig';

/**
 * Apply console level and optional file output to the shared logger
 */
export function configureLogging(settings: AnalyzerSettings): void {
  log.transports.console.level = settings.logLevel === 'off' ? false : settings.logLevel;

  const logFile = settings.logFile;
  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.level = 'info';
  } else {
    log.transports.file.level = false;
  }
}

configureLogging(AnalyzerConfig.load());

export default log;
