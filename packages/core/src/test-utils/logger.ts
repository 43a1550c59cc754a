import type { RunLogger } from '../util/log.js';

export interface RecordingLogger extends RunLogger {
  readonly infos: string[];
  readonly warnings: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (message) => {
      infos.push(message);
    },
    warn: (message) => {
      warnings.push(message);
    },
  };
}
