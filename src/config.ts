import * as path from 'path';

export const DEFAULT_STEP_DIR = 'step-events';

/**
 * Directory for step exports: STEP_EVENTS_DIR, else ./step-events
 */
export function getStepDir(): string {
  const fromEnv = process.env.STEP_EVENTS_DIR?.trim();
  return path.resolve(fromEnv || DEFAULT_STEP_DIR);
}

/**
 * Default export path for a run
 *
 * @param runId - Recorder run id
 * @param extension - 'jsonl' (one record per line) or 'json' (one array)
 */
export function defaultStepFilePath(runId: string, extension: 'jsonl' | 'json' = 'jsonl'): string {
  return path.join(getStepDir(), `${runId}.${extension}`);
}
