import type { SetupResult } from '../cluster/controller.js';
import { SetupStageError, errorMessage } from '../lib/errors.js';

export type SetupReport =
  | ({ changed: true; failed: false } & SetupResult)
  | { changed: false; failed: true; stage?: string; msg: string };

export function successReport(result: SetupResult): SetupReport {
  return { changed: true, failed: false, ...result };
}

export function failureReport(err: unknown): SetupReport {
  if (err instanceof SetupStageError) {
    return { changed: false, failed: true, stage: err.stage, msg: errorMessage(err.cause) };
  }
  return { changed: false, failed: true, msg: errorMessage(err) };
}
