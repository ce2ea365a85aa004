// ═══════════════════════════════════════════════════════
// state.ts — The process-wide working dataset
// Set once at startup; read-only afterwards.
// ═══════════════════════════════════════════════════════
import { DatasetNotReadyError } from '../shared/errors.ts';
import type { WorkingDataset } from '../types.ts';

let dataset: WorkingDataset | null = null;
let loadedAt = 0;

/** Install the dataset. A second call is a programming error. */
export function setDataset(v: WorkingDataset): void {
  if (dataset) throw new Error('Working dataset is already loaded');
  dataset = v;
  loadedAt = Date.now();
}

export function getDataset(): WorkingDataset {
  if (!dataset) throw new DatasetNotReadyError();
  return dataset;
}

export function datasetInfo(): { loaded: boolean; listings: number; rejected: number; loadedAt: string | null } {
  return {
    loaded: dataset !== null,
    listings: dataset?.listings.length ?? 0,
    rejected: dataset?.rejected ?? 0,
    loadedAt: dataset ? new Date(loadedAt).toISOString() : null,
  };
}

/** Reset state (for testing) */
export function resetAll(): void {
  dataset = null;
  loadedAt = 0;
}
