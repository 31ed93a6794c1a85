/**
 * Crawl progress values
 *
 * Progress is immutable: recording an outcome returns a new value, so the
 * item loop always checkpoints exactly what it has processed.
 */

import type {
  CrawlProgress,
  DetailRecord,
  ErrorRecord,
  ExtractionOutcome,
  ItemIdentifier,
  ItemStatus,
} from '../types/index.js';

export function emptyProgress(target: string): CrawlProgress {
  return { target, records: [], errors: [], status: new Map() };
}

/**
 * Rebuild progress from stored records and errors. An identifier with both
 * keeps only its record.
 */
export function progressFrom(target: string, records: DetailRecord[], errors: ErrorRecord[]): CrawlProgress {
  const status = new Map<ItemIdentifier, ItemStatus>();
  const keptRecords: DetailRecord[] = [];
  const keptErrors: ErrorRecord[] = [];

  for (const record of records) {
    if (!status.has(record.itemId)) {
      status.set(record.itemId, 'completed');
      keptRecords.push(record);
    }
  }
  for (const error of errors) {
    if (!status.has(error.itemId)) {
      status.set(error.itemId, 'errored');
      keptErrors.push(error);
    }
  }

  return { target, records: keptRecords, errors: keptErrors, status };
}

export function isProcessed(progress: CrawlProgress, itemId: ItemIdentifier): boolean {
  return progress.status.has(itemId);
}

/**
 * Add one item's outcome; an identifier already present leaves progress unchanged
 */
export function recordOutcome(progress: CrawlProgress, outcome: ExtractionOutcome): CrawlProgress {
  const itemId = outcome.kind === 'record' ? outcome.record.itemId : outcome.error.itemId;
  if (isProcessed(progress, itemId)) {
    return progress;
  }

  const status = new Map(progress.status);

  if (outcome.kind === 'record') {
    status.set(itemId, 'completed');
    return { ...progress, records: [...progress.records, outcome.record], status };
  }

  status.set(itemId, 'errored');
  return { ...progress, errors: [...progress.errors, outcome.error], status };
}
