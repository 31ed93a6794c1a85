/**
 * Crawl State Store
 * File-backed checkpoint and identifier list for one crawl target
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { logger } from '../utils/logger.js';
import { CheckpointError, toErrorMessage } from '../utils/errors.js';
import { readLines, writeLines } from '../utils/seed-file.js';
import type { CrawlProgress, ItemIdentifier } from '../types/index.js';
import { checkpointSchema, type CheckpointDocument } from './checkpoint-schema.js';
import { emptyProgress, progressFrom } from './crawl-progress.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CrawlStateStore {
  readonly checkpointPath: string;
  readonly identifiersPath: string;

  constructor(
    readonly target: string,
    directory: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.checkpointPath = join(directory, 'progress.json');
    this.identifiersPath = join(directory, 'item_ids.txt');
  }

  /**
   * Load saved progress; a missing checkpoint means a fresh start
   */
  async resume(): Promise<CrawlProgress> {
    let content: string;
    try {
      content = await readFile(this.checkpointPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info('No checkpoint found, starting fresh', { path: this.checkpointPath });
        return emptyProgress(this.target);
      }
      throw new CheckpointError(this.checkpointPath, `cannot be read: ${toErrorMessage(error)}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new CheckpointError(this.checkpointPath, 'is not valid JSON', { cause: error });
    }

    const parsed = checkpointSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CheckpointError(
        this.checkpointPath,
        `has an unexpected shape at ${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
    }

    if (parsed.data.target !== this.target) {
      throw new CheckpointError(
        this.checkpointPath,
        `belongs to target "${parsed.data.target}", not "${this.target}"`
      );
    }

    const progress = progressFrom(this.target, parsed.data.records, parsed.data.errors);
    logger.info('Resumed from checkpoint', {
      path: this.checkpointPath,
      records: progress.records.length,
      errors: progress.errors.length,
      updatedAt: parsed.data.updatedAt,
    });
    return progress;
  }

  /**
   * Replace the checkpoint with `progress` via a temp file and rename
   */
  async checkpoint(progress: CrawlProgress): Promise<void> {
    const document: CheckpointDocument = {
      target: progress.target,
      updatedAt: this.now().toISOString(),
      records: progress.records,
      errors: progress.errors,
    };
    const tempPath = `${this.checkpointPath}.${process.pid}.tmp`;

    try {
      await mkdir(dirname(this.checkpointPath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
      await rename(tempPath, this.checkpointPath);
    } catch (error) {
      throw new CheckpointError(this.checkpointPath, `write failed: ${toErrorMessage(error)}`, { cause: error });
    }

    logger.debug('Checkpoint saved', {
      records: progress.records.length,
      errors: progress.errors.length,
    });
  }

  async saveIdentifiers(identifiers: readonly ItemIdentifier[]): Promise<void> {
    await mkdir(dirname(this.identifiersPath), { recursive: true });
    await writeLines(this.identifiersPath, identifiers);
    logger.info('Saved item identifiers', { path: this.identifiersPath, count: identifiers.length });
  }

  /**
   * Saved identifier list, or null when none was saved
   */
  async loadIdentifiers(): Promise<ItemIdentifier[] | null> {
    try {
      return await readLines(this.identifiersPath);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }
}
