import fs from 'fs/promises';
import path from 'path';
import { DateTime } from 'luxon';
import { InsuranceType } from '../../types/intake';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

/**
 * Writes intake records as pretty-printed JSON files, one file per record.
 *
 * Writes go to a temp file first and are renamed into place, so re-writing the same
 * key replaces the previous file instead of leaving a half-written one behind.
 * Failures are logged and reported as `false`; they never throw.
 */
export class SubmissionStore {
  constructor(private readonly baseDir: string) {}

  collectedFileName(insuranceType: InsuranceType, sessionId: string): string {
    return `${insuranceType}_insurance_${sessionId}.json`;
  }

  submissionFileName(insuranceType: InsuranceType, submittedAt: DateTime, sessionId: string): string {
    return `SUBMITTED_${insuranceType}_quote_${submittedAt.toFormat('yyyyMMdd_HHmmss')}_${sessionId}.json`;
  }

  async saveCollected(insuranceType: InsuranceType, sessionId: string, data: unknown): Promise<boolean> {
    return this.write(this.collectedFileName(insuranceType, sessionId), data);
  }

  async saveSubmission(
    insuranceType: InsuranceType,
    submittedAt: DateTime,
    sessionId: string,
    data: unknown
  ): Promise<boolean> {
    return this.write(this.submissionFileName(insuranceType, submittedAt, sessionId), data);
  }

  async list(): Promise<string[]> {
    try {
      return (await fs.readdir(this.baseDir)).filter((name) => name.endsWith('.json')).sort();
    } catch (error) {
      logger.warn('Could not list intake records', { dir: this.baseDir, error: errorMessage(error) });
      return [];
    }
  }

  async read(fileName: string): Promise<unknown> {
    const raw = await fs.readFile(path.join(this.baseDir, fileName), 'utf8');
    return JSON.parse(raw);
  }

  private async write(fileName: string, data: unknown): Promise<boolean> {
    const target = path.join(this.baseDir, fileName);
    const temp = `${target}.${process.pid}.tmp`;

    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(data, null, 2), 'utf8');
      await fs.rename(temp, target);
      logger.info('Intake record saved', { file: target });
      return true;
    } catch (error) {
      logger.warn('Failed to save intake record', { file: target, error: errorMessage(error) });
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        logger.debug('Temp file cleanup failed', { file: temp, error: errorMessage(cleanupError) });
      });
      return false;
    }
  }
}
