import { promises as fs } from 'fs';
import path from 'path';
import { Iteration } from '../../domain/entities/Iteration';
import { IIterationRepository } from '../../domain/repositories/IIterationRepository';
import { AppError } from '../../domain/errors/AppError';
import { logger } from '../logging/Logger';

const MAX_NAME_ATTEMPTS = 100;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** YYYYMMDD_HHMMSS_mmm in local time */
export function formatRecordTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}_` +
    pad(date.getMilliseconds(), 3)
  );
}

export function isAlreadyExists(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
}

/**
 * One pretty-printed JSON file per iteration under <outputDir>/debate_logs.
 * Files are created exclusively; a clashing name gets a numeric suffix.
 */
export class FileIterationRepository implements IIterationRepository {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get logDir(): string {
    return path.join(this.outputDir, 'debate_logs');
  }

  async save(iteration: Iteration): Promise<string> {
    const body = JSON.stringify(iteration, null, 2);
    const base = `iteration_${formatRecordTimestamp(this.now())}`;

    try {
      await fs.mkdir(this.logDir, { recursive: true });
    } catch (error) {
      throw AppError.persistenceError(`Cannot create ${this.logDir}`, error);
    }

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const filename = attempt === 0 ? `${base}.json` : `${base}-${attempt}.json`;
      const filePath = path.join(this.logDir, filename);

      try {
        await fs.writeFile(filePath, body, { flag: 'wx' });
        logger.info('Iteration saved', { filePath });
        return filePath;
      } catch (error) {
        if (isAlreadyExists(error)) continue;
        throw AppError.persistenceError(`Failed to write ${filePath}`, error);
      }
    }

    throw AppError.persistenceError(`No free record name for ${base}`);
  }
}
