/**
 * Ignore list persisted as a text file, one domain pattern per line.
 * Blank lines and lines starting with '#' are skipped on load.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LoggingService } from './LoggingService';

export class IgnoreListStore {
  private filePath: string;
  private logger: LoggingService;

  constructor(filePath: string, logger: LoggingService) {
    this.filePath = filePath;
    this.logger = logger;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Read the patterns; a missing file is an empty list
   */
  load(): string[] {
    if (!fs.existsSync(this.filePath)) {
      this.logger.debug(`No ignore list at ${this.filePath}`);
      return [];
    }

    const content = fs.readFileSync(this.filePath, 'utf-8');
    const patterns = content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '' && !line.startsWith('#'));

    this.logger.debug(`Loaded ${patterns.length} ignore patterns`);
    return patterns;
  }

  save(patterns: readonly string[]): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const body = patterns.length > 0 ? `${patterns.join('\n')}\n` : '';
    fs.writeFileSync(this.filePath, body, 'utf-8');
    this.logger.info(`Saved ${patterns.length} ignore patterns to ${this.filePath}`);
  }

  /**
   * @returns false when the pattern was already listed
   */
  add(domain: string): boolean {
    const pattern = domain.trim();
    if (pattern === '') {
      throw new Error('Domain pattern must not be empty');
    }

    const patterns = this.load();
    if (patterns.includes(pattern)) {
      return false;
    }

    this.save([...patterns, pattern]);
    return true;
  }

  /**
   * @returns false when the pattern was not listed
   */
  remove(domain: string): boolean {
    const pattern = domain.trim();
    const patterns = this.load();
    const remaining = patterns.filter((p) => p !== pattern);
    if (remaining.length === patterns.length) {
      return false;
    }

    this.save(remaining);
    return true;
  }
}
