/**
 * screenshotStore.ts — Debug screenshots, one directory per renewal attempt.
 *
 * Layout: `<SCREENSHOT_DIR>/<account>_<yyyyMMdd_HHmmss>/<n>_<label>.png`.
 * Only the newest `retention` attempt directories are kept per account.
 */

import { mkdir, readdir, rm, writeFile } from 'fs/promises';
import path from 'path';
import { DateTime } from 'luxon';
import { Logger } from '../core/logger';

const logger = new Logger('ScreenshotStore');

/** Filesystem-safe account slug: "Main NYT (Ann)" → "Main_NYT_Ann". */
export function accountSlug(name: string): string {
  const slug = name
    .trim()
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'account';
}

export class AttemptScreenshots {
  private count = 0;
  private readonly saved: string[] = [];

  constructor(readonly directory: string) {}

  async save(label: string, image: Uint8Array): Promise<string> {
    this.count += 1;
    const file = path.join(this.directory, `${String(this.count).padStart(2, '0')}_${accountSlug(label)}.png`);
    await writeFile(file, image);
    this.saved.push(file);
    return file;
  }

  paths(): string[] {
    return [...this.saved];
  }
}

export class ScreenshotStore {
  constructor(
    private readonly rootDir: string,
    private readonly retention: number,
  ) {}

  /** Create the directory for a new attempt and prune old ones. */
  async beginAttempt(accountName: string, startedAt: Date): Promise<AttemptScreenshots> {
    const slug = accountSlug(accountName);
    const stamp = DateTime.fromJSDate(startedAt, { zone: 'utc' }).toFormat('yyyyMMdd_HHmmss');
    const directory = path.join(this.rootDir, `${slug}_${stamp}`);

    await mkdir(directory, { recursive: true });
    await this.prune(slug);
    return new AttemptScreenshots(directory);
  }

  private async prune(slug: string): Promise<void> {
    const entries = await readdir(this.rootDir, { withFileTypes: true });
    const pattern = new RegExp(`^${slug}_\\d{8}_\\d{6}$`);

    // The timestamp suffix sorts lexically in time order.
    const attempts = entries
      .filter((entry) => entry.isDirectory() && pattern.test(entry.name))
      .map((entry) => entry.name)
      .sort()
      .reverse();

    for (const stale of attempts.slice(this.retention)) {
      await rm(path.join(this.rootDir, stale), { recursive: true, force: true });
      logger.debug(`Removed old screenshot directory ${stale}`);
    }
  }
}
