import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { CachedRunResult, CustomerId, PreferencesStore, RecentCheckRecord } from '../../domain/contracts';
import { prependRecentCheck } from './recentChecks';
import { cachedRunResultSchema, recentChecksSchema } from './storedSchemas';

export interface FilePreferencesStoreOptions {
  baseDir?: string;
}

const preferencesFileSchema = z.object({
  selectedCustomerId: z.string().nullable().default(null),
  recentChecks: recentChecksSchema.default([]),
});

type PreferencesFile = z.infer<typeof preferencesFileSchema>;

const emptyPreferences: PreferencesFile = {
  selectedCustomerId: null,
  recentChecks: [],
};

export class FilePreferencesStore implements PreferencesStore {
  private readonly baseDir: string;

  constructor(options?: FilePreferencesStoreOptions) {
    this.baseDir = options?.baseDir ?? path.join(process.cwd(), '.kyb-data');
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  async getSelectedCustomer(): Promise<CustomerId | null> {
    const prefs = await this.readPreferences();
    return prefs.selectedCustomerId;
  }

  async saveSelectedCustomer(customerId: CustomerId): Promise<void> {
    const prefs = await this.readPreferences();
    await this.writePreferences({ ...prefs, selectedCustomerId: customerId });
  }

  async getRecentChecks(): Promise<RecentCheckRecord[]> {
    const prefs = await this.readPreferences();
    return prefs.recentChecks;
  }

  async saveRecentCheck(record: RecentCheckRecord): Promise<RecentCheckRecord[]> {
    const prefs = await this.readPreferences();
    const recentChecks = prependRecentCheck(prefs.recentChecks, record);
    await this.writePreferences({ ...prefs, recentChecks });
    return recentChecks;
  }

  async getLastResult(): Promise<CachedRunResult | null> {
    const raw = await this.readJson(this.lastResultPath());
    if (raw === null) {
      return null;
    }
    return cachedRunResultSchema.parse(raw);
  }

  async saveLastResult(result: CachedRunResult): Promise<void> {
    await this.writeJson(this.lastResultPath(), {
      ...result,
      cachedAt: result.cachedAt.toISOString(),
    });
  }

  async clear(): Promise<void> {
    await this.safeUnlink(this.preferencesPath());
    await this.safeUnlink(this.lastResultPath());
  }

  private async readPreferences(): Promise<PreferencesFile> {
    const raw = await this.readJson(this.preferencesPath());
    if (raw === null) {
      return emptyPreferences;
    }
    return preferencesFileSchema.parse(raw);
  }

  private async writePreferences(prefs: PreferencesFile): Promise<void> {
    await this.writeJson(this.preferencesPath(), prefs);
  }

  private preferencesPath(): string {
    return path.join(this.baseDir, 'preferences.json');
  }

  private lastResultPath(): string {
    return path.join(this.baseDir, 'last-result.json');
  }

  private async readJson(filePath: string): Promise<unknown> {
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(raw);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  // Readers see either the old file or the new one, never a partial write.
  private async writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(value, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  }

  private async safeUnlink(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
