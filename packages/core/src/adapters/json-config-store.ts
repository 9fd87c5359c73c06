import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConfigStore, CouncilConfigPrefs } from '../ports/config-store.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-store');

interface Preferences {
  councilConfig?: CouncilConfigPrefs;
  [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keeps only the council preference fields that have the expected types. */
export function sanitizeCouncilPrefs(raw: unknown): CouncilConfigPrefs {
  if (!isRecord(raw)) return {};
  const prefs: CouncilConfigPrefs = {};
  if (typeof raw.chairmanModel === 'string' && raw.chairmanModel) {
    prefs.chairmanModel = raw.chairmanModel;
  }
  if (Array.isArray(raw.councilModels) && raw.councilModels.every((m) => typeof m === 'string')) {
    prefs.councilModels = raw.councilModels;
  }
  if (typeof raw.timeoutMs === 'number' && Number.isInteger(raw.timeoutMs) && raw.timeoutMs > 0) {
    prefs.timeoutMs = raw.timeoutMs;
  }
  if (typeof raw.apiKeyEncrypted === 'string' && raw.apiKeyEncrypted) {
    prefs.apiKeyEncrypted = raw.apiKeyEncrypted;
  }
  return prefs;
}

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get prefsPath(): string {
    return join(this.configDir, 'preferences.json');
  }

  private async readPrefs(): Promise<Preferences> {
    let data: string;
    try {
      data = await readFile(this.prefsPath, 'utf-8');
    } catch {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(data);
      return isRecord(parsed) ? parsed : {};
    } catch {
      log.warn(`readPrefs: ${this.prefsPath} is not valid JSON, ignoring it`);
      return {};
    }
  }

  private async writePrefs(prefs: Preferences): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.prefsPath, JSON.stringify(prefs, null, 2), 'utf-8');
  }

  async getCouncilConfigPrefs(): Promise<CouncilConfigPrefs> {
    const prefs = await this.readPrefs();
    return sanitizeCouncilPrefs(prefs.councilConfig);
  }

  async saveCouncilConfigPrefs(config: CouncilConfigPrefs): Promise<void> {
    const prefs = await this.readPrefs();
    prefs.councilConfig = config;
    await this.writePrefs(prefs);
  }
}
