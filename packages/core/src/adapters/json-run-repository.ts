import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isRunRecord, type RunRecord } from '../domain/run/run-record.js';
import type { RunRepository, RunSummary } from '../ports/run-repository.js';
import { ConclaveError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('run-repository');

const RUN_ID_PATTERN = /^[A-Za-z0-9-]+$/;

/** One JSON file per run under `<dataDir>/runs`. */
export class JsonRunRepository implements RunRepository {
  constructor(private readonly dataDir: string) {}

  private get runsDir(): string {
    return join(this.dataDir, 'runs');
  }

  private async ensureRunsDir(): Promise<string> {
    const dir = this.runsDir;
    await mkdir(dir, { recursive: true });
    return dir;
  }

  private async readRecord(filePath: string): Promise<RunRecord> {
    const data: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    if (!isRunRecord(data)) {
      throw new ConclaveError(`Not a valid run record: ${filePath}`, 'INVALID_RUN_RECORD');
    }
    return data;
  }

  async save(run: RunRecord): Promise<string> {
    if (!RUN_ID_PATTERN.test(run.id)) {
      throw new ConclaveError(`Invalid run id: ${run.id}`, 'INVALID_RUN_ID');
    }
    const dir = await this.ensureRunsDir();
    const filePath = join(dir, `${run.id}.json`);
    await writeFile(filePath, JSON.stringify(run, null, 2), 'utf-8');
    log.debug(`save: wrote ${filePath}`);
    return filePath;
  }

  async load(id: string): Promise<RunRecord> {
    if (!RUN_ID_PATTERN.test(id)) {
      throw new ConclaveError(`Invalid run id: ${id}`, 'INVALID_RUN_ID');
    }
    const dir = await this.ensureRunsDir();
    return this.readRecord(join(dir, `${id}.json`));
  }

  async list(): Promise<RunSummary[]> {
    const dir = await this.ensureRunsDir();
    const files = (await readdir(dir)).filter((f) => f.endsWith('.json')).sort();

    const summaries: RunSummary[] = [];
    for (const file of files) {
      try {
        const record = await this.readRecord(join(dir, file));
        summaries.push({
          id: record.id,
          createdAt: record.createdAt,
          promptPreview: record.prompt.slice(0, 70),
          status: record.stage3.available ? 'complete' : 'synthesis_unavailable',
        });
      } catch (err) {
        log.warn(`list: skipping unreadable run file ${file}:`, err instanceof Error ? err.message : err);
      }
    }

    summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return summaries;
  }
}
