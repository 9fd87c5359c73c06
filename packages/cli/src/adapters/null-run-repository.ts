import { ConclaveError, type RunRecord, type RunRepository, type RunSummary } from '@conclave/core';

/** Used for `--no-save`: nothing is written, so nothing can be listed or loaded. */
export class NullRunRepository implements RunRepository {
  async save(): Promise<string> {
    return '';
  }

  async load(id: string): Promise<RunRecord> {
    throw new ConclaveError(`Run ${id} was not saved`, 'RUN_NOT_FOUND');
  }

  async list(): Promise<RunSummary[]> {
    return [];
  }
}
