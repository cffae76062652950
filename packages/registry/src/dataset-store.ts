/**
 * Dataset Registry — Dataset Store
 *
 * The authoritative record of dataset values, in creation order, persisted
 * as `datasets.json` via the injected StateIO.
 *
 * Values are replaced wholesale, never mutated: update() swaps in a new
 * Dataset and writes the full list back. reload() discards memory in favour
 * of the file, for callers sharing the file with other processes.
 */

import type { Dataset } from '@sciregistry/kernel';
import { NotFoundError, ValidationError } from '@sciregistry/kernel';
import type { StateIO } from '@sciregistry/runtime-host';

export const DATASETS_FILE = 'datasets.json';

export class DatasetStore {
  private readonly datasets: Map<string, Dataset> = new Map();

  constructor(private readonly stateIO: StateIO) {
    this.reload();
  }

  reload(): void {
    const persisted = this.stateIO.readJson<ReadonlyArray<Dataset>>(DATASETS_FILE, []);
    this.datasets.clear();
    for (const dataset of persisted) {
      this.datasets.set(dataset.id, dataset);
    }
  }

  has(datasetId: string): boolean {
    return this.datasets.has(datasetId);
  }

  get(datasetId: string): Dataset | undefined {
    return this.datasets.get(datasetId);
  }

  /** All datasets in creation order. */
  all(): ReadonlyArray<Dataset> {
    return Array.from(this.datasets.values());
  }

  /**
   * @throws {ValidationError} If a dataset with the same id exists
   */
  insert(dataset: Dataset): void {
    if (this.datasets.has(dataset.id)) {
      throw ValidationError.single('id', `dataset ${dataset.id} already exists`);
    }
    this.datasets.set(dataset.id, dataset);
    this.persistOrUndo(() => this.datasets.delete(dataset.id));
  }

  /**
   * @throws {NotFoundError} If no dataset has this id
   */
  update(dataset: Dataset): void {
    const previous = this.datasets.get(dataset.id);
    if (previous === undefined) {
      throw new NotFoundError(`Dataset ${dataset.id} not found`);
    }
    this.datasets.set(dataset.id, dataset);
    this.persistOrUndo(() => this.datasets.set(dataset.id, previous));
  }

  /** Used to roll back a failed upload. */
  remove(datasetId: string): void {
    const previous = this.datasets.get(datasetId);
    if (previous === undefined) return;
    this.datasets.delete(datasetId);
    this.persistOrUndo(() => this.datasets.set(datasetId, previous));
  }

  /** Write the full list; on failure run `undo` so memory matches the file again. */
  private persistOrUndo(undo: () => void): void {
    try {
      this.stateIO.writeJson(DATASETS_FILE, this.all());
    } catch (err: unknown) {
      undo();
      throw err;
    }
  }
}
