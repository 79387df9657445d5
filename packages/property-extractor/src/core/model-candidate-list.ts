import { PropertyExtractionError } from '../errors/property-extraction-error';

export type CandidateListListener = (models: readonly string[]) => void;

/**
 * Ordered, runtime-mutable list of model identifiers tried by the
 * PropertyExtractionClient. Order is trial priority.
 *
 * Every mutation notifies listeners with the new order, which is how the
 * worker persists edits back to its configuration file. Readers take a
 * snapshot per call, so edits never disturb a call already in progress.
 */
export class ModelCandidateList {
  private models: string[] = [];
  private readonly listeners = new Set<CandidateListListener>();

  constructor(models: Iterable<string> = []) {
    for (const model of models) {
      const id = ModelCandidateList.normalize(model);
      if (!this.models.includes(id)) {
        this.models.push(id);
      }
    }
  }

  get size(): number {
    return this.models.length;
  }

  snapshot(): string[] {
    return [...this.models];
  }

  has(modelId: string): boolean {
    return this.models.includes(modelId.trim());
  }

  /**
   * Insert a model at `position` (default: end).
   *
   * @returns false when the model is already listed
   */
  add(modelId: string, position = this.models.length): boolean {
    const id = ModelCandidateList.normalize(modelId);
    if (this.models.includes(id)) {
      return false;
    }
    this.models.splice(this.clampIndex(position, this.models.length), 0, id);
    this.emit();
    return true;
  }

  /**
   * @returns false when the model is not listed
   */
  remove(modelId: string): boolean {
    const index = this.models.indexOf(modelId.trim());
    if (index === -1) {
      return false;
    }
    this.models.splice(index, 1);
    this.emit();
    return true;
  }

  /**
   * Move a model to `toIndex`, clamped to the list bounds.
   *
   * @returns false when the model is not listed
   */
  move(modelId: string, toIndex: number): boolean {
    const from = this.models.indexOf(modelId.trim());
    if (from === -1) {
      return false;
    }
    const [id] = this.models.splice(from, 1);
    this.models.splice(this.clampIndex(toIndex, this.models.length), 0, id);
    this.emit();
    return true;
  }

  /**
   * Replace the whole list, dropping duplicates.
   */
  replace(models: readonly string[]): void {
    const next: string[] = [];
    for (const model of models) {
      const id = ModelCandidateList.normalize(model);
      if (!next.includes(id)) {
        next.push(id);
      }
    }
    this.models = next;
    this.emit();
  }

  /**
   * Subscribe to list changes.
   *
   * @returns unsubscribe function
   */
  onChange(listener: CandidateListListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    const models = this.snapshot();
    for (const listener of this.listeners) {
      listener(models);
    }
  }

  private clampIndex(index: number, length: number): number {
    if (!Number.isFinite(index)) {
      return length;
    }
    return Math.min(Math.max(Math.trunc(index), 0), length);
  }

  private static normalize(modelId: string): string {
    const id = modelId.trim();
    if (id.length === 0) {
      throw new PropertyExtractionError('Model id must not be empty');
    }
    return id;
  }
}
