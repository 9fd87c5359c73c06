import type { Label, Stage1Result } from '../council/stage-results.js';
import { ConfigError } from '../../shared/errors.js';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export function labelForIndex(index: number): Label {
  if (!Number.isInteger(index) || index < 0 || index >= ALPHABET.length) {
    throw new ConfigError(`Cannot label response #${index + 1}: only ${ALPHABET.length} labels exist.`);
  }
  return ALPHABET[index];
}

/** Two-way mapping between anonymous labels and model identifiers for one run. */
export class LabelMap {
  private readonly byLabel: ReadonlyMap<Label, string>;
  private readonly byModel: ReadonlyMap<string, Label>;
  readonly labels: readonly Label[];
  readonly models: readonly string[];

  constructor(models: readonly string[]) {
    const labels = models.map((_, i) => labelForIndex(i));
    const byLabel = new Map<Label, string>();
    const byModel = new Map<string, Label>();
    models.forEach((model, i) => {
      if (byModel.has(model)) {
        throw new ConfigError(`Model appears twice in one run: ${model}`);
      }
      byLabel.set(labels[i], model);
      byModel.set(model, labels[i]);
    });

    this.byLabel = byLabel;
    this.byModel = byModel;
    this.labels = Object.freeze(labels);
    this.models = Object.freeze([...models]);
    Object.freeze(this);
  }

  get size(): number {
    return this.labels.length;
  }

  modelFor(label: Label): string | undefined {
    return this.byLabel.get(label);
  }

  labelFor(model: string): Label | undefined {
    return this.byModel.get(model);
  }

  /** Zero-based stage-one position of a model, or -1 when it is not in the map. */
  positionOf(model: string): number {
    return this.models.indexOf(model);
  }

  toRecord(): Record<Label, string> {
    return Object.fromEntries(this.byLabel);
  }
}

export interface AnonymizedTranscript {
  labelMap: LabelMap;
  transcript: string;
}

export function renderLabeledResponse(label: Label, response: string): string {
  return `Response ${label}:\n${response}`;
}

/**
 * Labels stage-one answers in list order and renders them for the evaluators.
 * Model identifiers never reach the transcript.
 */
export function anonymize(results: readonly Stage1Result[]): AnonymizedTranscript {
  const labelMap = new LabelMap(results.map((r) => r.model));
  const transcript = results
    .map((r, i) => renderLabeledResponse(labelMap.labels[i], r.response))
    .join('\n\n');
  return { labelMap, transcript };
}
