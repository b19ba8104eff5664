/**
 * POS tagger registry
 */

import { InvalidArgumentError } from '../errors';
import { CompromisePosTagger } from './CompromisePosTagger';
import { NullPosTagger } from './NullPosTagger';
import { PosTagger } from './types';

const FACTORIES = new Map<string, () => PosTagger>([
  ['compromise', () => new CompromisePosTagger()],
  ['none', () => new NullPosTagger()],
]);

const cache = new Map<string, PosTagger>();

export const AVAILABLE_MODELS: readonly string[] = [...FACTORIES.keys()];

/**
 * Get the tagger for a model name. One instance per model is kept.
 */
export function createPosTagger(model: string): PosTagger {
  const cached = cache.get(model);
  if (cached) {
    return cached;
  }

  const factory = FACTORIES.get(model);
  if (!factory) {
    throw InvalidArgumentError.notAllowed('model', model, AVAILABLE_MODELS);
  }

  const tagger = factory();
  cache.set(model, tagger);
  return tagger;
}

export { CompromisePosTagger } from './CompromisePosTagger';
export { NullPosTagger } from './NullPosTagger';
export { PosLabel, PosTag, PosTagger } from './types';
