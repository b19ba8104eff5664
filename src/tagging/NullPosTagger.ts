import { TaggerUnavailableError } from '../errors';
import { PosTag, PosTagger } from './types';

/**
 * Tagger for model "none": never produces a signal, so every ambiguous
 * short line is kept.
 */
export class NullPosTagger implements PosTagger {
  readonly name = 'none';

  tag(_text: string): PosTag {
    throw new TaggerUnavailableError('POS tagging is disabled', this.name);
  }
}
