/**
 * POS Tagging Types
 * The capability the signature detector consults for ambiguous short lines.
 */

export type PosLabel = 'SALUTATION_LIKE' | 'CONTACT_LIKE' | 'ORDINARY';

export interface PosTag {
  readonly label: PosLabel;
  /** Confidence in the label, between 0.0 and 1.0 */
  readonly confidence: number;
}

/**
 * Taggers are synchronous and may throw when no signal can be produced;
 * the detector treats a throw as "no signal" and keeps the line.
 */
export interface PosTagger {
  readonly name: string;
  tag(text: string): PosTag;
}
