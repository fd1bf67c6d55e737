import { ReviewPolicy } from '@domain/services';

/**
 * Runtime knobs the use cases need, resolved from configuration by the
 * composition root.
 */
export interface TutoringOptions {
  // Number of most recent messages sent to the tutor as context
  readonly contextWindow: number;
  readonly reviewPolicy: ReviewPolicy;
}
