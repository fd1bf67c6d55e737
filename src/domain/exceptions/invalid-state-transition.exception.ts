import { DomainException } from './domain.exception';

/**
 * Thrown when a lifecycle change is not allowed from the current state,
 * e.g. reactivating a deleted conversation or jumping two CEFR levels at once.
 */
export class InvalidStateTransitionException extends DomainException {
  constructor(
    public readonly subject: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Cannot transition ${subject} from "${from}" to "${to}"`, 'INVALID_STATE_TRANSITION');
  }
}
