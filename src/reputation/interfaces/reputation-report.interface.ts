import type { ReputationStrategy } from '../../config/config.constants';
import type { AggregatedSummary } from './session-summary.interface';

export interface ResourceTrustEntry {
  trust: number;
  /** False when the value is the neutral default for an unseen key */
  known: boolean;
}

/**
 * What the engine currently believes about one remote address.
 */
export interface AddressReputationReport {
  address: string;
  strategy: ReputationStrategy;
  /** Trust a new session from this address would start from under the historical model */
  priorTrust: number;
  samples: number;
  history: AggregatedSummary | null;
  ipTrust: ResourceTrustEntry;
}
