export interface ManagerConfig {
  /** This agent's participant id. */
  participantId: string;
  /** Address the counter-party posts protocol messages back to. */
  callbackAddress: string;
  /** Negotiations leased per state per pass. */
  batchSize: number;
  /** Pause after a pass that found nothing to do. */
  iterationWaitMs: number;
  /** Send attempts per state before the negotiation moves to ERROR. */
  sendRetryLimit: number;
  /** First retry delay; doubles per attempt. */
  sendRetryBaseDelayMs: number;
  /** Upper bound for the retry delay. */
  sendRetryMaxDelayMs: number;
}

export const DEFAULT_MANAGER_CONFIG: Omit<ManagerConfig, 'participantId' | 'callbackAddress'> = {
  batchSize: 5,
  iterationWaitMs: 1000,
  sendRetryLimit: 7,
  sendRetryBaseDelayMs: 1000,
  sendRetryMaxDelayMs: 60_000,
};
