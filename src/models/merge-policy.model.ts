export enum ContactPrecedence {
  LATEST_UPDATE = 'LATEST_UPDATE', // Both sides user-edited: later lastUpdated wins (ties go to incoming)
  INCOMING_WINS = 'INCOMING_WINS', // User-edited incoming always wins
}

export interface MergeOptions {
  contactPrecedence?: ContactPrecedence;
  /**
   * Incoming is the remote store confirming a push of this same record;
   * its pendingPush flag replaces the local one instead of being OR-ed in.
   */
  acknowledgement?: boolean;
}

export const DEFAULT_MERGE_OPTIONS: Required<MergeOptions> = {
  contactPrecedence: ContactPrecedence.LATEST_UPDATE,
  acknowledgement: false,
};
