/**
 * The phase of the live round.
 */
export type RafflePhase = 'OPEN' | 'CALCULATING';

/**
 * A participant admitted into the current round. Its position in the
 * registry is the index used for winner selection.
 */
export type Entrant = {
  identity: string; // Player identity the prize is paid to
  feePaid: number; // Amount credited to the pool for this entry, in minor units
};

/**
 * The singleton round record.
 */
export type Round = {
  phase: RafflePhase;
  lastDrawTimestamp: number; // ms epoch of the previous resolution, or of startup
  pendingRequestToken?: string; // Correlates the in-flight oracle request to this round
  recentWinner?: string; // Most recent winner identity, kept across rounds
};

/**
 * Parameters fixed at construction.
 */
export type RaffleSettings = {
  entranceFee: number;
  intervalMs: number;
  keyHash: string;
  subscriptionId: number;
  callbackGasLimit: number;
};

/**
 * The result of evaluating every upkeep condition.
 */
export type UpkeepCheck = {
  timePassed: boolean;
  isOpen: boolean;
  hasBalance: boolean;
  hasPlayers: boolean;
  upkeepNeeded: boolean;
};

/**
 * Observability events emitted by the raffle.
 */
export type RaffleEvents = {
  EnteredRound: (identity: string) => void;
  DrawRequested: (token: string) => void;
  WinnerPicked: (identity: string) => void;
  PayoutFailed: (identity: string, amount: number) => void;
};

/**
 * A read-only view of everything the query surface exposes.
 */
export type RaffleSnapshot = {
  phase: RafflePhase;
  entranceFee: number;
  interval: number;
  lastTimeStamp: number;
  numberOfPlayers: number;
  balance: number;
  recentWinner: string | null;
  pendingRequestToken: string | null;
  requestConfirmations: number;
  numWords: number;
};
