/**
 * What a consumer asks the randomness oracle for.
 */
export type RandomWordsRequest = {
  keyHash: string; // Gas lane: the price ceiling the consumer accepts for the callback
  subscriptionId: number; // Subscription billed for the request
  requestConfirmations: number; // Confirmations the oracle waits before answering
  callbackGasLimit: number; // Limit on the fulfillment callback's work
  numWords: number; // Number of random words to return
};

/**
 * Receives oracle fulfillments. Called at most once per accepted request.
 */
export interface RandomnessConsumer {
  rawFulfillRandomWords(token: string, randomWords: readonly bigint[]): Promise<unknown>;
}

/**
 * An external source of unpredictable random words.
 *
 * `submitRequest` accepts the request and returns the correlation token, or a
 * promise of it when acceptance needs a round trip. Throwing or rejecting
 * means the request was not accepted. The words arrive later through the
 * consumer's callback.
 */
export interface RandomnessOracle {
  submitRequest(request: RandomWordsRequest, consumer: RandomnessConsumer): string | Promise<string>;
}
