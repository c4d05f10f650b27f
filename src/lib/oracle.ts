/** Parameters sent with every randomness request. */
export interface RandomnessRequest {
  keyHash: string;
  subId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
  nativePayment: boolean;
}

/**
 * External randomness source. `requestRandomWords` resolves with the id the oracle
 * assigned; the words arrive later through the consumer's fulfilment callback.
 */
export interface RandomnessOracle {
  requestRandomWords(request: RandomnessRequest): Promise<bigint>;
}

export type FulfillCallback = (requestId: bigint, randomWords: readonly bigint[]) => Promise<void>;
