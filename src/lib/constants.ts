// ─── Raffle state ───────────────────────────────────────────
export const RaffleState = {
  Open: 0,
  Calculating: 1,
} as const;

export type RaffleStateType = (typeof RaffleState)[keyof typeof RaffleState];

export function raffleStateName(state: RaffleStateType): string {
  return state === RaffleState.Open ? "Open" : "Calculating";
}

// ─── Randomness request ─────────────────────────────────────
// The winner is drawn from a single word; the oracle is never asked for more.
export const NUM_WORDS = 1;

export const LAMPORTS_PER_SOL = 1_000_000_000n;

// ─── Defaults ───────────────────────────────────────────────
export const DEFAULT_ENTRANCE_FEE_LAMPORTS = 10_000_000n; // 0.01 SOL
export const DEFAULT_INTERVAL_SEC = 30;
export const DEFAULT_SUBSCRIPTION_ID = 1n;
export const DEFAULT_CALLBACK_GAS_LIMIT = 500_000;
export const DEFAULT_REQUEST_CONFIRMATIONS = 3;
// 30 gwei lane on the reference VRF network; any 32-byte id works for the local coordinator.
export const DEFAULT_KEY_HASH =
  "0x787d74caea10b2b357790d5b5247c2f63d1d91572a9846f780606e4d953677ae";
