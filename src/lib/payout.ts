import type { PublicKey } from "@solana/web3.js";
import { PayoutTransferFailedError } from "./errors.js";

export type PayoutReceipt =
  | { ok: true; signature: string }
  | { ok: false; reason: string };

/** Moves native value out of the raffle vault. Implementations must not retry on their own. */
export interface PayoutTransport {
  transfer(to: PublicKey, amount: bigint): Promise<PayoutReceipt>;
}

/**
 * Sends the pot to the winner once.
 * Both a rejected transfer and a thrown error surface as PayoutTransferFailedError.
 */
export async function executePayout(
  transport: PayoutTransport,
  winner: PublicKey,
  amount: bigint
): Promise<string> {
  let receipt: PayoutReceipt;
  try {
    receipt = await transport.transfer(winner, amount);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new PayoutTransferFailedError(winner, amount, reason, e);
  }
  if (!receipt.ok) {
    throw new PayoutTransferFailedError(winner, amount, receipt.reason);
  }
  return receipt.signature;
}
