/**
 * Payout transport backed by a Solana vault keypair.
 * One SystemProgram transfer per payout, confirmed before it counts as sent.
 */
import {
  ComputeBudgetProgram,
  Connection,
  Keypair,
  PublicKey,
  SystemProgram,
  Transaction,
  sendAndConfirmTransaction,
} from "@solana/web3.js";
import type { PayoutReceipt, PayoutTransport } from "../../src/lib/payout.js";

export interface SolanaPayoutOptions {
  computeUnitLimit?: number;
  priorityFeeMicroLamports?: number;
}

export class SolanaPayoutTransport implements PayoutTransport {
  private readonly computeUnitLimit: number;
  private readonly priorityFeeMicroLamports: number;

  constructor(
    private readonly connection: Connection,
    private readonly vault: Keypair,
    options: SolanaPayoutOptions = {}
  ) {
    this.computeUnitLimit = options.computeUnitLimit ?? 20_000;
    this.priorityFeeMicroLamports = options.priorityFeeMicroLamports ?? 20_000;
  }

  get vaultAddress(): PublicKey {
    return this.vault.publicKey;
  }

  async transfer(to: PublicKey, amount: bigint): Promise<PayoutReceipt> {
    if (amount <= 0n) {
      return { ok: false, reason: `nothing to transfer (${amount} lamports)` };
    }

    const tx = new Transaction().add(
      ComputeBudgetProgram.setComputeUnitLimit({ units: this.computeUnitLimit }),
      ComputeBudgetProgram.setComputeUnitPrice({ microLamports: this.priorityFeeMicroLamports }),
      SystemProgram.transfer({
        fromPubkey: this.vault.publicKey,
        toPubkey: to,
        lamports: amount,
      })
    );
    tx.feePayer = this.vault.publicKey;
    tx.recentBlockhash = (await this.connection.getLatestBlockhash("confirmed")).blockhash;

    const signature = await sendAndConfirmTransaction(this.connection, tx, [this.vault], {
      commitment: "confirmed",
    });
    return { ok: true, signature };
  }
}
