import type { PublicKey } from "@solana/web3.js";
import { InsufficientFeeError } from "./errors.js";

/**
 * Participants and pot for the round in progress.
 * Entry order is preserved and the same address may appear more than once.
 */
export class EntryLedger {
  private players: PublicKey[] = [];
  private pot = 0n;

  constructor(readonly entranceFee: bigint) {}

  /** Anything above the fee stays in the pot. */
  record(player: PublicKey, amount: bigint): void {
    if (amount < this.entranceFee) {
      throw new InsufficientFeeError(this.entranceFee, amount);
    }
    this.players.push(player);
    this.pot += amount;
  }

  get balance(): bigint {
    return this.pot;
  }

  get count(): number {
    return this.players.length;
  }

  at(index: number): PublicKey {
    if (!Number.isInteger(index) || index < 0 || index >= this.players.length) {
      throw new RangeError(`No player at index ${index} (players=${this.players.length})`);
    }
    return this.players[index];
  }

  list(): readonly PublicKey[] {
    return [...this.players];
  }

  /** Empties the round and hands back the pot that was held. */
  clear(): bigint {
    const held = this.pot;
    this.players = [];
    this.pot = 0n;
    return held;
  }
}
