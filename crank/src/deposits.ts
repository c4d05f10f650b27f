/**
 * Turns confirmed SystemProgram transfers into the vault into raffle entries.
 *
 * A deposit is credited once per signature. Transfers the raffle refuses
 * (round locked, fee too small) are kept in `rejected()` for manual refund;
 * the lamports already sit in the vault.
 */
import { PublicKey, SystemProgram, type Connection, type ParsedTransactionWithMeta } from "@solana/web3.js";
import { shortenAddr } from "../../src/lib/addressUtils.js";
import { RaffleError } from "../../src/lib/errors.js";
import { formatSol } from "../../src/lib/format.js";
import { createLogger, type Logger } from "../../src/lib/log.js";
import type { Raffle } from "../../src/lib/raffle.js";

export type DepositSource = Pick<Connection, "getParsedTransaction">;

export interface VaultTransfer {
  signature: string;
  source: PublicKey;
  lamports: bigint;
}

export interface RejectedDeposit extends VaultTransfer {
  code: string;
  reason: string;
}

export type DepositOutcome =
  | { kind: "entered"; transfer: VaultTransfer }
  | { kind: "rejected"; deposit: RejectedDeposit }
  | { kind: "ignored"; signature: string; reason: "duplicate" | "not_found" | "failed_tx" | "no_vault_transfer" };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toLamports(value: unknown): bigint | null {
  if (typeof value === "number" && Number.isSafeInteger(value) && value > 0) return BigInt(value);
  if (typeof value === "string" && /^[1-9]\d*$/.test(value)) return BigInt(value);
  return null;
}

/** Top-level system transfers in `tx` whose destination is `vault`. */
export function findVaultTransfers(
  signature: string,
  tx: ParsedTransactionWithMeta,
  vault: PublicKey
): VaultTransfer[] {
  const found: VaultTransfer[] = [];
  const vaultStr = vault.toBase58();
  for (const ix of tx.transaction.message.instructions) {
    if (!("parsed" in ix) || !ix.programId.equals(SystemProgram.programId)) continue;
    const parsed: unknown = ix.parsed;
    if (!isRecord(parsed) || parsed.type !== "transfer" || !isRecord(parsed.info)) continue;

    const { source, destination, lamports } = parsed.info;
    if (destination !== vaultStr || typeof source !== "string") continue;
    const amount = toLamports(lamports);
    if (amount === null) continue;
    found.push({ signature, source: new PublicKey(source), lamports: amount });
  }
  return found;
}

export class DepositCrediter {
  private readonly processed = new Set<string>();
  private readonly rejectedDeposits: RejectedDeposit[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly connection: DepositSource,
    private readonly raffle: Raffle,
    private readonly vault: PublicKey,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("deposits");
  }

  async credit(signature: string): Promise<DepositOutcome[]> {
    if (this.processed.has(signature)) {
      return [{ kind: "ignored", signature, reason: "duplicate" }];
    }
    this.processed.add(signature);

    let tx: ParsedTransactionWithMeta | null;
    try {
      tx = await this.connection.getParsedTransaction(signature, {
        commitment: "confirmed",
        maxSupportedTransactionVersion: 0,
      });
    } catch (e) {
      // Let a later notification for the same signature retry the fetch.
      this.processed.delete(signature);
      throw e;
    }

    if (!tx) return [{ kind: "ignored", signature, reason: "not_found" }];
    if (!tx.meta || tx.meta.err !== null) return [{ kind: "ignored", signature, reason: "failed_tx" }];

    const transfers = findVaultTransfers(signature, tx, this.vault);
    if (transfers.length === 0) return [{ kind: "ignored", signature, reason: "no_vault_transfer" }];

    return transfers.map((transfer) => this.enter(transfer));
  }

  rejected(): readonly RejectedDeposit[] {
    return [...this.rejectedDeposits];
  }

  private enter(transfer: VaultTransfer): DepositOutcome {
    try {
      this.raffle.enter(transfer.source, transfer.lamports);
      return { kind: "entered", transfer };
    } catch (e) {
      if (!(e instanceof RaffleError)) throw e;
      const deposit: RejectedDeposit = { ...transfer, code: e.code, reason: e.message };
      this.rejectedDeposits.push(deposit);
      this.logger.warn(
        `⚠ Deposit of ${formatSol(transfer.lamports)} SOL from ${shortenAddr(transfer.source)} ` +
          `not entered (${e.code}), refund needed: ${transfer.signature}`
      );
      return { kind: "rejected", deposit };
    }
  }
}
