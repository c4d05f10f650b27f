/**
 * Address display utilities: shared by raffle and crank log lines.
 */
import type { PublicKey } from "@solana/web3.js";

const SYSTEM_PROGRAM = "11111111111111111111111111111111";

/**
 * Shorten a Solana address for display: `AbcD...5678`.
 * Returns "—" for empty/system-program addresses.
 */
export function shortenAddr(addr: PublicKey | string | null | undefined): string {
  const s = typeof addr === "string" ? addr : addr ? addr.toBase58() : "";
  if (!s || s === SYSTEM_PROGRAM) return "—";
  return `${s.slice(0, 4)}...${s.slice(-4)}`;
}
