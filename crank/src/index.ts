/**
 * Raffle Crank — keeps the raffle moving without user transactions.
 *
 * Polls every POLL_INTERVAL_MS and calls performUpkeep when checkUpkeep
 * allows it. Players enter by sending SOL to the vault; each confirmed
 * transfer is credited as an entry. Randomness comes from the in-process VRF
 * coordinator, and payouts leave the vault as SystemProgram transfers.
 *
 * The vault keypair stays on the server.
 */
import "dotenv/config";
import { Connection, Keypair } from "@solana/web3.js";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { shortenAddr } from "../../src/lib/addressUtils.js";
import { envInt, loadRaffleConfig } from "../../src/lib/config.js";
import { formatSol } from "../../src/lib/format.js";
import { createLogger } from "../../src/lib/log.js";
import { Raffle } from "../../src/lib/raffle.js";
import { DepositCrediter } from "./deposits.js";
import { createKeeper } from "./keeper.js";
import { LocalVrfCoordinator } from "./localVrf.js";
import { SolanaPayoutTransport } from "./solanaPayout.js";

// ─── Config from env ────────────────────────────────────────

const env = process.env;
const RPC_URL = env.RPC_URL || "https://api.devnet.solana.com";
const POLL_INTERVAL_MS = envInt(env, "POLL_INTERVAL_MS", 3000);
const RETRY_MIN_SEC = envInt(env, "RETRY_MIN_SEC", 5);
const RETRY_MAX_SEC = envInt(env, "RETRY_MAX_SEC", 60);
const STUCK_CALCULATING_SEC = envInt(env, "STUCK_CALCULATING_SEC", 180);
const STUCK_WARN_REPEAT_SEC = envInt(env, "STUCK_WARN_REPEAT_SEC", 60);
const HEALTH_LOG_INTERVAL_SEC = envInt(env, "HEALTH_LOG_INTERVAL_SEC", 60);
const VRF_CONFIRMATION_MS = envInt(env, "VRF_CONFIRMATION_MS", 400);

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const log = createLogger("crank");

// ─── Load vault wallet ──────────────────────────────────────

function loadVaultKeypair(): Keypair {
  const walletPath = env.VAULT_KEYPAIR_PATH || "../vault-wallet.json";
  const resolved = path.resolve(__dirname, "..", walletPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Vault wallet not found at ${resolved}`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  if (!Array.isArray(raw) || !raw.every((n): n is number => typeof n === "number")) {
    throw new Error(`Vault wallet at ${resolved} is not a secret key array`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(raw));
}

// ─── Entry point ────────────────────────────────────────────

async function main() {
  const config = loadRaffleConfig(env);

  console.log("═══════════════════════════════════════════");
  console.log("   Raffle Crank Service");
  console.log("═══════════════════════════════════════════");
  console.log(`RPC:         ${RPC_URL}`);
  console.log(`Poll:        ${POLL_INTERVAL_MS}ms`);
  console.log(`Fee:         ${formatSol(config.entranceFee)} SOL`);
  console.log(`Interval:    ${config.intervalSec}s`);
  console.log(`VRF:         sub=${config.subscriptionId} confirmations=${config.requestConfirmations} gas=${config.callbackGasLimit}`);
  console.log(`Retry:       ${RETRY_MIN_SEC}s..${RETRY_MAX_SEC}s`);
  console.log(`Stuck warn:  calculating=${STUCK_CALCULATING_SEC}s`);

  const connection = new Connection(RPC_URL, { commitment: "confirmed" });
  const transport = new SolanaPayoutTransport(connection, loadVaultKeypair());
  const vaultAddress = transport.vaultAddress;
  console.log(`Vault:       ${vaultAddress.toBase58()}`);

  const balance = await connection.getBalance(vaultAddress);
  console.log(`Balance:     ${formatSol(BigInt(balance))} SOL`);
  if (BigInt(balance) < config.entranceFee) {
    console.error("⚠ Vault balance is below one entrance fee; transaction fees may fail");
  }
  console.log("═══════════════════════════════════════════");
  console.log();

  const vrf = new LocalVrfCoordinator({ confirmationMs: VRF_CONFIRMATION_MS });
  const raffle = new Raffle(config, {
    oracle: vrf,
    payout: transport,
  });
  vrf.setConsumer(async (requestId, words) => {
    await raffle.fulfillRandomWords(requestId, words);
  });

  raffle.on("entered", ({ player, amount }) => {
    log.info(`+ ${shortenAddr(player)} entered with ${formatSol(amount)} SOL`);
  });
  raffle.on("payoutSent", ({ winner, amount, signature }) => {
    log.info(`✓ Paid ${formatSol(amount)} SOL to ${shortenAddr(winner)} (${signature.slice(0, 16)}...)`);
  });
  raffle.on("payoutFailed", ({ winner, amount, reason }) => {
    log.error(`✗ Payout of ${formatSol(amount)} SOL to ${winner.toBase58()} needs manual remediation: ${reason}`);
  });

  const crediter = new DepositCrediter(connection, raffle, vaultAddress);
  const depositSub = connection.onLogs(
    vaultAddress,
    (logs) => {
      if (logs.err) return;
      crediter.credit(logs.signature).catch((e: unknown) => {
        log.error(`✗ Could not credit deposit ${logs.signature}`, e);
      });
    },
    "confirmed"
  );

  const keeper = createKeeper(raffle, {
    pollIntervalMs: POLL_INTERVAL_MS,
    retryMinSec: RETRY_MIN_SEC,
    retryMaxSec: RETRY_MAX_SEC,
    stuckCalculatingSec: STUCK_CALCULATING_SEC,
    stuckWarnRepeatSec: STUCK_WARN_REPEAT_SEC,
    healthLogIntervalSec: HEALTH_LOG_INTERVAL_SEC,
  });

  const shutdown = () => {
    log.info("→ Shutting down");
    keeper.stop();
    vrf.close();
    connection.removeOnLogsListener(depositSub).catch((e: unknown) => {
      log.error("✗ Failed to remove deposit listener", e);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  keeper.start();
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
