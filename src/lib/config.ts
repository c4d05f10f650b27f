import {
  DEFAULT_CALLBACK_GAS_LIMIT,
  DEFAULT_ENTRANCE_FEE_LAMPORTS,
  DEFAULT_INTERVAL_SEC,
  DEFAULT_KEY_HASH,
  DEFAULT_REQUEST_CONFIRMATIONS,
  DEFAULT_SUBSCRIPTION_ID,
  NUM_WORDS,
} from "./constants.js";
import { InvalidConfigError } from "./errors.js";

/** Fixed at construction; the raffle never mutates it. */
export interface RaffleConfig {
  readonly entranceFee: bigint;
  readonly intervalSec: number;
  readonly keyHash: string;
  readonly subscriptionId: bigint;
  readonly callbackGasLimit: number;
  readonly requestConfirmations: number;
  readonly numWords: number;
  readonly nativePayment: boolean;
}

type Env = Record<string, string | undefined>;

export function envInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

export function envBigInt(env: Env, name: string, fallback: bigint): bigint {
  const raw = env[name]?.trim();
  if (!raw || !/^\d+$/.test(raw)) return fallback;
  return BigInt(raw);
}

export function envBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  return fallback;
}

export function validateRaffleConfig(config: RaffleConfig): RaffleConfig {
  if (config.entranceFee <= 0n) {
    throw new InvalidConfigError("entranceFee", "must be greater than zero");
  }
  if (!Number.isInteger(config.intervalSec) || config.intervalSec <= 0) {
    throw new InvalidConfigError("intervalSec", "must be a positive integer");
  }
  if (config.numWords !== NUM_WORDS) {
    throw new InvalidConfigError("numWords", `must be ${NUM_WORDS}`);
  }
  if (!Number.isInteger(config.requestConfirmations) || config.requestConfirmations < 1) {
    throw new InvalidConfigError("requestConfirmations", "must be at least 1");
  }
  if (!/^0x[0-9a-fA-F]{64}$/.test(config.keyHash)) {
    throw new InvalidConfigError("keyHash", "must be a 32-byte hex string");
  }
  return config;
}

export function loadRaffleConfig(env: Env = process.env): RaffleConfig {
  return validateRaffleConfig({
    entranceFee: envBigInt(env, "ENTRANCE_FEE_LAMPORTS", DEFAULT_ENTRANCE_FEE_LAMPORTS),
    intervalSec: envInt(env, "RAFFLE_INTERVAL_SEC", DEFAULT_INTERVAL_SEC),
    keyHash: env.VRF_KEY_HASH?.trim() || DEFAULT_KEY_HASH,
    subscriptionId: envBigInt(env, "VRF_SUBSCRIPTION_ID", DEFAULT_SUBSCRIPTION_ID),
    callbackGasLimit: envInt(env, "VRF_CALLBACK_GAS_LIMIT", DEFAULT_CALLBACK_GAS_LIMIT),
    requestConfirmations: envInt(env, "VRF_REQUEST_CONFIRMATIONS", DEFAULT_REQUEST_CONFIRMATIONS),
    numWords: NUM_WORDS,
    nativePayment: envBool(env, "VRF_NATIVE_PAYMENT", false),
  });
}
