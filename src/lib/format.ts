import { LAMPORTS_PER_SOL } from "./constants.js";

const solFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 4,
  maximumFractionDigits: 4,
});

// Lamports → SOL, for logs and the health line. Precision past 4 decimals is dropped.
export function formatSol(lamports: bigint): string {
  const whole = lamports / LAMPORTS_PER_SOL;
  const frac = lamports % LAMPORTS_PER_SOL;
  return solFormatter.format(Number(whole) + Number(frac) / Number(LAMPORTS_PER_SOL));
}

export function formatDuration(sec: number): string {
  if (!Number.isFinite(sec) || sec < 0) return "0s";
  const s = Math.floor(sec);
  if (s < 60) return `${s}s`;
  if (s < 3600) return `${Math.floor(s / 60)}m${s % 60 ? ` ${s % 60}s` : ""}`;
  return `${Math.floor(s / 3600)}h${Math.floor((s % 3600) / 60) ? ` ${Math.floor((s % 3600) / 60)}m` : ""}`;
}
