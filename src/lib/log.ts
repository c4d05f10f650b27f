/**
 * Timestamped console logging shared by the raffle core and the crank.
 * Lines look like `[12:00:01.250] [raffle] ✓ Winner picked`.
 */
export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

function stamp(): string {
  return new Date().toISOString().slice(11, 23);
}

export function createLogger(scope: string): Logger {
  return {
    info(msg) {
      console.log(`[${stamp()}] [${scope}] ${msg}`);
    },
    warn(msg) {
      console.warn(`[${stamp()}] [${scope}] ${msg}`);
    },
    error(msg, err) {
      if (err === undefined) {
        console.error(`[${stamp()}] [${scope}] ${msg}`);
      } else {
        console.error(`[${stamp()}] [${scope}] ${msg}`, err);
      }
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
