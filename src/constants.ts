export const CLI_NAME = "tidyd";
export const VERSION = "0.3.0";

export const CONFIG_FILE_NAME = "config.toml";

function envNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

// bounded wait of the supervisor loop; the config source is polled once per turn
export const SELECT_TIMEOUT_MS = envNumber("TIDYD_SELECT_TIMEOUT_MS", 1000);

// new files must stop growing for this long before they are reported (0 = off)
export const STABILITY_MS = envNumber("TIDYD_STABILITY_MS", 200);
export const STABILITY_POLL_MS = envNumber("TIDYD_STABILITY_POLL_MS", 50);
