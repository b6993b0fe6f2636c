export interface CliConfig {
  logLevel: string;
  /** Directory replay files are written to and read from */
  replayDir: string;
  replayLabel: string;
  /** When set, replays are stored in Postgres instead of replayDir */
  databaseUrl: string;
  /** Seed for reproducible hints; random when empty */
  hintSeed: string;
}

export const CONFIG_KEYS: (keyof CliConfig)[] = [
  "logLevel",
  "replayDir",
  "replayLabel",
  "databaseUrl",
  "hintSeed",
];

export const DEFAULTS: CliConfig = {
  logLevel: "warn",
  replayDir: "./replays",
  replayLabel: "replay",
  databaseUrl: "",
  hintSeed: "",
};

export const ENV_MAP: Record<keyof CliConfig, string> = {
  logLevel: "LOG_LEVEL",
  replayDir: "REPLAY_DIR",
  replayLabel: "REPLAY_LABEL",
  databaseUrl: "DATABASE_URL",
  hintSeed: "HINT_SEED",
};

/**
 * Defaults, then environment, then command-line overrides. Empty strings never
 * override a value.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<CliConfig> = {}
): CliConfig {
  const resolved: CliConfig = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const envVal = env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      resolved[key] = envVal;
    }

    const override = overrides[key];
    if (override !== undefined && override !== "") {
      resolved[key] = override;
    }
  }

  return resolved;
}
