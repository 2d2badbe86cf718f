import { ConfigError } from "./engine/engine-errors";

export type TransferPolicy = "batched" | "staged";
export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export type TableflowConfig = {
  /** Byte alignment of table headers and column regions. */
  alignment: number;
  transferPolicy: TransferPolicy;
  /** Upper bound for a single host buffer allocation. */
  maxHostBytes: number;
  /** Print a latency report after each pipeline run. */
  profile: boolean;
  logLevel: LogLevel;
  /** Registered backend that `createContext()` opens by default. */
  backend: string;
};

const TRANSFER_POLICIES: readonly TransferPolicy[] = ["batched", "staged"];
const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "error",
  "warn",
  "info",
  "debug",
];

export const DEFAULT_CONFIG: Readonly<TableflowConfig> = {
  alignment: 32,
  transferPolicy: "batched",
  maxHostBytes: 4096 * 1024 * 1024,
  profile: false,
  logLevel: "warn",
  backend: "sim",
};

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseOneOf<T extends string>(
  name: string,
  raw: string,
  allowed: readonly T[],
): T {
  const match = allowed.find((value) => value === raw.toLowerCase());
  if (match === undefined) {
    throw new ConfigError(
      `${name} must be one of ${allowed.join(", ")}, got "${raw}"`,
    );
  }
  return match;
}

/**
 * Resolve configuration from `TABLEFLOW_*` environment variables, falling back
 * to defaults for anything unset or empty.
 */
export function resolveConfig(
  env: Record<string, string | undefined> = process.env,
): TableflowConfig {
  const config: TableflowConfig = { ...DEFAULT_CONFIG };

  const alignment = env.TABLEFLOW_ALIGNMENT;
  if (alignment) {
    config.alignment = parsePositiveInt("TABLEFLOW_ALIGNMENT", alignment);
    if (!isPowerOfTwo(config.alignment)) {
      throw new ConfigError(
        `TABLEFLOW_ALIGNMENT must be a power of two, got ${config.alignment}`,
      );
    }
  }

  const policy = env.TABLEFLOW_TRANSFER_POLICY;
  if (policy) {
    config.transferPolicy = parseOneOf(
      "TABLEFLOW_TRANSFER_POLICY",
      policy,
      TRANSFER_POLICIES,
    );
  }

  const maxHostMb = env.TABLEFLOW_MAX_HOST_MB;
  if (maxHostMb) {
    config.maxHostBytes =
      parsePositiveInt("TABLEFLOW_MAX_HOST_MB", maxHostMb) * 1024 * 1024;
  }

  const profile = env.TABLEFLOW_PROFILE;
  if (profile) {
    config.profile = profile !== "0" && profile.toLowerCase() !== "false";
  }

  const logLevel = env.TABLEFLOW_LOG;
  if (logLevel) {
    config.logLevel = parseOneOf("TABLEFLOW_LOG", logLevel, LOG_LEVELS);
  }

  const backend = env.TABLEFLOW_BACKEND?.trim();
  if (backend) {
    config.backend = backend;
  }

  return config;
}

let activeConfig: TableflowConfig | null = null;

/** Process-wide configuration, resolved from the environment on first use. */
export function getConfig(): TableflowConfig {
  if (!activeConfig) {
    activeConfig = resolveConfig();
  }
  return activeConfig;
}

export function setConfig(overrides: Partial<TableflowConfig>): TableflowConfig {
  activeConfig = { ...getConfig(), ...overrides };
  return activeConfig;
}

export function resetConfig(): void {
  activeConfig = null;
}
