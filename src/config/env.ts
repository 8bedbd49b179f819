import { DEFAULT_PORT, type ApiProtocol } from "../apiClient/hosts.js";
import { DEFAULT_PROBE_TIMEOUT_MS } from "../apiClient/pveClient.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_POLL_INTERVAL_MS } from "../services/taskWaiter.js";
import { isLogLevel, type Logger, type LogLevel } from "../telemetry/logger.js";
import { readConfigFile, type ClusterConfig, type ConfigFile } from "./configFile.js";

export const DEFAULT_HOST = "192.168.1.1";
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/** Values given on the command line; unset flags stay undefined. */
export interface CliOverrides {
  config?: string;
  cluster?: string;
  host?: string;
  port?: number;
  token?: string;
  verifySsl?: boolean;
  pollInterval?: number;
  timeout?: number;
  verbose?: boolean;
}

export interface ConnectionSettings {
  hosts: string[];
  port: number;
  token: string;
  verifySsl: boolean;
  protocol: ApiProtocol;
  cluster?: string;
  pollIntervalMs: number;
  /** Unset means wait for tasks indefinitely. */
  taskTimeoutMs?: number;
  probeTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive number`);
  }
  return Math.floor(n);
}

function parsePortValue(raw: string | undefined, name: string): number | undefined {
  const port = parsePositiveInt(raw, name);
  if (port !== undefined && port > 65535) {
    throw new ConfigError(`${name} must be a port number`);
  }
  return port;
}

export function parseBoolean(raw: string | undefined, name: string): boolean | undefined {
  if (raw === undefined) return undefined;
  const value = raw.toLowerCase();
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  throw new ConfigError(`${name} must be one of: true, false`);
}

function parseProtocol(raw: string | undefined): ApiProtocol {
  const value = (raw ?? "https").toLowerCase();
  if (value !== "https" && value !== "http") {
    throw new ConfigError("PROXMOX_PROTOCOL must be one of: https, http");
  }
  return value;
}

export function resolveLogLevel(cli: Pick<CliOverrides, "verbose">, env: Env): LogLevel {
  if (cli.verbose) return "debug";
  const raw = envValue(env, "PROXMOX_LOG_LEVEL")?.toLowerCase();
  if (raw === undefined) return DEFAULT_LOG_LEVEL;
  if (!isLogLevel(raw)) {
    throw new ConfigError("PROXMOX_LOG_LEVEL must be one of: fatal, error, warn, info, debug, trace, silent");
  }
  return raw;
}

export function configFilePath(cli: Pick<CliOverrides, "config">, env: Env): string | undefined {
  return cli.config ?? envValue(env, "PROXMOX_CONFIG");
}

function selectCluster(cli: CliOverrides, envHost: string | undefined, file: ConfigFile | null): [string, ClusterConfig] | null {
  if (cli.cluster !== undefined) {
    const cluster = file?.clusters[cli.cluster];
    if (!cluster) {
      throw new ConfigError(`Cluster '${cli.cluster}' is not defined in the configuration file`);
    }
    return [cli.cluster, cluster];
  }
  if (cli.host !== undefined || envHost !== undefined || file?.host !== undefined) {
    return null;
  }
  const first = Object.entries(file?.clusters ?? {})[0];
  return first ?? null;
}

/**
 * Precedence per setting: command-line flag, environment, configuration file
 * (the selected cluster before top-level keys), built-in default.
 */
export function resolveSettings(input: { cli: CliOverrides; env: Env; file: ConfigFile | null }): ConnectionSettings {
  const { cli, env, file } = input;

  const envHost = envValue(env, "PROXMOX_HOST");
  const envPort = parsePortValue(envValue(env, "PROXMOX_PORT"), "PROXMOX_PORT");
  const envToken = envValue(env, "PROXMOX_API_TOKEN");
  const envVerify = parseBoolean(envValue(env, "PROXMOX_VERIFY_SSL"), "PROXMOX_VERIFY_SSL");

  const selected = selectCluster(cli, envHost, file);
  const cluster = selected?.[1];

  let hosts: string[];
  if (cli.host !== undefined) {
    hosts = [cli.host];
  } else if (cluster) {
    hosts = cluster.hosts;
  } else if (envHost !== undefined) {
    hosts = [envHost];
  } else if (file?.host !== undefined) {
    hosts = [file.host];
  } else {
    hosts = [DEFAULT_HOST];
  }

  const token = cli.token ?? envToken ?? cluster?.token ?? file?.token;
  if (!token) {
    throw new ConfigError("API token is required. Set PROXMOX_API_TOKEN, use -t, or add to config file");
  }

  // yargs hands over NaN for non-numeric input; run flags through the same checks as the environment.
  const cliPort = cli.port === undefined ? undefined : parsePortValue(String(cli.port), "--port");
  const cliPollInterval = cli.pollInterval === undefined ? undefined : parsePositiveInt(String(cli.pollInterval), "--poll-interval");
  const cliTimeout = cli.timeout === undefined ? undefined : parsePositiveInt(String(cli.timeout), "--timeout");

  return {
    hosts,
    port: cliPort ?? envPort ?? cluster?.port ?? file?.port ?? DEFAULT_PORT,
    token,
    verifySsl: cli.verifySsl ?? envVerify ?? cluster?.verifySsl ?? file?.verifySsl ?? false,
    protocol: parseProtocol(envValue(env, "PROXMOX_PROTOCOL")),
    cluster: selected?.[0],
    pollIntervalMs:
      cliPollInterval ?? parsePositiveInt(envValue(env, "PROXMOX_POLL_INTERVAL_MS"), "PROXMOX_POLL_INTERVAL_MS") ?? DEFAULT_POLL_INTERVAL_MS,
    taskTimeoutMs: cliTimeout ?? parsePositiveInt(envValue(env, "PROXMOX_TASK_TIMEOUT_MS"), "PROXMOX_TASK_TIMEOUT_MS"),
    probeTimeoutMs:
      parsePositiveInt(envValue(env, "PROXMOX_PROBE_TIMEOUT_MS"), "PROXMOX_PROBE_TIMEOUT_MS") ?? DEFAULT_PROBE_TIMEOUT_MS
  };
}

export async function loadSettings(cli: CliOverrides, env: Env, logger: Logger): Promise<ConnectionSettings> {
  const filePath = configFilePath(cli, env);
  const file = filePath ? await readConfigFile(filePath, logger) : null;
  const settings = resolveSettings({ cli, env, file });
  logger.debug({ settings }, "resolved connection settings");
  return settings;
}
