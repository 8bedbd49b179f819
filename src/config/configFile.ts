import fs from "node:fs/promises";
import { parse } from "smol-toml";
import { isRecord } from "../apiClient/decode.js";
import { ConfigError } from "../errors.js";
import type { Logger } from "../telemetry/logger.js";

export interface ClusterConfig {
  hosts: string[];
  port?: number;
  token?: string;
  verifySsl?: boolean;
}

export interface ConfigFile {
  host?: string;
  port?: number;
  token?: string;
  verifySsl?: boolean;
  /** Insertion order follows the file; the first entry is the default cluster. */
  clusters: Record<string, ClusterConfig>;
}

function readString(table: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ConfigError(`${where}: "${key}" must be a string`);
  return value;
}

function readPort(table: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0 || value > 65535) {
    throw new ConfigError(`${where}: "${key}" must be a port number`);
  }
  return value;
}

function readBoolean(table: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new ConfigError(`${where}: "${key}" must be true or false`);
  return value;
}

function readCluster(name: string, value: unknown, source: string): ClusterConfig {
  const where = `${source} [clusters.${name}]`;
  if (!isRecord(value)) throw new ConfigError(`${where} must be a table`);
  const hosts = value.hosts;
  if (!Array.isArray(hosts) || hosts.length === 0 || !hosts.every((h): h is string => typeof h === "string")) {
    throw new ConfigError(`${where}: "hosts" must be a non-empty list of strings`);
  }
  return {
    hosts,
    port: readPort(value, "port", where),
    token: readString(value, "token", where),
    verifySsl: readBoolean(value, "verify_ssl", where)
  };
}

export function parseConfigFile(text: string, source = "config"): ConfigFile {
  let table: Record<string, unknown>;
  try {
    table = parse(text);
  } catch (err) {
    throw new ConfigError(`${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const clusters: Record<string, ClusterConfig> = {};
  const rawClusters = table.clusters;
  if (rawClusters !== undefined) {
    if (!isRecord(rawClusters)) throw new ConfigError(`${source}: "clusters" must be a table`);
    for (const [name, value] of Object.entries(rawClusters)) {
      clusters[name] = readCluster(name, value, source);
    }
  }

  return {
    host: readString(table, "host", source),
    port: readPort(table, "port", source),
    token: readString(table, "token", source),
    verifySsl: readBoolean(table, "verify_ssl", source),
    clusters
  };
}

/** A missing or broken file is reported and skipped; configuration then comes from flags and environment. */
export async function readConfigFile(filePath: string, logger: Logger): Promise<ConfigFile | null> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    logger.warn({ path: filePath, err }, "config file not readable, ignoring it");
    return null;
  }
  try {
    return parseConfigFile(text, filePath);
  } catch (err) {
    logger.warn({ path: filePath, err }, "config file not valid, ignoring it");
    return null;
  }
}
