import { Agent, fetch } from "undici";
import { AllHostsFailedError, HttpError } from "../errors.js";
import { silentLogger, type Logger } from "../telemetry/logger.js";
import type { FormBody, Transport } from "../types/interfaces.js";
import type { VersionInfo } from "../types/cluster.js";
import { decodeVersion, unwrapEnvelope } from "./decode.js";
import { buildBaseUrl, DEFAULT_PORT, parseHostPort, type ApiProtocol } from "./hosts.js";

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export interface PveClientOptions {
  baseUrl: string;
  token?: string;
  verifySsl?: boolean;
  logger?: Logger;
  /** Shared connection pool; created from `verifySsl` when omitted. */
  dispatcher?: Agent;
  /** Aborts every request this client makes, in flight or not yet sent. */
  signal?: AbortSignal;
}

export interface ConnectOptions {
  hosts: string[];
  defaultPort?: number;
  token?: string;
  verifySsl?: boolean;
  probeTimeoutMs?: number;
  protocol?: ApiProtocol;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface Connection {
  client: PveClient;
  /** Answer to the probe that selected the host. */
  version: VersionInfo;
}

type Method = "GET" | "POST" | "DELETE";

function createDispatcher(verifySsl: boolean): Agent {
  return new Agent({ connect: { rejectUnauthorized: verifySsl } });
}

function combineSignals(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((s): s is AbortSignal => s !== undefined);
  return present.length > 1 ? AbortSignal.any(present) : present[0];
}

export class PveClient implements Transport {
  readonly baseUrl: string;
  private readonly token?: string;
  private readonly dispatcher: Agent;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: PveClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.dispatcher = options.dispatcher ?? createDispatcher(options.verifySsl ?? false);
    this.logger = options.logger ?? silentLogger;
    this.signal = options.signal;
  }

  /**
   * Probes each candidate in order with `GET /version` and returns a client
   * bound to the first host that answers. Probes never run in parallel; an
   * abort stops the search instead of moving on to the next host.
   */
  static async connect(options: ConnectOptions): Promise<Connection> {
    const logger = options.logger ?? silentLogger;
    const dispatcher = createDispatcher(options.verifySsl ?? false);
    const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    let lastError: unknown;

    for (const entry of options.hosts) {
      const { host, port } = parseHostPort(entry, options.defaultPort ?? DEFAULT_PORT);
      const client = new PveClient({
        baseUrl: buildBaseUrl(host, port, options.protocol),
        token: options.token,
        dispatcher,
        logger,
        signal: options.signal
      });
      try {
        options.signal?.throwIfAborted();
        const version = await client.version({ signal: AbortSignal.timeout(probeTimeoutMs) });
        logger.debug({ host, port }, "host probe succeeded");
        return { client, version };
      } catch (err) {
        if (options.signal?.aborted) {
          await dispatcher.close();
          throw options.signal.reason;
        }
        logger.debug({ host, port, err }, "host probe failed, trying next host");
        lastError = err;
      }
    }

    await dispatcher.close();
    throw new AllHostsFailedError(options.hosts, lastError);
  }

  async version(opts?: { signal?: AbortSignal }): Promise<VersionInfo> {
    return decodeVersion(await this.request("GET", "/version", undefined, opts?.signal));
  }

  async get(path: string): Promise<unknown> {
    return this.request("GET", path);
  }

  async post(path: string, form?: FormBody): Promise<unknown> {
    return this.request("POST", path, form);
  }

  async delete(path: string): Promise<unknown> {
    return this.request("DELETE", path);
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private async request(method: Method, path: string, form?: FormBody, signal?: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.token) {
      headers.Authorization = `PVEAPIToken=${this.token}`;
    }

    let body: string | undefined;
    if (form !== undefined) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(form)) {
        if (value !== undefined) params.append(key, String(value));
      }
      body = params.toString();
      headers["Content-Type"] = "application/x-www-form-urlencoded";
    }

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body,
      signal: combineSignals(this.signal, signal),
      dispatcher: this.dispatcher
    });
    this.logger.debug({ method, path, status: response.status }, "api request");

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new HttpError(response.status, response.statusText, text.trim());
    }

    return unwrapEnvelope(await response.json(), `${method} ${path}`);
  }
}
