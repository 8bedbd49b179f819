export const DEFAULT_PORT = 8006;

export type ApiProtocol = "https" | "http";

export interface HostPort {
  host: string;
  port: number;
}

function parsePort(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const port = Number(raw);
  return port > 0 && port <= 65535 ? port : null;
}

/**
 * Splits `host[:port]`. Bracketed IPv6 literals (`[fd00::1]:8006`) are
 * supported; an unparseable port leaves the whole entry as the host name.
 */
export function parseHostPort(entry: string, defaultPort: number = DEFAULT_PORT): HostPort {
  const trimmed = entry.trim();

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(trimmed);
  if (bracketed) {
    const port = bracketed[2] === undefined ? null : parsePort(bracketed[2]);
    return { host: bracketed[1], port: port ?? defaultPort };
  }

  const colon = trimmed.indexOf(":");
  if (colon === -1) {
    return { host: trimmed, port: defaultPort };
  }
  const port = parsePort(trimmed.slice(colon + 1));
  if (port === null) {
    return { host: trimmed, port: defaultPort };
  }
  return { host: trimmed.slice(0, colon), port };
}

export function buildBaseUrl(host: string, port: number, protocol: ApiProtocol = "https"): string {
  const hostPart = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
  return `${protocol}://${hostPart}:${port}/api2/json`;
}
