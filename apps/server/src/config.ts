export type ServerConfig = {
  /** Interface to bind; undefined binds all interfaces */
  host?: string;
  port: number;
  storeDir: string;
  /** Staging files older than this are removed at startup */
  stagingMaxAgeMs: number;
  sniffLength: number;
  requestLog: boolean;
};

const DEFAULT_LISTEN_ADDR = ":8080";
const DEFAULT_STORE_DIR = "./store";
const DEFAULT_STAGING_MAX_AGE_MS = 60 * 60 * 1000;
const DEFAULT_SNIFF_LENGTH = 512;

const parsePort = (value: string, source: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port in ${source}: ${value}`);
  }
  return port;
};

const parseNonNegative = (value: string | undefined, name: string, fallback: number): number => {
  if (value === undefined || value === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} must be a non-negative integer, got: ${value}`);
  }
  return n;
};

/**
 * Split `host:port`, `:port` or `[v6]:port`.
 */
export function parseListenAddr(addr: string): { host?: string; port: number } {
  const colon = addr.lastIndexOf(":");
  if (colon < 0) throw new Error(`LISTEN_ADDR must be host:port, got: ${addr}`);
  let host = addr.slice(0, colon);
  if (host.startsWith("[") && host.endsWith("]")) host = host.slice(1, -1);
  const port = parsePort(addr.slice(colon + 1), "LISTEN_ADDR");
  return host === "" ? { port } : { host, port };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const listen = parseListenAddr(env.LISTEN_ADDR || DEFAULT_LISTEN_ADDR);
  const port = env.PORT ? parsePort(env.PORT, "PORT") : listen.port;
  const sniffLength = parseNonNegative(env.SNIFF_LENGTH, "SNIFF_LENGTH", DEFAULT_SNIFF_LENGTH);
  if (sniffLength === 0) throw new Error("SNIFF_LENGTH must be positive");
  return {
    host: listen.host,
    port,
    storeDir: env.STORE_DIR || DEFAULT_STORE_DIR,
    stagingMaxAgeMs: parseNonNegative(
      env.STAGING_MAX_AGE_MS,
      "STAGING_MAX_AGE_MS",
      DEFAULT_STAGING_MAX_AGE_MS
    ),
    sniffLength,
    requestLog: env.REQUEST_LOG !== "false",
  };
}
