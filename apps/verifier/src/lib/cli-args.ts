import { ConfigError } from "./errors.js";

export interface CliArgs {
  port?: number;
  host?: string;
  help: boolean;
}

export const USAGE = `Usage: zk-insurance-verifier [options]

Options:
  -p, --port <port>   Port to listen on (default: $PORT or 8080)
      --host <host>   Address to bind (default: $HOST or 0.0.0.0)
  -h, --help          Show this message
`;

function parsePort(raw: string | undefined): number {
  const port = Number(raw);
  if (!raw || !Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new ConfigError([`--port: expected 1-65535, got "${raw ?? ""}"`]);
  }
  return port;
}

export function parseArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { help: false };

  for (let idx = 0; idx < argv.length; idx++) {
    const arg = argv[idx];
    if (arg === "-p" || arg === "--port") {
      parsed.port = parsePort(argv[idx + 1]);
      idx += 1;
    } else if (arg?.startsWith("--port=")) {
      parsed.port = parsePort(arg.slice("--port=".length));
    } else if (arg === "--host") {
      const host = argv[idx + 1];
      if (!host) {
        throw new ConfigError(["--host: missing value"]);
      }
      parsed.host = host;
      idx += 1;
    } else if (arg === "-h" || arg === "--help") {
      parsed.help = true;
    } else {
      throw new ConfigError([`Unknown argument "${arg}"`]);
    }
  }

  return parsed;
}
