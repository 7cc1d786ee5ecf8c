type EngineCli = {
  host?: string;
  port?: number;
  stateFile: string | null;
  envFile: string | null;
  help: boolean;
};

export const HELP_TEXT = [
  "deskmode",
  "",
  "Usage:",
  "  npm start -- [--host 0.0.0.0] [--port 9001|0] [--random-port] [--state-file <path>] [--env-file <path>]",
  "",
  "Options:",
  "  --host <host>        Bind host (default: DESKMODE_HOST or 0.0.0.0)",
  "  --port <port>        Bind port (default: DESKMODE_PORT or 9001). Use 0 for an ephemeral port.",
  "  --random-port        Alias for --port 0",
  "  --state-file <path>  Write {host,port,pid,startedAt} as JSON after binding.",
  "  --env-file <path>    Load KEY=value lines before reading configuration (default: .deskmode/env).",
  "  -h, --help           Show help",
].join("\n");

export function parseEngineCli(argv: string[]): EngineCli {
  let host: string | undefined;
  let port: number | undefined;
  let stateFile: string | null = null;
  let envFile: string | null = null;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    const next = () => {
      const v = argv[i + 1];
      if (!v) throw new Error(`Missing value for ${arg}`);
      i++;
      return v;
    };

    switch (arg) {
      case "-h":
      case "--help":
        help = true;
        break;
      case "--host":
        host = next();
        break;
      case "--port": {
        const v = Number(next());
        if (!Number.isInteger(v) || v < 0 || v > 65535) throw new Error("Invalid --port value");
        port = v;
        break;
      }
      case "--random-port":
        port = 0;
        break;
      case "--state-file":
        stateFile = next();
        break;
      case "--env-file":
        envFile = next();
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { host, port, stateFile, envFile, help };
}
