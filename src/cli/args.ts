export type CliCommand = "analyze" | "ingest";

export interface CliOptions {
  command: CliCommand;
  paperPath: string;
  jsonOut?: string;
  localOnly: boolean;
  debug: boolean;
}

export const USAGE = [
  "Usage: paper-analyzer [ingest] <path-to-paper.pdf> [--json <out.json>] [--local-only] [--debug]",
  "  ingest:        Structure the paper only and print it as JSON",
  "  --json <file>: Also write the result as JSON ({ paper, analysis, tier }, or the paper for ingest)",
  "  --local-only:  Skip the remote model even when credentials are set",
  "  --debug:       Dump each stage's output under the debug directory",
].join("\n");

export function parseArgs(args: string[]): CliOptions | null {
  const command: CliCommand = args[0] === "ingest" ? "ingest" : "analyze";
  const rest = command === "ingest" ? args.slice(1) : args;
  let paperPath: string | undefined;
  let jsonOut: string | undefined;
  let localOnly = false;
  let debug = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--json") {
      jsonOut = rest[++i];
      if (!jsonOut) return null;
    } else if (arg === "--local-only") {
      localOnly = true;
    } else if (arg === "--debug") {
      debug = true;
    } else if (arg?.startsWith("--")) {
      return null;
    } else if (arg && !paperPath) {
      paperPath = arg;
    }
  }

  if (!paperPath) return null;
  const options: CliOptions = { command, paperPath, localOnly, debug };
  if (jsonOut) options.jsonOut = jsonOut;
  return options;
}
