/**
 * Command line parsing
 */

export type Command = "serve" | "sync" | "ask" | "resolve" | "help";

const COMMANDS: readonly Command[] = ["serve", "sync", "ask", "resolve", "help"];

export interface CliArgs {
  command: Command;
  /** Question for ask, reference for resolve, channel for sync */
  positional: string;
  options: {
    channel?: string;
    count?: number;
    port?: number;
    verbose: boolean;
    json: boolean;
  };
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parsePositiveInt(value: string | undefined): number | undefined {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = {
    command: "help",
    positional: "",
    options: {
      verbose: false,
      json: false,
    },
  };

  const words: string[] = [];
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (!commandSeen && isCommand(arg)) {
      result.command = arg;
      commandSeen = true;
    } else if (arg === "--channel" || arg === "-c") {
      result.options.channel = args[++i];
    } else if (arg === "--count" || arg === "-n") {
      result.options.count = parsePositiveInt(args[++i]);
    } else if (arg === "--port" || arg === "-p") {
      result.options.port = parsePositiveInt(args[++i]);
    } else if (arg === "--verbose" || arg === "-v") {
      result.options.verbose = true;
    } else if (arg === "--json") {
      result.options.json = true;
    } else if (arg === "--help" || arg === "-h") {
      result.command = "help";
      commandSeen = true;
    } else if (!arg.startsWith("-")) {
      words.push(arg);
    }
  }

  result.positional = words.join(" ");
  return result;
}

export const HELP_TEXT = `
Channel Pulse - YouTube channel analytics

USAGE:
  npm start
  npx tsx services/analytics-api/src/index.ts <command> [options]

COMMANDS:
  serve                  Start the HTTP API and chat page
  sync [channel]         Pull recent videos and store new ones
  ask <question>         Answer an analytics question
  resolve <reference>    Print the channel ID for a handle, URL or name
  help                   Show this help message

OPTIONS:
  -c, --channel <ref>    Channel for ask (handle, URL, ID or name)
  -n, --count <number>   Recent videos to sync (default: 5)
  -p, --port <number>    Port for serve (default: PORT or 8000)
      --json             Print raw JSON results
  -v, --verbose          Enable debug logging

EXAMPLES:
  npm run sync -- @SomeChannel --count 10
  npm run ask -- "какое самое популярное видео из последних пяти?"
  npx tsx services/analytics-api/src/index.ts resolve https://youtu.be/abc123
`;
