import { parseArgs } from "node:util";
import { Vatify } from "./client";
import { API_KEY_ENV } from "./config";
import { isVatifyError } from "./errors";
import { consoleLogger } from "./logger";
import type { RateEntry } from "./types";

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const processIo: CliIo = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

const COMMANDS = {
  validate: { args: ["vat_number"], help: "Validate a VAT number" },
  rates: { args: ["country_code"], help: "Get VAT rates for a country" },
  calculate: {
    args: ["country_code", "rate_type", "supply_date"],
    help: "Calculate the VAT rate for a country/rate_type/date",
  },
} as const;

type Command = keyof typeof COMMANDS;

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

const COMMAND_NAMES: Command[] = Object.keys(COMMANDS).filter(isCommand);

function commandUsage(command: Command): string {
  const args: readonly string[] = COMMANDS[command].args;
  return `vatify ${command} ${args.map((a) => `<${a}>`).join(" ")}`;
}

export function usage(): string {
  const width = Math.max(...COMMAND_NAMES.map((c) => commandUsage(c).length));
  return [
    "Usage: vatify [--api-key <key>] [--base-url <url>] [--timeout-ms <ms>] [--verbose] <command>",
    "",
    "Commands:",
    ...COMMAND_NAMES.map((c) => `  ${commandUsage(c).padEnd(width)}  ${COMMANDS[c].help}`),
    "",
    `The API key defaults to ${API_KEY_ENV}.`,
  ].join("\n");
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "api-key": { type: "string" },
      "base-url": { type: "string" },
      "timeout-ms": { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/** undefined when the flag is absent, null when it is not a positive integer. */
function parseTimeout(raw: string | undefined): number | undefined | null {
  if (raw === undefined) return undefined;
  const ms = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  return Number.isSafeInteger(ms) && ms > 0 ? ms : null;
}

export function formatRate(entry: RateEntry): string {
  const line = `${entry.rate_type}\t${entry.rate_percent}%`;
  return entry.label ? `${line}\t${entry.label}` : line;
}

async function execute(client: Vatify, command: Command, args: string[], io: CliIo): Promise<void> {
  switch (command) {
    case "validate": {
      const result = await client.validateVat(args[0] ?? "");
      io.stdout(JSON.stringify(result, null, 2));
      return;
    }
    case "rates": {
      const entries = await client.rates(args[0] ?? "");
      for (const entry of entries) io.stdout(formatRate(entry));
      return;
    }
    case "calculate": {
      const [country_code = "", rate_type = "", supply_date = ""] = args;
      const result = await client.calculate({ country_code, rate_type, supply_date });
      io.stdout(JSON.stringify(result, null, 2));
      return;
    }
  }
}

/**
 * Runs one CLI invocation and resolves to the process exit code.
 */
export async function run(
  argv: string[],
  io: CliIo = processIo,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    io.stderr(usage());
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  if (values.help) {
    io.stdout(usage());
    return EXIT_OK;
  }
  if (command === undefined) {
    io.stderr(usage());
    return EXIT_USAGE;
  }
  if (!isCommand(command)) {
    io.stderr(`Unknown command: ${command}`);
    io.stderr(usage());
    return EXIT_USAGE;
  }
  if (args.length !== COMMANDS[command].args.length) {
    io.stderr(`Usage: ${commandUsage(command)}`);
    return EXIT_USAGE;
  }

  const apiKey = values["api-key"]?.trim() || env[API_KEY_ENV]?.trim();
  if (!apiKey) {
    io.stderr(`Missing API key. Use --api-key or set ${API_KEY_ENV}.`);
    return EXIT_USAGE;
  }

  const timeoutMs = parseTimeout(values["timeout-ms"]);
  if (timeoutMs === null) {
    io.stderr("Invalid --timeout-ms: expected a positive integer.");
    return EXIT_USAGE;
  }

  const client = new Vatify({
    apiKey,
    baseUrl: values["base-url"],
    timeoutMs,
    env,
    logger: values.verbose ? consoleLogger : undefined,
  });

  try {
    await execute(client, command, args, io);
    return EXIT_OK;
  } catch (err) {
    if (!isVatifyError(err)) throw err;
    const status = err.statusCode !== undefined ? ` (status=${err.statusCode})` : "";
    io.stderr(`Error: ${err.message}${status}`);
    return EXIT_ERROR;
  } finally {
    client.close();
  }
}
