import { AppConfig, ConfigEnv, loadConfig } from "../config";
import { OutputWriter, RecordCommandName, runLinks, runRecordCommand } from "../core/commands";
import { HttpGet } from "../core/fetch";
import { ProfileName, isProfileName } from "../extract";
import { createRunId, Logger, LogWriter, MetricsRegistry } from "../observability";

export type CommandName = RecordCommandName | "links";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  url?: string;
  profile?: ProfileName;
  skipInvalid: boolean;
  ignoreHttpsErrors: boolean;
  noColor: boolean;
}

export interface CliUsageError {
  usageError: string;
}

export interface CliIo {
  stdout?: OutputWriter;
  env?: ConfigEnv;
  httpGet?: HttpGet;
  logWriter?: LogWriter;
}

const HELP_TEXT = `
Usage:
  hn-frontpage [command] [options]

Commands:
  stories    Ranked stories as "<rank> | <title>" followed by the link (default)
  table      Two-row table per story: title, then link
  headlines  Story titles, one per line
  links      Every link target on the page, one per line

Options:
  --url <url>        Page to fetch (default https://news.ycombinator.com/)
  --config <path>    Optional path to JSON config file
  --profile <name>   Page layout: ranked | positional | storylink
  --skip-invalid     Warn about and skip stories with missing fields instead of failing
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --no-color         Plain table output
  -h, --help         Show this help
`;

const COMMANDS: readonly CommandName[] = ["stories", "table", "headlines", "links"];
const VALUE_OPTIONS = ["--url", "--config", "--profile"] as const;
const FLAG_OPTIONS = ["--skip-invalid", "--ignore-https-errors", "--no-color"] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];
type FlagOption = (typeof FLAG_OPTIONS)[number];

function parseCommand(raw: string): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function isValueOption(arg: string): arg is ValueOption {
  return VALUE_OPTIONS.some((option) => option === arg);
}

function isFlagOption(arg: string): arg is FlagOption {
  return FLAG_OPTIONS.some((option) => option === arg);
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" | CliUsageError {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  let rest = argv;
  let command: CommandName = "stories";
  if (argv[0] !== undefined && !argv[0].startsWith("-")) {
    const parsed = parseCommand(argv[0]);
    if (!parsed) {
      return { usageError: `Unknown command: ${argv[0]}` };
    }
    command = parsed;
    rest = argv.slice(1);
  }

  const values = new Map<ValueOption, string>();
  const flags = new Set<FlagOption>();
  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (isFlagOption(arg)) {
      flags.add(arg);
      continue;
    }
    if (!isValueOption(arg)) {
      return { usageError: `Unknown argument: ${arg}` };
    }
    const value = rest[index + 1];
    if (value === undefined || value.startsWith("-")) {
      return { usageError: `Missing value for ${arg}` };
    }
    values.set(arg, value);
    index += 1;
  }

  const profileRaw = values.get("--profile");
  if (profileRaw !== undefined) {
    if (!isProfileName(profileRaw)) {
      return { usageError: `Unknown profile: ${profileRaw}` };
    }
    if (command === "links") {
      return { usageError: "--profile does not apply to the links command" };
    }
  }

  return {
    command,
    configPath: values.get("--config"),
    url: values.get("--url"),
    profile: profileRaw !== undefined && isProfileName(profileRaw) ? profileRaw : undefined,
    skipInvalid: flags.has("--skip-invalid"),
    ignoreHttpsErrors: flags.has("--ignore-https-errors"),
    noColor: flags.has("--no-color"),
  };
}

function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    baseUrl: parsed.url ?? config.baseUrl,
    skipInvalidRecords: parsed.skipInvalid || config.skipInvalidRecords,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    color: parsed.noColor ? false : config.color,
  };
}

export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const stdout = io.stdout ?? process.stdout;
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    stdout.write(`${HELP_TEXT.trim()}\n`);
    return 0;
  }
  if ("usageError" in parsed) {
    console.error(parsed.usageError);
    stdout.write(`${HELP_TEXT.trim()}\n`);
    return 2;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath, io.env), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel }, io.logWriter);
  const context = { runId, config, logger, metrics, output: stdout, httpGet: io.httpGet };

  logger.info("command_start", {
    command: parsed.command,
    url: config.baseUrl,
    profile: parsed.profile,
    skipInvalid: config.skipInvalidRecords,
  });

  try {
    const count =
      parsed.command === "links"
        ? await runLinks({ ...context, logger: logger.child("links") })
        : await runRecordCommand({ ...context, logger: logger.child(parsed.command) }, parsed.command, parsed.profile);

    logger.info("command_complete", { command: parsed.command, count });
    return 0;
  } finally {
    metrics.printSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
