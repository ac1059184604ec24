import { Command, InvalidArgumentError } from "commander";
import { ConfigProvider } from "effect";

export interface CliOptions {
  readonly column?: number;
  readonly domain?: string;
  readonly sourceTab?: string;
  readonly debug: boolean;
  readonly dryRun: boolean;
  readonly schedule: boolean;
}

const parseColumn = (value: string): number => {
  const column = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(column)) {
    throw new InvalidArgumentError("Column index must be a non-negative integer.");
  }
  return column;
};

export const createProgram = (): Command =>
  new Command()
    .name("sheet-domain-transfer")
    .description(
      "Copy rows whose URL column points at a domain from a source tab to the monthly destination tab"
    )
    .option("--column <index>", "index of the URL column (default 9, column J)", parseColumn)
    .option("--domain <domain>", "target domain, subdomains included (default forum-info.ru)")
    .option("--source-tab <name>", "source tab name (default 'Май 2025')")
    .option("--debug", "enable debug logging", false)
    .option("--dry-run", "compute the transfer without writing anything", false)
    .option("--schedule", "run now and then on SYNC_CRON instead of once", false);

export const parseCliOptions = (argv: ReadonlyArray<string>): CliOptions => {
  const program = createProgram().exitOverride().parse([...argv], { from: "node" });
  const opts = program.opts<{
    column?: number;
    domain?: string;
    sourceTab?: string;
    debug: boolean;
    dryRun: boolean;
    schedule: boolean;
  }>();

  return {
    ...(opts.column !== undefined ? { column: opts.column } : {}),
    ...(opts.domain !== undefined ? { domain: opts.domain } : {}),
    ...(opts.sourceTab !== undefined ? { sourceTab: opts.sourceTab } : {}),
    debug: opts.debug,
    dryRun: opts.dryRun,
    schedule: opts.schedule,
  };
};

/**
 * Environment keys set by command-line flags. Flags win over the environment.
 */
export const cliOverrides = (options: CliOptions): ReadonlyMap<string, string> => {
  const overrides = new Map<string, string>();
  if (options.column !== undefined) overrides.set("URL_COLUMN", String(options.column));
  if (options.domain !== undefined) overrides.set("TARGET_DOMAIN", options.domain);
  if (options.sourceTab !== undefined) overrides.set("SOURCE_TAB", options.sourceTab);
  if (options.debug) overrides.set("LOG_LEVEL", "debug");
  if (options.dryRun) overrides.set("DRY_RUN", "true");
  return overrides;
};

export const cliConfigProvider = (
  options: CliOptions,
  fallback: ConfigProvider.ConfigProvider = ConfigProvider.fromEnv()
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map(cliOverrides(options))).pipe(ConfigProvider.orElse(() => fallback));
