/**
 * Sheet Domain Transfer
 *
 * Copy rows that link to a target domain from a source Google Sheets tab into the
 * destination tab for the current month, once or on a schedule.
 */

import { CommanderError } from "commander";
import { type ConfigError, type Cron, Effect, Layer } from "effect";
import { cliConfigProvider, type CliOptions, parseCliOptions } from "./cli/options";
import { LoggerLive } from "./core/logger";
import type { GoogleAuthError, SheetsApiError } from "./google/client";
import { CronService } from "./scheduler/cron";
import { type SourceTabNotFoundError, type SyncError, SyncService } from "./sync/sync";

const runOnce = Effect.gen(function* () {
  const syncService = yield* SyncService;
  const result = yield* syncService.run;

  yield* Effect.logInfo("Transfer finished").pipe(
    Effect.annotateLogs({
      read: result.rowsRead,
      matched: result.rowsMatched,
      appended: result.rowsAppended,
      destinationTab: result.destinationTab,
      duration: `${result.duration}ms`,
    })
  );
});

const runScheduled = Effect.gen(function* () {
  const cronService = yield* CronService;
  yield* cronService.runScheduled;
});

const program = (options: CliOptions) => {
  const configLayer = Layer.setConfigProvider(cliConfigProvider(options));
  const main: Effect.Effect<
    void,
    | ConfigError.ConfigError
    | Cron.ParseError
    | GoogleAuthError
    | SheetsApiError
    | SourceTabNotFoundError
    | SyncError
  > = options.schedule
    ? runScheduled.pipe(Effect.provide(CronService.Default))
    : runOnce.pipe(Effect.provide(SyncService.Default));

  return main.pipe(
    Effect.tapErrorCause((cause) => Effect.logError("Fatal error", cause)),
    Effect.provide(LoggerLive),
    Effect.provide(configLayer)
  );
};

const parseArgs = (): CliOptions | undefined => {
  try {
    return parseCliOptions(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return undefined;
    }
    throw err;
  }
};

const options = parseArgs();
if (options !== undefined) {
  Effect.runPromiseExit(program(options)).then((exit) => {
    if (exit._tag === "Failure") {
      process.exitCode = 1;
    }
  });
}
