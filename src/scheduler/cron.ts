import { Cron, Duration, Effect, Schedule } from "effect";
import { AppConfig } from "../config";
import { emptySyncResult, type SyncResult } from "../core/schema";
import { describeFailure, NotifyService } from "../error/notify";
import { SyncService } from "../sync/sync";

/**
 * Runs transfers on the SYNC_CRON schedule (hourly at :00 by default).
 * Runs are strictly sequential: the next one starts after the previous one finished.
 */
export class CronService extends Effect.Service<CronService>()("CronService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const syncService = yield* SyncService;
    const notifyService = yield* NotifyService;

    const cron = yield* Cron.parse(config.schedule.cron);
    const schedule = Schedule.cron(cron);

    // Retry schedule for transient API errors (3 retries with exponential backoff)
    const retrySchedule = Schedule.exponential(Duration.seconds(2)).pipe(
      Schedule.intersect(Schedule.recurs(3))
    );

    // Only notify when rows were actually transferred
    const notifySuccess = (result: SyncResult) => {
      if (result.dryRun) {
        return Effect.logInfo("Skipping notification: dry run mode");
      }
      if (result.rowsAppended === 0) {
        return Effect.logInfo("Skipping notification: no rows transferred");
      }

      return notifyService
        .notifySuccess(result)
        .pipe(
          Effect.catchAll((error) =>
            Effect.logWarning(`Failed to send success notification: ${error.message}`)
          )
        );
    };

    const handleSyncError = (errorLabel: string) => (error: unknown) =>
      Effect.gen(function* () {
        yield* Effect.logError(`${errorLabel}: ${describeFailure(error)}`);
        if (!config.transfer.dryRun) {
          yield* notifyService
            .notifyError(error)
            .pipe(
              Effect.catchAll((notifyError) =>
                Effect.logWarning(`Failed to send error notification: ${notifyError.message}`)
              )
            );
        }
        return emptySyncResult(config.transfer.sourceTab);
      });

    // A missing source tab will not appear by retrying
    const syncWithRetry = syncService.run.pipe(
      Effect.retry({
        schedule: retrySchedule,
        while: (error) => error._tag !== "SourceTabNotFoundError",
      }),
      Effect.tap(notifySuccess),
      Effect.catchAll(handleSyncError("Transfer failed after retries"))
    );

    const syncOnce = syncService.run.pipe(
      Effect.tap(notifySuccess),
      Effect.catchAll(handleSyncError("Transfer failed"))
    );

    // First run starts immediately, later ones on the cron schedule
    const runScheduled = Effect.gen(function* () {
      yield* Effect.logInfo(`Starting scheduler (${config.schedule.cron})`);
      yield* syncWithRetry.pipe(
        Effect.repeat(schedule),
        Effect.catchAllCause((cause) => Effect.logError("Scheduler stopped unexpectedly", cause))
      );
    }).pipe(Effect.interruptible);

    return { syncOnce, syncWithRetry, runScheduled };
  }),
  dependencies: [SyncService.Default, NotifyService.Default],
}) {}
