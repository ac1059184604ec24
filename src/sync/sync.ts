import { Clock, Data, Effect, Option } from "effect";
import { AppConfig } from "../config";
import { type Row, SyncResult, TabHandle } from "../core/schema";
import { GoogleSheetsService } from "../google/client";
import { computeCursor, formatRecordDate } from "../transfer/cursor";
import { removeDuplicates } from "../transfer/dedup";
import { summarizeSelection } from "../transfer/filter";
import {
  formatSyncMetadata,
  formatTimestamp,
  isMetadataRowFree,
  PENDING_METADATA,
} from "../transfer/metadata";
import { destinationTabName, periodAt, resolveDestinationTab } from "../transfer/tabs";

export class SourceTabNotFoundError extends Data.TaggedError("SourceTabNotFoundError")<{
  readonly message: string;
  readonly tabName: string;
  readonly availableTabs: ReadonlyArray<string>;
}> {}

export class SyncError extends Data.TaggedError("SyncError")<{
  readonly message: string;
  readonly tabName: string;
  readonly rowsAttempted: number;
  readonly cause?: unknown;
}> {}

export interface TransferOptions {
  readonly sourceTab: string;
  readonly domain: string;
  readonly urlColumn: number;
}

export class SyncService extends Effect.Service<SyncService>()("SyncService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const sheets = yield* GoogleSheetsService;
    const { sourceSpreadsheetId, destinationSpreadsheetId } = config.sheets;
    const settings = config.transfer;

    const readSource = (sourceTab: string) =>
      Effect.gen(function* () {
        const tabs = yield* sheets.listTabs(sourceSpreadsheetId);
        const titles = tabs.map((tab) => tab.title);
        if (!titles.includes(sourceTab)) {
          return yield* Effect.fail(
            new SourceTabNotFoundError({
              message: `Source tab '${sourceTab}' not found. Available tabs: ${titles.map((t) => `'${t}'`).join(", ")}`,
              tabName: sourceTab,
              availableTabs: titles,
            })
          );
        }

        const rows = yield* sheets.readTab(sourceSpreadsheetId, sourceTab);
        return rows.slice(settings.sourceHeaderRows);
      });

    // A dry run never creates the tab; a missing one reads as empty
    const openDestination = (now: Date) =>
      Effect.gen(function* () {
        const period = periodAt(now, settings.timeZone);
        if (!settings.dryRun) {
          const tab = yield* resolveDestinationTab(destinationSpreadsheetId, period, {
            firstTabName: settings.firstTabName,
            locale: settings.tabLocale,
          });
          return { tab: Option.some(tab), title: tab.title };
        }

        const title = destinationTabName(period, settings.firstTabName, settings.tabLocale);
        const tab = yield* sheets.findTab(destinationSpreadsheetId, title);
        return { tab, title };
      }).pipe(Effect.provideService(GoogleSheetsService, sheets));

    const writeSurvivors = (tab: TabHandle, rows: ReadonlyArray<Row>, destinationEmpty: boolean) =>
      Effect.gen(function* () {
        // Row 1 belongs to the metadata cell; claim it before the first append
        if (destinationEmpty) {
          yield* sheets.writeCell(tab, settings.metadataCell, PENDING_METADATA[settings.tabLocale]);
        }
        yield* sheets.appendRows(tab, rows);
      }).pipe(
        Effect.mapError(
          (error) =>
            new SyncError({
              message: `Failed to append ${rows.length} rows to '${tab.title}': ${error.message}`,
              tabName: tab.title,
              rowsAttempted: rows.length,
              cause: error,
            })
        )
      );

    const writeMetadata = (tab: TabHandle, rowsAppended: number) =>
      Effect.gen(function* () {
        const finishedAt = new Date(yield* Clock.currentTimeMillis);
        const value = formatSyncMetadata(
          formatTimestamp(finishedAt, settings.timeZone),
          rowsAppended,
          settings.tabLocale
        );
        yield* sheets.writeCell(tab, settings.metadataCell, value);
        yield* Effect.logDebug(`Metadata ${settings.metadataCell} set to '${value}'`);
      }).pipe(
        Effect.mapError(
          (error) =>
            new SyncError({
              message: `Failed to write sync metadata to '${tab.title}': ${error.message}`,
              tabName: tab.title,
              rowsAttempted: rowsAppended,
              cause: error,
            })
        )
      );

    const runOnce = (options: TransferOptions) =>
      Effect.gen(function* () {
        const startTime = yield* Clock.currentTimeMillis;

        yield* Effect.logInfo(
          `Starting transfer: domain=${options.domain}, urlColumn=${options.urlColumn}, sourceTab='${options.sourceTab}'`
        );

        const sourceRows = yield* readSource(options.sourceTab);
        yield* Effect.logInfo(`Read ${sourceRows.length} source rows`);

        const destination = yield* openDestination(new Date(startTime));
        const destinationRows = Option.isSome(destination.tab)
          ? yield* sheets.readTab(destinationSpreadsheetId, destination.title)
          : [];
        yield* Effect.logInfo(
          `Destination tab '${destination.title}' has ${destinationRows.length} rows`
        );

        const cursor = computeCursor(destinationRows);
        const cursorLabel = Option.map(cursor, formatRecordDate);
        yield* Option.match(cursorLabel, {
          onNone: () => Effect.logInfo("No cursor at destination, every matching row is a candidate"),
          onSome: (label) => Effect.logInfo(`Only rows newer than ${label} are considered`),
        });

        const selection = summarizeSelection(sourceRows, {
          domain: options.domain,
          urlColumn: options.urlColumn,
          cursor,
        });
        yield* Effect.logDebug(
          `Selection: candidates=${selection.candidates.length}, outsideDomain=${selection.outsideDomain}, notNewer=${selection.notNewer}`
        );

        const survivors = removeDuplicates(selection.candidates, destinationRows);
        if (survivors.length < selection.candidates.length) {
          yield* Effect.logInfo(
            `Dropped ${selection.candidates.length - survivors.length} duplicate rows`
          );
        }

        if (Option.isSome(destination.tab)) {
          const tab = destination.tab.value;
          if (settings.dryRun) {
            yield* Effect.logInfo(`Dry run: would append ${survivors.length} rows to '${tab.title}'`);
          } else {
            if (survivors.length > 0) {
              yield* writeSurvivors(tab, survivors, destinationRows.length === 0);
              yield* Effect.logInfo(`Appended ${survivors.length} rows to '${tab.title}'`);
            }
            if (isMetadataRowFree(destinationRows, settings.metadataCell)) {
              yield* writeMetadata(tab, survivors.length);
            } else {
              yield* Effect.logWarning(
                `Row of metadata cell ${settings.metadataCell} on '${tab.title}' holds a record, leaving it unchanged`
              );
            }
          }
        } else {
          yield* Effect.logInfo(
            `Dry run: tab '${destination.title}' does not exist yet, would create it and append ${survivors.length} rows`
          );
        }

        const duration = (yield* Clock.currentTimeMillis) - startTime;
        const result = new SyncResult({
          sourceTab: options.sourceTab,
          destinationTab: destination.title,
          rowsRead: sourceRows.length,
          rowsMatched: selection.candidates.length,
          rowsAppended: settings.dryRun ? 0 : survivors.length,
          ...Option.match(cursorLabel, { onNone: () => ({}), onSome: (label) => ({ cursor: label }) }),
          dryRun: settings.dryRun,
          duration,
        });

        yield* Effect.logInfo(
          `Transfer complete: read=${result.rowsRead}, matched=${result.rowsMatched}, appended=${result.rowsAppended}, duration=${duration}ms`
        );
        return result;
      }).pipe(Effect.annotateLogs({ sourceTab: options.sourceTab }));

    const run = runOnce({
      sourceTab: settings.sourceTab,
      domain: settings.domain,
      urlColumn: settings.urlColumn,
    });

    return { run, runOnce };
  }),
  dependencies: [GoogleSheetsService.Default],
}) {}
