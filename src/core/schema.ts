import * as Schema from "effect/Schema";

/**
 * One spreadsheet row as returned by the Sheets values API.
 * Cell 0 holds the record timestamp; the URL column is configurable.
 */
export type Row = ReadonlyArray<string>;

export const RowSchema = Schema.Array(Schema.String);

/**
 * A tab inside a spreadsheet, as listed by the Sheets API.
 */
export class TabInfo extends Schema.Class<TabInfo>("TabInfo")({
  sheetId: Schema.Number,
  title: Schema.String,
}) {}

/**
 * A resolved tab, ready for reads and writes.
 */
export class TabHandle extends Schema.Class<TabHandle>("TabHandle")({
  spreadsheetId: Schema.NonEmptyTrimmedString,
  sheetId: Schema.Number,
  title: Schema.String,
}) {}

/**
 * Counts reported by a single transfer run.
 */
export class SyncResult extends Schema.Class<SyncResult>("SyncResult")({
  sourceTab: Schema.String,
  destinationTab: Schema.String,
  rowsRead: Schema.NonNegativeInt,
  rowsMatched: Schema.NonNegativeInt,
  rowsAppended: Schema.NonNegativeInt,
  cursor: Schema.optional(Schema.String),
  dryRun: Schema.Boolean,
  duration: Schema.Number,
}) {}

/**
 * Result used by the scheduler when a run failed and nothing was transferred.
 */
export const emptySyncResult = (sourceTab: string): SyncResult =>
  new SyncResult({
    sourceTab,
    destinationTab: "",
    rowsRead: 0,
    rowsMatched: 0,
    rowsAppended: 0,
    dryRun: false,
    duration: 0,
  });
