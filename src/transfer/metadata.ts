import { Option } from "effect";
import type { Row } from "../core/schema";
import { parseRecordDate } from "./cursor";
import type { TabLocale } from "./tabs";

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
};

const pad = (value: string | undefined): string => (value ?? "").padStart(2, "0");

/**
 * `YYYY-MM-DD HH:MM:SS` wall-clock time of `instant` in `timeZone`.
 */
export const formatTimestamp = (instant: Date, timeZone: string): string => {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value;

  return `${part("year")}-${pad(part("month"))}-${pad(part("day"))} ${pad(part("hour"))}:${pad(part("minute"))}:${pad(part("second"))}`;
};

export const formatSyncMetadata = (timestamp: string, rowsAppended: number, locale: TabLocale): string =>
  locale === "ru"
    ? `Последняя синхронизация: ${timestamp}. Перенесено записей: ${rowsAppended}`
    : `Last sync: ${timestamp}. Rows transferred: ${rowsAppended}`;

export const PENDING_METADATA: Record<TabLocale, string> = {
  ru: "Последняя синхронизация: выполняется",
  en: "Last sync: in progress",
};

const CELL_ROW = /^\$?[A-Za-z]+\$?(\d+)$/;

/**
 * Zero-based row of an A1 cell reference such as `A1` or `$B$2`.
 */
export const metadataRowIndex = (cellRef: string): number => {
  const match = CELL_ROW.exec(cellRef.trim());
  return match === null ? 0 : Math.max(Number(match[1]) - 1, 0);
};

/**
 * The metadata cell may be written unless its row already holds a dated record.
 */
export const isMetadataRowFree = (rows: ReadonlyArray<Row>, cellRef: string): boolean =>
  Option.isNone(parseRecordDate(rows[metadataRowIndex(cellRef)]?.[0]));
