import { Array as Arr, Option } from "effect";
import type { Row } from "../core/schema";

const RECORD_DATE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parse a `YYYY-MM-DD HH:MM:SS` cell.
 *
 * The wall-clock value is kept as a UTC instant. Source and destination share the same
 * convention, so comparing instants compares the written timestamps exactly.
 * Anything else, including impossible calendar dates, is `None`.
 */
export const parseRecordDate = (cell: string | undefined): Option.Option<Date> => {
  if (cell === undefined) {
    return Option.none();
  }
  const match = RECORD_DATE.exec(cell.trim());
  if (match === null) {
    return Option.none();
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (hour > 23 || minute > 59 || second > 59) {
    return Option.none();
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls 2025-02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return Option.none();
  }
  return Option.some(date);
};

const pad = (n: number): string => String(n).padStart(2, "0");

export const formatRecordDate = (date: Date): string =>
  `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
  `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;

/**
 * Newest record date already present at the destination.
 * Rows whose first cell does not parse are ignored; `None` when nothing parses.
 */
export const computeCursor = (destinationRows: ReadonlyArray<Row>): Option.Option<Date> =>
  Arr.reduce(destinationRows, Option.none<Date>(), (cursor, row) =>
    Option.match(parseRecordDate(row[0]), {
      onNone: () => cursor,
      onSome: (date) =>
        Option.match(cursor, {
          onNone: () => Option.some(date),
          onSome: (current) => (date.getTime() > current.getTime() ? Option.some(date) : cursor),
        }),
    })
  );

/**
 * Whether a source row is past the cursor.
 *
 * Without a cursor every row qualifies, undateable ones included. Once a cursor exists
 * the row's date must parse and be strictly later.
 */
export const isNewer = (row: Row, cursor: Option.Option<Date>): boolean =>
  Option.match(cursor, {
    onNone: () => true,
    onSome: (watermark) =>
      Option.exists(parseRecordDate(row[0]), (date) => date.getTime() > watermark.getTime()),
  });
