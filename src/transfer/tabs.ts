import { Effect, Option } from "effect";
import { GoogleSheetsService } from "../google/client";

export type TabLocale = "ru" | "en";

export const MONTH_NAMES: Record<TabLocale, ReadonlyArray<string>> = {
  ru: [
    "Январь",
    "Февраль",
    "Март",
    "Апрель",
    "Май",
    "Июнь",
    "Июль",
    "Август",
    "Сентябрь",
    "Октябрь",
    "Ноябрь",
    "Декабрь",
  ],
  en: [
    "January",
    "February",
    "March",
    "April",
    "May",
    "June",
    "July",
    "August",
    "September",
    "October",
    "November",
    "December",
  ],
};

/**
 * A calendar month. `month` is 1-based.
 */
export interface Period {
  readonly month: number;
  readonly year: number;
}

/**
 * Calendar month of `instant` as seen in `timeZone`.
 */
export const periodAt = (instant: Date, timeZone: string): Period => {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "numeric",
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value);

  return { month: part("month"), year: part("year") };
};

export const comparePeriods = (a: Period, b: Period): number =>
  a.year !== b.year ? a.year - b.year : a.month - b.month;

export const tabNameFor = (period: Period, locale: TabLocale): string =>
  `${MONTH_NAMES[locale][period.month - 1]} ${period.year}`;

export const parseTabName = (name: string, locale: TabLocale): Option.Option<Period> => {
  const match = /^(\S+) (\d{4})$/.exec(name.trim());
  if (match === null) {
    return Option.none();
  }
  const index = MONTH_NAMES[locale].indexOf(match[1]);
  return index === -1 ? Option.none() : Option.some({ month: index + 1, year: Number(match[2]) });
};

/**
 * Destination tab name for a period.
 *
 * `firstTabName` seeds the first period: anything earlier resolves to it. When it is not
 * a month name in `locale`, periods map straight to their own names.
 */
export const destinationTabName = (
  period: Period,
  firstTabName: string,
  locale: TabLocale
): string =>
  Option.match(parseTabName(firstTabName, locale), {
    onNone: () => tabNameFor(period, locale),
    onSome: (first) => (comparePeriods(period, first) <= 0 ? firstTabName : tabNameFor(period, locale)),
  });

export interface TabResolution {
  readonly firstTabName: string;
  readonly locale: TabLocale;
}

/**
 * Get or create the destination tab for `period`.
 */
export const resolveDestinationTab = (
  spreadsheetId: string,
  period: Period,
  resolution: TabResolution
) =>
  Effect.gen(function* () {
    const sheets = yield* GoogleSheetsService;
    const title = destinationTabName(period, resolution.firstTabName, resolution.locale);
    yield* Effect.logDebug(`Resolving destination tab '${title}'`);
    return yield* sheets.ensureTab(spreadsheetId, title);
  });
