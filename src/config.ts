import { Config, Option } from "effect";
import { isValidTimeZone } from "./transfer/metadata";
import type { TabLocale } from "./transfer/tabs";

export interface AppConfig {
  google: {
    serviceAccountEmail: string;
    serviceAccountPrivateKey: string;
  };
  sheets: {
    sourceSpreadsheetId: string;
    destinationSpreadsheetId: string;
  };
  transfer: {
    sourceTab: string;
    sourceHeaderRows: number;
    urlColumn: number;
    domain: string;
    firstTabName: string;
    tabLocale: TabLocale;
    timeZone: string;
    metadataCell: string;
    dryRun: boolean;
  };
  schedule: {
    cron: string;
  };
  notify: {
    discordWebhookUrl: string | undefined;
  };
}

export const DEFAULT_SOURCE_TAB = "Май 2025";
export const DEFAULT_DOMAIN = "forum-info.ru";
export const DEFAULT_URL_COLUMN = 9;

export const AppConfig = Config.all({
  google: Config.all({
    serviceAccountEmail: Config.string("GOOGLE_SERVICE_ACCOUNT_EMAIL"),
    serviceAccountPrivateKey: Config.string("GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY").pipe(
      Config.map((key) => key.replace(/\\n/g, "\n"))
    ),
  }),
  sheets: Config.all({
    sourceSpreadsheetId: Config.string("SOURCE_SPREADSHEET_ID"),
    destinationSpreadsheetId: Config.string("DESTINATION_SPREADSHEET_ID"),
  }),
  transfer: Config.all({
    sourceTab: Config.string("SOURCE_TAB").pipe(Config.withDefault(DEFAULT_SOURCE_TAB)),
    sourceHeaderRows: Config.integer("SOURCE_HEADER_ROWS").pipe(
      Config.validate({ message: "must be zero or more", validation: (n: number) => n >= 0 }),
      Config.withDefault(1)
    ),
    urlColumn: Config.integer("URL_COLUMN").pipe(
      Config.validate({ message: "must be zero or more", validation: (n: number) => n >= 0 }),
      Config.withDefault(DEFAULT_URL_COLUMN)
    ),
    domain: Config.string("TARGET_DOMAIN").pipe(Config.withDefault(DEFAULT_DOMAIN)),
    firstTabName: Config.string("FIRST_TAB_NAME").pipe(Config.withDefault(DEFAULT_SOURCE_TAB)),
    tabLocale: Config.literal("ru", "en")("TAB_LOCALE").pipe(Config.withDefault("ru" as const)),
    timeZone: Config.string("TIME_ZONE").pipe(
      Config.validate({ message: "must be an IANA time zone", validation: isValidTimeZone }),
      Config.withDefault("Europe/Moscow")
    ),
    metadataCell: Config.string("METADATA_CELL").pipe(Config.withDefault("A1")),
    dryRun: Config.string("DRY_RUN").pipe(
      Config.map((v) => v.toLowerCase() === "true"),
      Config.withDefault(false)
    ),
  }),
  schedule: Config.all({
    cron: Config.string("SYNC_CRON").pipe(Config.withDefault("0 * * * *")),
  }),
  notify: Config.all({
    discordWebhookUrl: Config.string("DISCORD_WEBHOOK_URL").pipe(
      Config.option,
      Config.map((url) => Option.getOrUndefined(Option.filter(url, (value) => value.length > 0)))
    ),
  }),
});
