import {
  FetchHttpClient,
  HttpBody,
  HttpClient,
  type HttpClientError,
  HttpClientRequest,
  type HttpClientResponse,
} from "@effect/platform";
import { Array as Arr, Data, Effect, Option, Schema } from "effect";
import { JWT } from "google-auth-library";
import { AppConfig } from "../config";
import { type Row, RowSchema, TabHandle, TabInfo } from "../core/schema";

const SHEETS_API = "https://sheets.googleapis.com/v4/spreadsheets";

// Schemas for the Sheets API responses we read
class SpreadsheetResponse extends Schema.Class<SpreadsheetResponse>("SpreadsheetResponse")({
  sheets: Schema.optional(Schema.Array(Schema.Struct({ properties: TabInfo }))),
}) {}

class ValuesResponse extends Schema.Class<ValuesResponse>("ValuesResponse")({
  values: Schema.optional(Schema.Array(RowSchema)),
}) {}

class BatchUpdateResponse extends Schema.Class<BatchUpdateResponse>("BatchUpdateResponse")({
  replies: Schema.Array(
    Schema.Struct({
      addSheet: Schema.optional(Schema.Struct({ properties: TabInfo })),
    })
  ),
}) {}

class AppendResponse extends Schema.Class<AppendResponse>("AppendResponse")({
  updates: Schema.optional(Schema.Struct({ updatedRows: Schema.optional(Schema.Number) })),
}) {}

class UpdateResponse extends Schema.Class<UpdateResponse>("UpdateResponse")({
  updatedCells: Schema.optional(Schema.Number),
}) {}

export class GoogleAuthError extends Data.TaggedError("GoogleAuthError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class SheetsApiError extends Data.TaggedError("SheetsApiError")<{
  readonly message: string;
  readonly operation: string;
  readonly cause?: unknown;
}> {}

/**
 * GoogleAuthService - handles Google Service Account authentication using google-auth-library
 */
export class GoogleAuthService extends Effect.Service<GoogleAuthService>()("GoogleAuthService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;

    // JWT caches the token and refreshes it shortly before expiry
    const client = new JWT({
      email: config.google.serviceAccountEmail,
      key: config.google.serviceAccountPrivateKey,
      scopes: ["https://www.googleapis.com/auth/spreadsheets"],
    });

    const getAccessToken = () =>
      Effect.tryPromise({
        try: async () => {
          const token = await client.getAccessToken();
          if (!token.token) {
            throw new Error("Failed to get access token");
          }
          return token.token;
        },
        catch: (error) =>
          new GoogleAuthError({
            message: error instanceof Error ? error.message : "Authentication failed",
            cause: error,
          }),
      });

    return { getAccessToken };
  }),
  dependencies: [],
}) {}

/**
 * A1 reference to a whole tab, or to a cell in it. Quotes in the title are doubled.
 */
export const tabRange = (title: string, cellRef?: string): string => {
  const quoted = `'${title.replace(/'/g, "''")}'`;
  return cellRef === undefined ? quoted : `${quoted}!${cellRef}`;
};

const spreadsheetUrl = (spreadsheetId: string) => `${SHEETS_API}/${encodeURIComponent(spreadsheetId)}`;

const valuesUrl = (spreadsheetId: string, range: string) =>
  `${spreadsheetUrl(spreadsheetId)}/values/${encodeURIComponent(range)}`;

export class GoogleSheetsService extends Effect.Service<GoogleSheetsService>()(
  "GoogleSheetsService",
  {
    effect: Effect.gen(function* () {
      const authService = yield* GoogleAuthService;
      const baseClient = yield* HttpClient.HttpClient;

      const call = <A, I>(
        operation: string,
        schema: Schema.Schema<A, I>,
        send: (
          client: HttpClient.HttpClient
        ) => Effect.Effect<HttpClientResponse.HttpClientResponse, HttpClientError.HttpClientError>
      ): Effect.Effect<A, SheetsApiError | GoogleAuthError> =>
        Effect.gen(function* () {
          const accessToken = yield* authService.getAccessToken();

          const httpClient = baseClient.pipe(
            HttpClient.filterStatusOk,
            HttpClient.mapRequest(
              HttpClientRequest.setHeaders({
                Authorization: `Bearer ${accessToken}`,
                Accept: "application/json",
              })
            )
          );

          return yield* send(httpClient).pipe(
            Effect.flatMap((res) => res.json),
            Effect.flatMap(Schema.decodeUnknown(schema)),
            Effect.mapError(
              (error) =>
                new SheetsApiError({
                  message: `${operation} failed: ${error.message}`,
                  operation,
                  cause: error,
                })
            )
          );
        });

      const listTabs = (spreadsheetId: string) =>
        call("listTabs", SpreadsheetResponse, (client) =>
          client.get(spreadsheetUrl(spreadsheetId), {
            urlParams: { fields: "sheets.properties(sheetId,title)" },
          })
        ).pipe(Effect.map((response) => (response.sheets ?? []).map((sheet) => sheet.properties)));

      const readTab = (spreadsheetId: string, title: string) =>
        call("readTab", ValuesResponse, (client) =>
          client.get(valuesUrl(spreadsheetId, tabRange(title)))
        ).pipe(Effect.map((response): ReadonlyArray<Row> => response.values ?? []));

      const findTab = (spreadsheetId: string, title: string) =>
        listTabs(spreadsheetId).pipe(
          Effect.map((tabs) =>
            Arr.findFirst(tabs, (tab) => tab.title === title).pipe(
              Option.map((tab) => new TabHandle({ spreadsheetId, sheetId: tab.sheetId, title }))
            )
          )
        );

      /**
       * Look the tab up, and create it only when it is missing.
       */
      const ensureTab = (spreadsheetId: string, title: string) =>
        Effect.gen(function* () {
          const existing = yield* findTab(spreadsheetId, title);
          if (Option.isSome(existing)) {
            yield* Effect.logDebug(`Tab '${title}' exists (sheetId ${existing.value.sheetId})`);
            return existing.value;
          }

          const response = yield* call("addSheet", BatchUpdateResponse, (client) =>
            client.post(`${spreadsheetUrl(spreadsheetId)}:batchUpdate`, {
              body: HttpBody.unsafeJson({ requests: [{ addSheet: { properties: { title } } }] }),
            })
          );

          const created = Arr.head(response.replies).pipe(
            Option.flatMapNullable((reply) => reply.addSheet)
          );
          if (Option.isNone(created)) {
            return yield* Effect.fail(
              new SheetsApiError({
                message: `addSheet returned no sheet for '${title}'`,
                operation: "addSheet",
              })
            );
          }

          yield* Effect.logInfo(
            `Created tab '${title}' (sheetId ${created.value.properties.sheetId})`
          );
          return new TabHandle({
            spreadsheetId,
            sheetId: created.value.properties.sheetId,
            title,
          });
        });

      const appendRows = (tab: TabHandle, rows: ReadonlyArray<Row>) =>
        call("appendRows", AppendResponse, (client) =>
          client.post(`${valuesUrl(tab.spreadsheetId, tabRange(tab.title))}:append`, {
            urlParams: { valueInputOption: "RAW", insertDataOption: "INSERT_ROWS" },
            body: HttpBody.unsafeJson({ values: rows }),
          })
        ).pipe(Effect.asVoid);

      const writeCell = (tab: TabHandle, cellRef: string, value: string) =>
        call("writeCell", UpdateResponse, (client) =>
          client.put(valuesUrl(tab.spreadsheetId, tabRange(tab.title, cellRef)), {
            urlParams: { valueInputOption: "RAW" },
            body: HttpBody.unsafeJson({ values: [[value]] }),
          })
        ).pipe(Effect.asVoid);

      return { listTabs, readTab, findTab, ensureTab, appendRows, writeCell };
    }),
    dependencies: [GoogleAuthService.Default, FetchHttpClient.layer],
  }
) {}
