import { HttpClient, HttpClientError, HttpClientResponse } from "@effect/platform";
import { Effect, Layer, Option } from "effect";
import { NotifyService } from "../error/notify";
import { GoogleAuthService, GoogleSheetsService, SheetsApiError } from "../google/client";
import { type Row, TabHandle, TabInfo } from "../core/schema";
import { type TestConfig, createTestConfigProvider } from "./config";

/**
 * Mock response configuration for HttpClient tests.
 */
export interface MockHttpResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Request capture info for testing HTTP calls. `url` includes the query string.
 */
export interface CapturedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: unknown;
}

/**
 * Creates a request capture utility for testing HTTP calls.
 * Returns a tuple of [capturedRequests array, handler function].
 *
 * @example
 * const [requests, handler] = createRequestCapture({ status: 200, body: {} });
 * const layer = createNotifyTestLayer(config, handler);
 * // After test runs:
 * expect(requests).toHaveLength(1);
 * expect(requests[0].url).toContain('/api/webhooks');
 */
export const createRequestCapture = (
  response: MockHttpResponse = { status: 200, body: {} }
): [CapturedRequest[], (req: CapturedRequest) => MockHttpResponse] => {
  const capturedRequests: CapturedRequest[] = [];
  const handler = (req: CapturedRequest): MockHttpResponse => {
    capturedRequests.push(req);
    return response;
  };
  return [capturedRequests, handler];
};

const decoder = new TextDecoder();

/**
 * Creates a mock HttpClient that returns configured responses.
 * The handler function receives the request, with any JSON body decoded, and returns the mock response.
 */
export const createMockHttpClient = (handler: (req: CapturedRequest) => MockHttpResponse) =>
  HttpClient.make((req, url) =>
    Effect.sync(() => {
      const body: unknown =
        req.body._tag === "Uint8Array" ? JSON.parse(decoder.decode(req.body.body)) : undefined;

      const mockResponse = handler({
        url: url.toString(),
        method: req.method,
        headers: { ...req.headers },
        ...(body !== undefined ? { body } : {}),
      });

      const status = mockResponse.status ?? 200;
      const headers = mockResponse.headers ?? { "Content-Type": "application/json" };
      const responseBody = mockResponse.body !== undefined ? JSON.stringify(mockResponse.body) : null;

      return HttpClientResponse.fromWeb(req, new Response(responseBody, { status, headers }));
    })
  );

/**
 * Creates a mock HttpClient that fails with a network-level error.
 * Useful for testing error handling when the HTTP request itself fails.
 */
export const createNetworkErrorHttpClient = (errorMessage: string) =>
  HttpClient.make((req) =>
    Effect.fail(
      new HttpClientError.RequestError({
        request: req,
        reason: "Transport",
        cause: new Error(errorMessage),
      })
    )
  );

/**
 * Creates a mock HttpClient layer from a handler function.
 */
export const createMockHttpClientLayer = (handler: (req: CapturedRequest) => MockHttpResponse) =>
  Layer.succeed(HttpClient.HttpClient, createMockHttpClient(handler));

/**
 * Creates a simple mock HttpClient layer that returns a fixed response.
 */
export const createSimpleMockHttpClientLayer = (response: MockHttpResponse) =>
  createMockHttpClientLayer(() => response);

/**
 * Creates a mock HttpClient layer that fails with a network error.
 */
export const createNetworkErrorHttpClientLayer = (errorMessage: string) =>
  Layer.succeed(HttpClient.HttpClient, createNetworkErrorHttpClient(errorMessage));

/**
 * Creates a test layer for GoogleSheetsService with mock HttpClient.
 * google-auth-library must be mocked by the calling test file.
 */
export const createGoogleTestLayer = (
  config: TestConfig,
  mockHandler?: (req: CapturedRequest) => MockHttpResponse
) => {
  const configLayer = Layer.setConfigProvider(createTestConfigProvider(config));
  const httpLayer = mockHandler
    ? createMockHttpClientLayer(mockHandler)
    : createSimpleMockHttpClientLayer({ status: 200, body: { values: [] } });

  return GoogleSheetsService.DefaultWithoutDependencies.pipe(
    Layer.provide(GoogleAuthService.Default),
    Layer.provide(httpLayer),
    Layer.provide(configLayer)
  );
};

/**
 * Creates a test layer for NotifyService with mock HttpClient.
 */
export const createNotifyTestLayer = (
  config: TestConfig,
  mockHandler?: (req: CapturedRequest) => MockHttpResponse
) => {
  const configLayer = Layer.setConfigProvider(createTestConfigProvider(config));
  const httpLayer = mockHandler
    ? createMockHttpClientLayer(mockHandler)
    : createSimpleMockHttpClientLayer({ status: 200, body: {} });

  return NotifyService.DefaultWithoutDependencies.pipe(
    Layer.provide(httpLayer),
    Layer.provide(configLayer)
  );
};

/**
 * Creates a test layer for NotifyService that simulates network failures.
 */
export const createNotifyNetworkErrorLayer = (config: TestConfig, errorMessage: string) => {
  const configLayer = Layer.setConfigProvider(createTestConfigProvider(config));

  return NotifyService.DefaultWithoutDependencies.pipe(
    Layer.provide(createNetworkErrorHttpClientLayer(errorMessage)),
    Layer.provide(configLayer)
  );
};

/**
 * Tabs of one spreadsheet, by title. Rows are stored as they would be read back.
 */
export type SpreadsheetContents = Record<string, Row[]>;

export interface InMemorySheetsOptions {
  /** Operation that fails with a SheetsApiError instead of running */
  readonly failOn?: "listTabs" | "readTab" | "ensureTab" | "appendRows" | "writeCell";
}

export interface InMemorySheets {
  readonly service: GoogleSheetsService;
  readonly layer: Layer.Layer<GoogleSheetsService>;
  /** Current rows of a tab, or undefined when the tab does not exist */
  readonly rows: (spreadsheetId: string, title: string) => ReadonlyArray<Row> | undefined;
  readonly created: string[];
  readonly appended: Array<{ tab: string; rows: ReadonlyArray<Row> }>;
  readonly cellWrites: Array<{ tab: string; cell: string; value: string }>;
}

const columnIndex = (letters: string): number =>
  [...letters].reduce((index, letter) => index * 26 + (letter.charCodeAt(0) - 64), 0) - 1;

/**
 * GoogleSheetsService backed by plain arrays.
 * Appends go after the last stored row, the way the values API appends to a table.
 */
export const createInMemorySheets = (
  spreadsheets: Record<string, SpreadsheetContents>,
  options: InMemorySheetsOptions = {}
): InMemorySheets => {
  const sheetIds = new Map<string, number>();
  let nextSheetId = 100;
  const created: string[] = [];
  const appended: Array<{ tab: string; rows: ReadonlyArray<Row> }> = [];
  const cellWrites: Array<{ tab: string; cell: string; value: string }> = [];

  const contents = (spreadsheetId: string): SpreadsheetContents => {
    const existing = spreadsheets[spreadsheetId];
    if (existing !== undefined) {
      return existing;
    }
    const fresh: SpreadsheetContents = {};
    spreadsheets[spreadsheetId] = fresh;
    return fresh;
  };

  const sheetIdOf = (spreadsheetId: string, title: string): number => {
    const key = `${spreadsheetId}/${title}`;
    const existing = sheetIds.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const id = nextSheetId++;
    sheetIds.set(key, id);
    return id;
  };

  const guard = (
    operation: NonNullable<InMemorySheetsOptions["failOn"]>
  ): Effect.Effect<void, SheetsApiError> =>
    options.failOn === operation
      ? Effect.fail(
          new SheetsApiError({
            message: `${operation} failed: Service unavailable`,
            operation,
          })
        )
      : Effect.void;

  const handleFor = (spreadsheetId: string, title: string) =>
    new TabHandle({ spreadsheetId, sheetId: sheetIdOf(spreadsheetId, title), title });

  const listTabs = (spreadsheetId: string) =>
    guard("listTabs").pipe(
      Effect.map(() =>
        Object.keys(contents(spreadsheetId)).map(
          (title) => new TabInfo({ sheetId: sheetIdOf(spreadsheetId, title), title })
        )
      )
    );

  const readTab = (spreadsheetId: string, title: string) =>
    guard("readTab").pipe(
      Effect.map((): ReadonlyArray<Row> => [...(contents(spreadsheetId)[title] ?? [])])
    );

  const findTab = (spreadsheetId: string, title: string) =>
    Effect.sync(() =>
      title in contents(spreadsheetId)
        ? Option.some(handleFor(spreadsheetId, title))
        : Option.none()
    );

  const ensureTab = (spreadsheetId: string, title: string) =>
    guard("ensureTab").pipe(
      Effect.map(() => {
        const tabs = contents(spreadsheetId);
        if (!(title in tabs)) {
          tabs[title] = [];
          created.push(title);
        }
        return handleFor(spreadsheetId, title);
      })
    );

  const appendRows = (tab: TabHandle, rows: ReadonlyArray<Row>) =>
    guard("appendRows").pipe(
      Effect.map(() => {
        const stored = contents(tab.spreadsheetId)[tab.title] ?? [];
        stored.push(...rows);
        contents(tab.spreadsheetId)[tab.title] = stored;
        appended.push({ tab: tab.title, rows });
      })
    );

  const writeCell = (tab: TabHandle, cellRef: string, value: string) =>
    guard("writeCell").pipe(
      Effect.map(() => {
        const match = /^([A-Z]+)(\d+)$/.exec(cellRef);
        const stored = contents(tab.spreadsheetId)[tab.title] ?? [];
        if (match !== null) {
          const rowIndex = Number(match[2]) - 1;
          const colIndex = columnIndex(match[1]);
          while (stored.length <= rowIndex) {
            stored.push([]);
          }
          const row = [...(stored[rowIndex] ?? [])];
          while (row.length < colIndex) {
            row.push("");
          }
          row[colIndex] = value;
          stored[rowIndex] = row;
        }
        contents(tab.spreadsheetId)[tab.title] = stored;
        cellWrites.push({ tab: tab.title, cell: cellRef, value });
      })
    );

  const service = new GoogleSheetsService({
    listTabs,
    readTab,
    findTab,
    ensureTab,
    appendRows,
    writeCell,
  });

  return {
    service,
    layer: Layer.succeed(GoogleSheetsService, service),
    rows: (spreadsheetId, title) => spreadsheets[spreadsheetId]?.[title],
    created,
    appended,
    cellWrites,
  };
};
