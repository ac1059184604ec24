import { FetchHttpClient, HttpBody, HttpClient } from "@effect/platform";
import { Clock, Data, Effect, Schema } from "effect";
import { AppConfig } from "../config";
import type { SyncResult } from "../core/schema";

// Schema definitions for Discord webhook payload
export class DiscordEmbedField extends Schema.Class<DiscordEmbedField>("DiscordEmbedField")({
  name: Schema.String,
  value: Schema.String,
  inline: Schema.optional(Schema.Boolean),
}) {}

export class DiscordEmbed extends Schema.Class<DiscordEmbed>("DiscordEmbed")({
  title: Schema.optional(Schema.String),
  description: Schema.optional(Schema.String),
  color: Schema.optional(Schema.Number),
  fields: Schema.optional(Schema.Array(DiscordEmbedField)),
  timestamp: Schema.optional(Schema.String),
}) {}

export class DiscordWebhookPayload extends Schema.Class<DiscordWebhookPayload>(
  "DiscordWebhookPayload"
)({
  content: Schema.optional(Schema.String),
  username: Schema.optional(Schema.String),
  embeds: Schema.optional(Schema.Array(DiscordEmbed)),
}) {}

export class NotificationError extends Data.TaggedError("NotificationError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

const USERNAME = "Sheet Domain Transfer";

export const describeFailure = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return String(error.message);
  }
  return String(error);
};

export const successPayload = (result: SyncResult, timestamp: string): DiscordWebhookPayload =>
  new DiscordWebhookPayload({
    username: USERNAME,
    embeds: [
      new DiscordEmbed({
        title: "Transfer Complete",
        description: `Appended ${result.rowsAppended} rows to '${result.destinationTab}'`,
        color: 0x44ff44,
        fields: [
          new DiscordEmbedField({ name: "Read", value: String(result.rowsRead), inline: true }),
          new DiscordEmbedField({ name: "Matched", value: String(result.rowsMatched), inline: true }),
          new DiscordEmbedField({ name: "Appended", value: String(result.rowsAppended), inline: true }),
        ],
        timestamp,
      }),
    ],
  });

export const failurePayload = (error: unknown, timestamp: string): DiscordWebhookPayload =>
  new DiscordWebhookPayload({
    username: USERNAME,
    embeds: [
      new DiscordEmbed({
        title: "Transfer Failed",
        description: describeFailure(error),
        color: 0xff4444,
        fields: [new DiscordEmbedField({ name: "Time", value: timestamp, inline: true })],
        timestamp,
      }),
    ],
  });

export class NotifyService extends Effect.Service<NotifyService>()("NotifyService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const httpClient = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
    const webhookUrl = config.notify.discordWebhookUrl;

    const sendWebhook = (
      kind: string,
      payload: DiscordWebhookPayload
    ): Effect.Effect<void, NotificationError> => {
      if (webhookUrl === undefined) {
        return Effect.logDebug(`No DISCORD_WEBHOOK_URL configured, skipping ${kind} notification`);
      }
      return httpClient
        .post(webhookUrl, {
          body: HttpBody.unsafeJson(payload),
        })
        .pipe(
          Effect.zipRight(Effect.logInfo(`${kind} notification sent to Discord`)),
          Effect.mapError(
            (e) =>
              new NotificationError({
                message: e.message,
                cause: e,
              })
          )
        );
    };

    const now = Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis).toISOString());

    return {
      notifyError: (error: unknown): Effect.Effect<void, NotificationError> =>
        Effect.gen(function* () {
          yield* sendWebhook("Failure", failurePayload(error, yield* now));
        }),

      notifySuccess: (result: SyncResult): Effect.Effect<void, NotificationError> =>
        Effect.gen(function* () {
          yield* sendWebhook("Success", successPayload(result, yield* now));
        }),
    };
  }),
  dependencies: [FetchHttpClient.layer],
}) {}
