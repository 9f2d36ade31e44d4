import { z } from "zod";

import { HttpRequestError, type RetryingHttpClient } from "../http/retryingHttpClient.js";

const TelegramMessageSchema = z.object({
  message_id: z.number(),
  date: z.number().optional(),
  chat: z.object({
    id: z.union([z.number(), z.string()]),
    type: z.string().optional(),
  }),
  from: z
    .object({
      id: z.number(),
      username: z.string().optional(),
    })
    .optional(),
  text: z.string().optional(),
});

const TelegramUpdateSchema = z.object({
  update_id: z.number(),
  message: TelegramMessageSchema.optional(),
});

const TelegramEnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;
export type ChatId = number | string;

export interface SendMessageOptions {
  readonly parseMode?: "Markdown" | "MarkdownV2" | "HTML";
  readonly disableWebPagePreview?: boolean;
}

/** The slice of the Bot API the signal bot and notifier use. */
export interface TelegramApi {
  getUpdates(offset: number | undefined, timeoutSeconds: number): Promise<TelegramUpdate[]>;
  sendMessage(chatId: ChatId, text: string, options?: SendMessageOptions): Promise<void>;
}

export class TelegramApiError extends Error {
  constructor(method: string, description: string | undefined) {
    super(`Telegram ${method} failed: ${description ?? "unknown error"}`);
    this.name = "TelegramApiError";
  }
}

export class TelegramClient implements TelegramApi {
  constructor(
    private readonly http: RetryingHttpClient,
    private readonly botToken: string,
  ) {}

  async getUpdates(offset: number | undefined, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    const body = await this.http.get(this.methodPath("getUpdates"), {
      searchParams: { offset, timeout: timeoutSeconds },
      timeoutMs: (timeoutSeconds + 10) * 1000,
    });
    const result = this.unwrap("getUpdates", body);
    return z.array(TelegramUpdateSchema).parse(result);
  }

  /**
   * Sends a message. Telegram rejects Markdown it cannot parse with a 400; the
   * message is then resent as plain text.
   */
  async sendMessage(chatId: ChatId, text: string, options: SendMessageOptions = {}): Promise<void> {
    try {
      await this.postMessage(chatId, text, options);
    } catch (error) {
      if (options.parseMode && error instanceof HttpRequestError && error.status === 400) {
        await this.postMessage(chatId, text, { disableWebPagePreview: options.disableWebPagePreview });
        return;
      }
      throw error;
    }
  }

  private async postMessage(chatId: ChatId, text: string, options: SendMessageOptions): Promise<void> {
    const body = await this.http.post(this.methodPath("sendMessage"), {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        chat_id: chatId,
        text,
        parse_mode: options.parseMode,
        disable_web_page_preview: options.disableWebPagePreview ?? true,
      }),
    });
    this.unwrap("sendMessage", body);
  }

  private methodPath(method: string): string {
    return `bot${this.botToken}/${method}`;
  }

  private unwrap(method: string, body: unknown): unknown {
    const envelope = TelegramEnvelopeSchema.parse(body);
    if (!envelope.ok) {
      throw new TelegramApiError(method, envelope.description);
    }
    return envelope.result;
  }
}
