import { z } from 'zod';
import { FetchWithTimeout } from './http-client';
import { InlineKeyboardMarkup, PARSE_MODE } from './reports';

const TELEGRAM_API_BASE = 'https://api.telegram.org';

const ChatMessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({ id: z.number().int() }),
  text: z.string().optional(),
});

const CallbackQuerySchema = z.object({
  id: z.string(),
  data: z.string().optional(),
  message: ChatMessageSchema.optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: ChatMessageSchema.optional(),
  callback_query: CallbackQuerySchema.optional(),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;
export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type CallbackQuery = z.infer<typeof CallbackQuerySchema>;

const ApiEnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export interface BotCommandDescription {
  command: string;
  description: string;
}

export interface GetUpdatesParams {
  offset?: number;
  timeoutSeconds: number;
  signal?: AbortSignal;
}

export interface TelegramClient {
  sendMessage: (chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup) => Promise<void>;
  editMessageText: (chatId: number, messageId: number, text: string) => Promise<void>;
  answerCallbackQuery: (callbackQueryId: string) => Promise<void>;
  getUpdates: (params: GetUpdatesParams) => Promise<TelegramUpdate[]>;
  setMyCommands: (commands: BotCommandDescription[]) => Promise<void>;
  setWebhook: (url: string, secretToken?: string) => Promise<void>;
  deleteWebhook: () => Promise<void>;
}

interface CreateTelegramClientOptions {
  token: string;
  fetchWithTimeout: FetchWithTimeout;
  apiBase?: string;
}

export const ALLOWED_UPDATES = ['message', 'callback_query'];

// Long polls must outlive Telegram's own hold time.
const POLL_TIMEOUT_SLACK_MS = 10 * 1000;

export const createTelegramClient = ({
  token,
  fetchWithTimeout,
  apiBase = TELEGRAM_API_BASE,
}: CreateTelegramClientOptions): TelegramClient => {
  const callApi = async (
    method: string,
    body: Record<string, unknown>,
    { signal, timeoutMs }: { signal?: AbortSignal; timeoutMs?: number } = {},
  ): Promise<unknown> => {
    const response = await fetchWithTimeout(
      `${apiBase}/bot${token}/${method}`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      },
      timeoutMs,
    );
    const parsed = ApiEnvelopeSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Telegram ${method} failed with status ${response.status}: unexpected response body`);
    }
    if (!parsed.data.ok) {
      throw new Error(`Telegram ${method} failed: ${parsed.data.description || `error ${parsed.data.error_code ?? response.status}`}`);
    }
    return parsed.data.result;
  };

  return {
    sendMessage: async (chatId, text, replyMarkup) => {
      await callApi('sendMessage', {
        chat_id: chatId,
        text,
        parse_mode: PARSE_MODE,
        disable_web_page_preview: true,
        ...(replyMarkup ? { reply_markup: replyMarkup } : {}),
      });
    },
    editMessageText: async (chatId, messageId, text) => {
      await callApi('editMessageText', { chat_id: chatId, message_id: messageId, text, parse_mode: PARSE_MODE });
    },
    answerCallbackQuery: async (callbackQueryId) => {
      await callApi('answerCallbackQuery', { callback_query_id: callbackQueryId });
    },
    getUpdates: async ({ offset, timeoutSeconds, signal }) => {
      const result = await callApi(
        'getUpdates',
        { offset, timeout: timeoutSeconds, allowed_updates: ALLOWED_UPDATES },
        { signal, timeoutMs: timeoutSeconds * 1000 + POLL_TIMEOUT_SLACK_MS },
      );
      const updates = z.array(TelegramUpdateSchema).safeParse(result);
      if (!updates.success) {
        throw new Error('Telegram getUpdates returned an unexpected update list');
      }
      return updates.data;
    },
    setMyCommands: async (commands) => {
      await callApi('setMyCommands', { commands });
    },
    setWebhook: async (url, secretToken) => {
      await callApi('setWebhook', {
        url,
        allowed_updates: ALLOWED_UPDATES,
        ...(secretToken ? { secret_token: secretToken } : {}),
      });
    },
    deleteWebhook: async () => {
      await callApi('deleteWebhook', {});
    },
  };
};
