import { splitMessage } from './message-split';
import { MetricKey, SourcePayload } from './payload';
import {
  escapeHtml,
  failureMessage,
  GENERIC_ERROR_MESSAGE,
  HELP_MESSAGE,
  InlineKeyboardMarkup,
  MENU_KEYBOARD,
  MENU_MESSAGE,
  renderRainfallReport,
  renderStationDirectory,
  renderWeatherOverview,
  renderWindDirectionReport,
  renderWindReport,
  renderWindSpeedReport,
  START_MESSAGE,
  unavailableMessage,
  UNKNOWN_OPTION_MESSAGE,
} from './reports';
import { BotCommandDescription, TelegramClient, TelegramUpdate } from './telegram-client';
import { WeatherService } from './weather-service';

export interface BotReply {
  text: string;
  replyMarkup?: InlineKeyboardMarkup;
}

interface CommandDefinition {
  description: string;
  subject?: string;
  progress?: (query: string | null) => string;
  run: (query: string | null, weatherService: WeatherService) => Promise<string | BotReply>;
}

const metricReport =
  (metric: MetricKey, subject: string, render: (payload: SourcePayload, query: string | null) => string) =>
  async (query: string | null, weatherService: WeatherService): Promise<string> => {
    const payload = await weatherService.fetchSource(metric);
    return payload ? render(payload, query) : unavailableMessage(subject);
  };

const COMMANDS: Record<string, CommandDefinition> = {
  start: {
    description: 'Welcome message and quick start',
    run: async () => START_MESSAGE,
  },
  help: {
    description: 'Show detailed help',
    run: async () => HELP_MESSAGE,
  },
  menu: {
    description: 'Interactive menu',
    run: async () => ({ text: MENU_MESSAGE, replyMarkup: MENU_KEYBOARD }),
  },
  weather: {
    description: 'Complete weather overview',
    subject: 'weather data',
    progress: () => '🔄 Fetching complete weather data...',
    run: async (_query, weatherService) => renderWeatherOverview(await weatherService.fetchAll()),
  },
  rainfall: {
    description: 'Rainfall data [station|all]',
    subject: 'rainfall data',
    progress: () => '🔄 Fetching rainfall data...',
    run: metricReport('rainfall', 'rainfall data', renderRainfallReport),
  },
  windspeed: {
    description: 'Wind speed data [station|all]',
    subject: 'wind speed data',
    progress: () => '🔄 Fetching wind speed data...',
    run: metricReport('windSpeed', 'wind speed data', renderWindSpeedReport),
  },
  winddirection: {
    description: 'Wind direction data [station|all]',
    subject: 'wind direction data',
    progress: () => '🔄 Fetching wind direction data...',
    run: metricReport('windDirection', 'wind direction data', renderWindDirectionReport),
  },
  wind: {
    description: 'Wind speed and direction [station|all]',
    subject: 'wind data',
    progress: (query) =>
      query ? `🔄 Fetching wind data for '${escapeHtml(query)}'...` : '🔄 Fetching wind data from all stations...',
    run: async (query, weatherService) => {
      const wind = await weatherService.fetchWind();
      if (!wind.windSpeed && !wind.windDirection) {
        return unavailableMessage('wind data');
      }
      return renderWindReport(wind, query);
    },
  },
  stations: {
    description: 'List all available stations',
    subject: 'station information',
    progress: () => '🔄 Fetching station information...',
    run: async (_query, weatherService) => renderStationDirectory(await weatherService.fetchAll()),
  },
};

export const BOT_COMMANDS: BotCommandDescription[] = Object.entries(COMMANDS).map(([command, definition]) => ({
  command,
  description: definition.description,
}));

export interface ParsedCommand {
  command: string;
  query: string | null;
}

/** `/rainfall@SomeBot marina bay` → `{ command: 'rainfall', query: 'marina bay' }`. */
export const parseCommand = (text: string): ParsedCommand | null => {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }
  const [head, ...rest] = trimmed.split(/\s+/);
  const command = head.slice(1).split('@')[0].toLowerCase();
  const query = rest.join(' ').trim();
  return { command, query: query || null };
};

export const parseCallbackData = (data: string): ParsedCommand | null => {
  const allSuffix = '_all';
  const isAll = data.endsWith(allSuffix);
  const command = isAll ? data.slice(0, -allSuffix.length) : data;
  if (!Object.prototype.hasOwnProperty.call(COMMANDS, command)) {
    return null;
  }
  return { command, query: isAll ? 'all' : null };
};

const toReplies = (result: string | BotReply): BotReply[] => {
  if (typeof result !== 'string') {
    return [result];
  }
  return splitMessage(result).map((text) => ({ text }));
};

/**
 * Builds the replies for one command. Unknown commands get the help text;
 * any failure while fetching or rendering becomes a "try again later" reply.
 */
export const runCommand = async ({ command, query }: ParsedCommand, weatherService: WeatherService): Promise<BotReply[]> => {
  const definition = Object.prototype.hasOwnProperty.call(COMMANDS, command) ? COMMANDS[command] : COMMANDS.help;
  try {
    return toReplies(await definition.run(query, weatherService));
  } catch (error) {
    console.error(`[Bot] /${command} failed:`, error);
    return [{ text: failureMessage(definition.subject || 'data') }];
  }
};

export const progressMessageFor = ({ command, query }: ParsedCommand): string | null => {
  const definition = Object.prototype.hasOwnProperty.call(COMMANDS, command) ? COMMANDS[command] : null;
  return definition?.progress ? definition.progress(query) : null;
};

interface CreateUpdateHandlerOptions {
  telegram: TelegramClient;
  weatherService: WeatherService;
}

export type UpdateHandler = (update: TelegramUpdate) => Promise<void>;

export const createUpdateHandler = ({ telegram, weatherService }: CreateUpdateHandlerOptions): UpdateHandler => {
  const respond = async (chatId: number, parsed: ParsedCommand) => {
    const progress = progressMessageFor(parsed);
    if (progress) {
      await telegram.sendMessage(chatId, progress);
    }
    for (const reply of await runCommand(parsed, weatherService)) {
      await telegram.sendMessage(chatId, reply.text, reply.replyMarkup);
    }
  };

  const handle = async (update: TelegramUpdate) => {
    const { message, callback_query: callbackQuery } = update;

    if (callbackQuery) {
      await telegram.answerCallbackQuery(callbackQuery.id);
      const chatMessage = callbackQuery.message;
      if (!chatMessage) {
        return;
      }
      const parsed = parseCallbackData(callbackQuery.data || '');
      if (!parsed) {
        await telegram.editMessageText(chatMessage.chat.id, chatMessage.message_id, UNKNOWN_OPTION_MESSAGE);
        return;
      }
      await respond(chatMessage.chat.id, parsed);
      return;
    }

    if (message?.text) {
      const parsed = parseCommand(message.text);
      if (parsed) {
        await respond(message.chat.id, parsed);
      }
    }
  };

  return async (update) => {
    try {
      await handle(update);
    } catch (error) {
      console.error(`[Bot] update ${update.update_id} caused error:`, error);
      const chatId = update.message?.chat.id ?? update.callback_query?.message?.chat.id;
      if (chatId === undefined) {
        return;
      }
      try {
        await telegram.sendMessage(chatId, GENERIC_ERROR_MESSAGE);
      } catch (replyError) {
        console.error(`[Bot] could not deliver error reply for update ${update.update_id}:`, replyError);
      }
    }
  };
};
