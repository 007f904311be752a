import { z } from 'zod';
import { ToolCall, ToolDeclaration } from '../../core/entities/Model.js';
import { UnknownToolError, errorMessage } from '../../core/errors.js';
import {
  HolidayEvent,
  IClock,
  IHolidayCalendar,
  IWeatherClient,
  systemClock,
} from '../../core/interfaces/ICapabilities.js';
import {
  DATE_TOOL,
  HOLIDAYS_TOOL,
  HolidaysArgs,
  TOOL_DECLARATIONS,
  WEATHER_TOOL,
  holidaysArgsSchema,
  weatherArgsSchema,
} from '../../core/tools/declarations.js';
import { Logger, createLogger } from '../../utils/logger.js';

export interface CapabilityRegistryOptions {
  /** Absent when WEATHER_API_KEY is not set */
  weather?: IWeatherClient;
  holidays: IHolidayCalendar;
  holidayFeedUrl: string;
  clock?: IClock;
  logger?: Logger;
}

export interface ToolResult {
  toolName: string;
  callId: string;
  content: string;
  ok: boolean;
}

export const WEATHER_NOT_CONFIGURED =
  'Weather service is not configured. Please set WEATHER_API_KEY environment variable.';

/**
 * Dispatches model tool calls to the weather, date and holiday capabilities.
 * Every recoverable failure becomes the text of the tool result; only an
 * unknown tool name throws.
 */
export class CapabilityRegistry {
  private readonly clock: IClock;
  private readonly log: Logger;

  constructor(private readonly options: CapabilityRegistryOptions) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('capabilities');
  }

  declarations(): ToolDeclaration[] {
    return TOOL_DECLARATIONS;
  }

  async invoke(call: ToolCall, signal?: AbortSignal): Promise<ToolResult> {
    const name = call.function.name;
    this.log.info('tool_call_received', { tool: name, call_id: call.id });

    const result = (content: string, ok: boolean): ToolResult => ({
      toolName: name,
      callId: call.id,
      content,
      ok,
    });

    switch (name) {
      case WEATHER_TOOL: {
        const args = parseArguments(weatherArgsSchema, call.function.arguments);
        if (!args.success) {
          return result(`failed to parse ${name} arguments: ${args.error}`, false);
        }
        const weather = this.options.weather;
        if (!weather) {
          return result(WEATHER_NOT_CONFIGURED, false);
        }
        try {
          const days = args.data.forecast_days;
          const text =
            days !== null && days !== undefined && days > 0
              ? await weather.getForecast(args.data.location, days, signal)
              : await weather.getCurrentWeather(args.data.location, signal);
          return result(text, true);
        } catch (error) {
          signal?.throwIfAborted();
          this.log.warn('weather_lookup_failed', { location: args.data.location, error });
          return result(`Failed to get weather information: ${errorMessage(error)}`, false);
        }
      }

      case DATE_TOOL:
        return result(this.clock.now().toISOString(), true);

      case HOLIDAYS_TOOL: {
        const args = parseArguments(holidaysArgsSchema, call.function.arguments);
        if (!args.success) {
          return result(`failed to parse ${name} arguments: ${args.error}`, false);
        }
        let events: HolidayEvent[];
        try {
          events = await this.options.holidays.loadEvents(this.options.holidayFeedUrl, signal);
        } catch (error) {
          signal?.throwIfAborted();
          this.log.warn('holiday_feed_failed', { feed: this.options.holidayFeedUrl, error });
          return result('failed to load holiday events', false);
        }
        return result(filterHolidays(events, args.data).join('\n'), true);
      }

      default:
        throw new UnknownToolError(name);
    }
  }
}

type ParsedArguments<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Tool arguments arrive decoded from Ollama and as JSON text from
 * OpenAI-compatible servers; an empty payload means no arguments.
 */
export function parseArguments<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): ParsedArguments<T> {
  let payload: unknown = raw ?? {};

  if (typeof raw === 'string') {
    if (raw.trim() === '') {
      payload = {};
    } else {
      try {
        payload = JSON.parse(raw);
      } catch (error) {
        return { success: false, error: errorMessage(error) };
      }
    }
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { success: false, error: issues };
  }
  return { success: true, data: parsed.data };
}

/**
 * One "YYYY-MM-DD: name" line per event, in feed order: events after
 * `before_date` or before `after_date` are skipped, and the list stops at
 * `max_count` when it is positive.
 */
export function filterHolidays(events: HolidayEvent[], query: HolidaysArgs): string[] {
  const lines: string[] = [];
  const maxCount = query.max_count ?? 0;

  for (const event of events) {
    if (maxCount > 0 && lines.length >= maxCount) {
      break;
    }
    if (query.before_date && event.date.getTime() > query.before_date.getTime()) {
      continue;
    }
    if (query.after_date && event.date.getTime() < query.after_date.getTime()) {
      continue;
    }
    lines.push(`${event.date.toISOString().slice(0, 10)}: ${event.name}`);
  }

  return lines;
}
