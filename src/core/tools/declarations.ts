import { z } from 'zod';
import { ToolDeclaration } from '../entities/Model.js';

export const WEATHER_TOOL = 'get_weather';
export const DATE_TOOL = 'get_today_date';
export const HOLIDAYS_TOOL = 'get_holidays';

const rfc3339 = z
  .string()
  .datetime({ offset: true, message: 'expected an RFC 3339 timestamp' })
  .transform((value) => new Date(value));

export const weatherArgsSchema = z.object({
  location: z.string().trim().min(1, 'location must not be empty'),
  forecast_days: z.number().int().nullish(),
});

export const holidaysArgsSchema = z.object({
  before_date: rfc3339.nullish(),
  after_date: rfc3339.nullish(),
  max_count: z.number().int().nullish(),
});

export type WeatherArgs = z.infer<typeof weatherArgsSchema>;
export type HolidaysArgs = z.infer<typeof holidaysArgsSchema>;

/**
 * Tool declarations sent to the model on every reply round
 */
export const TOOL_DECLARATIONS: ToolDeclaration[] = [
  {
    type: 'function',
    function: {
      name: WEATHER_TOOL,
      description:
        'Real-time weather from WeatherAPI. Always use this for questions about weather, temperature, ' +
        'forecasts or climate instead of answering from training data.',
      parameters: {
        type: 'object',
        properties: {
          location: {
            type: 'string',
            description: "City name, 'City,Country' or 'lat,lon' (e.g. 'Barcelona', 'London,UK', '40.7128,-74.0060')",
          },
          forecast_days: {
            type: 'integer',
            description: 'Number of forecast days (1-14). Omit for current conditions only.',
          },
        },
        required: ['location'],
      },
    },
  },
  {
    type: 'function',
    function: {
      name: DATE_TOOL,
      description: "Today's date and time in RFC 3339 format",
      parameters: { type: 'object', properties: {} },
    },
  },
  {
    type: 'function',
    function: {
      name: HOLIDAYS_TOOL,
      description:
        "Local bank and public holidays, one per line as 'YYYY-MM-DD: Holiday Name'.",
      parameters: {
        type: 'object',
        properties: {
          before_date: {
            type: 'string',
            description: 'Optional RFC 3339 date; only holidays on or before it are returned.',
          },
          after_date: {
            type: 'string',
            description: 'Optional RFC 3339 date; only holidays on or after it are returned.',
          },
          max_count: {
            type: 'integer',
            description: 'Optional maximum number of holidays to return.',
          },
        },
      },
    },
  },
];
