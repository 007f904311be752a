import { Message } from '../entities/Conversation.js';
import { ChatMessage } from '../entities/Model.js';
import { PromptTemplate } from './types.js';

const REPLY_SYSTEM_PROMPT = `You are a helpful assistant with access to tools.

WEATHER
1) Call get_weather for every question about weather, temperature, forecasts or climate. Never make weather up.
2) get_weather arguments:
   - location: taken from the user's message (a city, "City,Country" or "lat,lon").
   - forecast_days: when the user names a weekday or a date, call get_today_date first, work out how many days
     away it is and pass that difference plus one (between 1 and 10). Then answer for that day only.
     Otherwise ask for a short forecast of 1 to 3 days; only go to 7 days or more when asked to.
   - When the location is missing or ambiguous, ask one short clarifying question instead.

ANSWER STYLE
3) Summarize the tool output for the user's question instead of repeating it.
   - Open with one header line: **<City, Country> - <Day>**.
   - Follow with 3 to 5 short bullets: conditions, high and low in °C (°F only when the user used °F),
     chance of rain when known, wind speed and direction.
   - Round numbers sensibly and keep it brief.

OTHER TOOLS
4) Use get_today_date for questions about the current date or time.
5) Use get_holidays for questions about holidays or the calendar.
6) Answer anything else directly.`;

const WEATHER_KEYWORDS = [
  'weather',
  'temperature',
  'forecast',
  'climate',
  'hot',
  'cold',
  'rain',
  'snow',
  'sunny',
  'cloudy',
  'wind',
  'humidity',
  '°c',
  '°f',
  'celsius',
  'fahrenheit',
];

export function isWeatherQuery(content: string): boolean {
  const lowered = content.toLowerCase();
  return WEATHER_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

export function withWeatherToolHint(content: string): string {
  return (
    'IMPORTANT: answer this with the get_weather function, not from memory. ' +
    'Take the location and forecast_days (if any) from the question. Question: ' +
    content
  );
}

/**
 * Reply template: tool-use instruction followed by the stored turns.
 * User messages that look like weather questions carry a hint to call get_weather.
 */
export class ReplyTemplate implements PromptTemplate {
  formatMessages(messages: Message[]): ChatMessage[] {
    const chatMessages: ChatMessage[] = [{ role: 'system', content: REPLY_SYSTEM_PROMPT }];

    for (const msg of messages) {
      if (msg.role === 'user') {
        const content = isWeatherQuery(msg.content) ? withWeatherToolHint(msg.content) : msg.content;
        chatMessages.push({ role: 'user', content });
      } else {
        chatMessages.push({ role: 'assistant', content: msg.content });
      }
    }

    return chatMessages;
  }
}
