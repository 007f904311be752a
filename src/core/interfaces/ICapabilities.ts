/**
 * External capabilities the model can reach through tool calls
 */
export interface IWeatherClient {
  getCurrentWeather(location: string, signal?: AbortSignal): Promise<string>;

  getForecast(location: string, days: number, signal?: AbortSignal): Promise<string>;
}

export interface HolidayEvent {
  /** All-day date at UTC midnight */
  date: Date;
  name: string;
}

export interface IHolidayCalendar {
  loadEvents(feedUrl: string, signal?: AbortSignal): Promise<HolidayEvent[]>;
}

export interface IClock {
  now(): Date;
}

export const systemClock: IClock = {
  now: () => new Date(),
};
