/**
 * Tests for tool dispatch and holiday filtering
 */

import {
  CapabilityRegistry,
  WEATHER_NOT_CONFIGURED,
  filterHolidays,
  parseArguments,
} from '../src/application/services/CapabilityRegistry.js';
import { HolidayEvent, IWeatherClient } from '../src/core/interfaces/ICapabilities.js';
import { UnknownToolError } from '../src/core/errors.js';
import { holidaysArgsSchema, weatherArgsSchema } from '../src/core/tools/declarations.js';
import { captureLogs, fixedClock, staticHolidays, toolCall } from './helpers.js';

const FEED: HolidayEvent[] = [
  { date: new Date('2024-01-01T00:00:00Z'), name: "New Year's Day" },
  { date: new Date('2024-06-15T00:00:00Z'), name: 'Midsummer Fair' },
  { date: new Date('2024-12-25T00:00:00Z'), name: 'Christmas Day' },
];

function fakeWeather(): jest.Mocked<IWeatherClient> {
  return {
    getCurrentWeather: jest.fn().mockResolvedValue('current conditions'),
    getForecast: jest.fn().mockResolvedValue('forecast'),
  };
}

describe('filterHolidays', () => {
  it('should apply after_date and max_count', () => {
    const lines = filterHolidays(FEED, { after_date: new Date('2024-02-01T00:00:00Z'), max_count: 1 });
    expect(lines).toEqual(['2024-06-15: Midsummer Fair']);
  });

  it('should skip events after before_date', () => {
    const lines = filterHolidays(FEED, { before_date: new Date('2024-07-01T00:00:00Z') });
    expect(lines).toEqual(["2024-01-01: New Year's Day", '2024-06-15: Midsummer Fair']);
  });

  it('should keep events on the boundary dates', () => {
    const lines = filterHolidays(FEED, {
      after_date: new Date('2024-06-15T00:00:00Z'),
      before_date: new Date('2024-12-25T00:00:00Z'),
    });
    expect(lines).toEqual(['2024-06-15: Midsummer Fair', '2024-12-25: Christmas Day']);
  });

  it('should return every event when no filter is given', () => {
    expect(filterHolidays(FEED, {})).toHaveLength(3);
    expect(filterHolidays(FEED, { max_count: 0 })).toHaveLength(3);
  });
});

describe('parseArguments', () => {
  it('should accept decoded objects and JSON text', () => {
    expect(parseArguments(weatherArgsSchema, { location: 'Barcelona' })).toEqual({
      success: true,
      data: { location: 'Barcelona' },
    });
    expect(parseArguments(weatherArgsSchema, '{"location":"Paris","forecast_days":2}')).toEqual({
      success: true,
      data: { location: 'Paris', forecast_days: 2 },
    });
  });

  it('should treat an empty payload as no arguments', () => {
    expect(parseArguments(holidaysArgsSchema, '')).toEqual({ success: true, data: {} });
    expect(parseArguments(holidaysArgsSchema, undefined)).toEqual({ success: true, data: {} });
  });

  it('should convert RFC 3339 timestamps to dates', () => {
    const parsed = parseArguments(holidaysArgsSchema, { after_date: '2024-02-01T00:00:00+01:00' });
    expect(parsed.success && parsed.data.after_date?.toISOString()).toBe('2024-01-31T23:00:00.000Z');
  });

  it('should describe schema failures with their paths', () => {
    expect(parseArguments(holidaysArgsSchema, { max_count: 'three' })).toEqual({
      success: false,
      error: 'max_count: Expected number, received string',
    });
    expect(parseArguments(weatherArgsSchema, { location: '  ' })).toEqual({
      success: false,
      error: 'location: location must not be empty',
    });
  });
});

describe('CapabilityRegistry', () => {
  const createRegistry = (weather?: IWeatherClient, holidays = staticHolidays(FEED)) =>
    new CapabilityRegistry({
      weather,
      holidays,
      holidayFeedUrl: 'https://calendar.test/holidays.ics',
      clock: fixedClock('2024-05-01T10:00:00.000Z'),
    });

  beforeEach(() => {
    captureLogs();
  });

  it('should return current conditions without forecast_days', async () => {
    const weather = fakeWeather();
    const result = await createRegistry(weather).invoke(toolCall('get_weather', { location: 'Barcelona' }));

    expect(result).toEqual({ toolName: 'get_weather', callId: 'call_0', content: 'current conditions', ok: true });
    expect(weather.getCurrentWeather).toHaveBeenCalledWith('Barcelona', undefined);
    expect(weather.getForecast).not.toHaveBeenCalled();
  });

  it('should request a forecast for a positive forecast_days', async () => {
    const weather = fakeWeather();
    const signal = new AbortController().signal;

    const result = await createRegistry(weather).invoke(
      toolCall('get_weather', { location: 'Barcelona', forecast_days: 3 }),
      signal
    );

    expect(result.content).toBe('forecast');
    expect(weather.getForecast).toHaveBeenCalledWith('Barcelona', 3, signal);
  });

  it('should fall back to current conditions for forecast_days of zero or null', async () => {
    const weather = fakeWeather();
    const registry = createRegistry(weather);

    await registry.invoke(toolCall('get_weather', { location: 'Rome', forecast_days: 0 }));
    await registry.invoke(toolCall('get_weather', { location: 'Rome', forecast_days: null }));

    expect(weather.getCurrentWeather).toHaveBeenCalledTimes(2);
    expect(weather.getForecast).not.toHaveBeenCalled();
  });

  it('should report weather failures as text', async () => {
    const weather = fakeWeather();
    weather.getCurrentWeather.mockRejectedValue(new Error('weather API error: No matching location found.'));

    const result = await createRegistry(weather).invoke(toolCall('get_weather', { location: 'Atlantis' }));

    expect(result).toMatchObject({
      ok: false,
      content: 'Failed to get weather information: weather API error: No matching location found.',
    });
  });

  it('should report a missing weather configuration', async () => {
    const result = await createRegistry().invoke(toolCall('get_weather', { location: 'Barcelona' }));
    expect(result).toMatchObject({ ok: false, content: WEATHER_NOT_CONFIGURED });
  });

  it('should report unparsable arguments', async () => {
    const result = await createRegistry(fakeWeather()).invoke(toolCall('get_weather', { forecast_days: 2 }));
    expect(result.ok).toBe(false);
    expect(result.content).toBe('failed to parse get_weather arguments: location: Required');
  });

  it('should return the current instant for get_today_date', async () => {
    const result = await createRegistry().invoke(toolCall('get_today_date'));
    expect(result.content).toBe('2024-05-01T10:00:00.000Z');
  });

  it('should filter the holiday feed', async () => {
    const result = await createRegistry().invoke(
      toolCall('get_holidays', '{"after_date":"2024-02-01T00:00:00Z","max_count":1}')
    );
    expect(result).toMatchObject({ ok: true, content: '2024-06-15: Midsummer Fair' });
  });

  it('should report a failed holiday feed', async () => {
    const holidays = { loadEvents: jest.fn().mockRejectedValue(new Error('status 500')) };

    const result = await createRegistry(undefined, holidays).invoke(toolCall('get_holidays'));
    expect(result).toMatchObject({ ok: false, content: 'failed to load holiday events' });
  });

  it('should rethrow capability failures caused by cancellation', async () => {
    const controller = new AbortController();
    const weather = fakeWeather();
    weather.getCurrentWeather.mockImplementation(async () => {
      controller.abort(new Error('turn cancelled'));
      throw new Error('The operation was aborted.');
    });

    await expect(
      createRegistry(weather).invoke(toolCall('get_weather', { location: 'Barcelona' }), controller.signal)
    ).rejects.toThrow('turn cancelled');
  });

  it('should throw for an unknown tool', async () => {
    await expect(createRegistry().invoke(toolCall('get_stock_price'))).rejects.toBeInstanceOf(UnknownToolError);
  });
});
