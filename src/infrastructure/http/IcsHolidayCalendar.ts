import fetch from 'node-fetch';
import * as ical from 'node-ical';
import { HolidayEvent, IHolidayCalendar } from '../../core/interfaces/ICapabilities.js';

/**
 * Holiday feed published as an iCalendar (.ics) document
 */
export class IcsHolidayCalendar implements IHolidayCalendar {
  async loadEvents(feedUrl: string, signal?: AbortSignal): Promise<HolidayEvent[]> {
    const res = await fetch(feedUrl, { signal });
    if (!res.ok) {
      throw new Error(`holiday feed returned status ${res.status}`);
    }
    return parseHolidayFeed(await res.text());
  }
}

/**
 * Events in feed order. All-day dates are pinned to UTC midnight of the
 * calendar day; timed events use their UTC date.
 */
export function parseHolidayFeed(ics: string): HolidayEvent[] {
  const events: HolidayEvent[] = [];

  for (const component of Object.values<unknown>(ical.sync.parseICS(ics))) {
    if (!isRecord(component) || component.type !== 'VEVENT') {
      continue;
    }

    const start = component.start;
    if (!(start instanceof Date) || Number.isNaN(start.getTime())) {
      continue;
    }

    const date =
      component.datetype === 'date'
        ? new Date(Date.UTC(start.getFullYear(), start.getMonth(), start.getDate()))
        : new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), start.getUTCDate()));

    events.push({ date, name: textValue(component.summary) });
  }

  return events;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function textValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value) && typeof value.val === 'string') {
    return value.val;
  }
  return '';
}
