import { DateTime } from 'luxon';
import type { NextStatus } from '../monitor/types.js';

// Lowercased location name → IANA zone
const LOCATION_TIMEZONES: Record<string, string> = {
  melbourne: 'Australia/Melbourne',
  brisbane: 'Australia/Brisbane',
  sydney: 'Australia/Sydney',
  canberra: 'Australia/Sydney',
  adelaide: 'Australia/Adelaide',
  perth: 'Australia/Perth',
  hobart: 'Australia/Hobart',
  darwin: 'Australia/Darwin',
};

export const DEFAULT_TIMEZONE = 'UTC';

// Daily inactive window [22:00, 06:30), wrapping midnight
export const INACTIVE_START = { hour: 22, minute: 0 } as const;
export const INACTIVE_END = { hour: 6, minute: 30 } as const;

const START_SECONDS = INACTIVE_START.hour * 3600 + INACTIVE_START.minute * 60;
const END_SECONDS = INACTIVE_END.hour * 3600 + INACTIVE_END.minute * 60;

export interface MonitoringCheck {
  isActive: boolean;
  reason: string;
  nextChange: Date;
}

export interface MonitoringSchedule {
  location: string;
  timezone: string;
  localTime: string;
  isActive: boolean;
  nextChange: string;
  nextStatus: NextStatus;
  activeHours: string;
}

export function getLocationTimezone(location: string): string {
  return LOCATION_TIMEZONES[location.toLowerCase()] ?? DEFAULT_TIMEZONE;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

const END_LABEL = `${pad(INACTIVE_END.hour)}:${pad(INACTIVE_END.minute)}`;
const START_LABEL = `${pad(INACTIVE_START.hour)}:${pad(INACTIVE_START.minute)}`;

interface WindowPosition {
  local: DateTime;
  isActive: boolean;
  nextChange: DateTime;
}

/**
 * Locate `now` relative to the inactive window in the location's zone.
 * The window is half-open: 22:00:00 is inactive, 06:30:00 is active.
 */
function locateInWindow(location: string, now: Date): WindowPosition {
  const local = DateTime.fromJSDate(now, { zone: getLocationTimezone(location) });
  const secondsOfDay = local.hour * 3600 + local.minute * 60 + local.second;

  const atStart = local.set({ ...INACTIVE_START, second: 0, millisecond: 0 });
  const atEnd = local.set({ ...INACTIVE_END, second: 0, millisecond: 0 });

  if (secondsOfDay >= START_SECONDS) {
    // Before midnight: resume tomorrow morning
    return { local, isActive: false, nextChange: atEnd.plus({ days: 1 }) };
  }
  if (secondsOfDay < END_SECONDS) {
    // Past midnight: resume later today
    return { local, isActive: false, nextChange: atEnd };
  }
  return { local, isActive: true, nextChange: atStart };
}

export function isMonitoringActive(location: string, now: Date = new Date()): MonitoringCheck {
  const { local, isActive, nextChange } = locateInWindow(location, now);
  const localTime = local.toFormat('HH:mm');

  const reason = isActive
    ? `Daytime hours in ${location} (local time: ${localTime})`
    : `Nighttime hours in ${location} (local time: ${localTime}). Resuming at ${END_LABEL}`;

  return { isActive, reason, nextChange: nextChange.toJSDate() };
}

export function getMonitoringSchedule(location: string, now: Date = new Date()): MonitoringSchedule {
  const { local, isActive, nextChange } = locateInWindow(location, now);

  return {
    location,
    timezone: getLocationTimezone(location),
    localTime: local.toFormat('yyyy-MM-dd HH:mm:ss'),
    isActive,
    nextChange: nextChange.toFormat('yyyy-MM-dd HH:mm:ss'),
    nextStatus: isActive ? 'inactive' : 'active',
    activeHours: `${END_LABEL} - ${START_LABEL}`,
  };
}

/** HH:mm of an instant in the location's zone. */
export function formatLocalTime(instant: Date, location: string): string {
  return DateTime.fromJSDate(instant, { zone: getLocationTimezone(location) }).toFormat('HH:mm');
}
