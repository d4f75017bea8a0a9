/**
 * Utility functions for the pipeline
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  if (!existsSync(dirPath)) {
    await mkdir(dirPath, { recursive: true });
  }
}

/**
 * Read JSON file, null when missing or unparseable
 */
export async function readJson<T>(filePath: string): Promise<T | null> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as T;
  } catch {
    return null;
  }
}

/**
 * Write JSON file with pretty printing
 */
export async function writeJson<T>(filePath: string, data: T): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/**
 * YYYYMMDD in local time, as used in gazette URLs
 */
export function formatCompactDate(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
}

/**
 * DD/MM/YYYY in local time
 */
export function formatDayMonthYear(date: Date): string {
  return `${pad2(date.getDate())}/${pad2(date.getMonth() + 1)}/${date.getFullYear()}`;
}

/**
 * YYYYMMDD_HHMMSS in local time, for output file names
 */
export function formatTimestamp(date: Date): string {
  return `${formatCompactDate(date)}_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}

export interface CalendarDay {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

// Trailing zone of an RFC 822 or ISO 8601 timestamp
const ZONE_SUFFIX = /(?:\s|\d)(Z|GMT|UTC?|[+-]\d{2}:?\d{2})$/i;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

function zoneOffsetMinutes(zone: string): number {
  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(zone);
  if (!match) return 0;
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

/**
 * Calendar day a timestamp names in its own zone: "Sun, 18 Oct 2026 22:30:00 -0300"
 * is the 18th wherever this runs. Timestamps without a zone are read in local
 * time. Null when the value does not parse.
 */
export function calendarDayOf(value: string): CalendarDay | null {
  const trimmed = value.trim();
  const instant = new Date(trimmed);
  if (Number.isNaN(instant.getTime())) {
    return null;
  }

  const zone = ZONE_SUFFIX.exec(trimmed)?.[1];
  if (zone === undefined && !ISO_DATE_ONLY.test(trimmed)) {
    return { year: instant.getFullYear(), month: instant.getMonth() + 1, day: instant.getDate() };
  }

  const shifted = new Date(instant.getTime() + zoneOffsetMinutes(zone ?? 'Z') * 60_000);
  return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
}

export function isSameCalendarDay(day: CalendarDay, date: Date): boolean {
  return (
    day.year === date.getFullYear() &&
    day.month === date.getMonth() + 1 &&
    day.day === date.getDate()
  );
}

/**
 * Turn an account name into a file-name fragment
 */
export function safeFileName(name: string): string {
  return name.trim().replace(/[\s/\\]+/g, '_');
}

/**
 * Parse command line arguments
 * Supports both --key=value and --key value formats
 */
export function parseArgs(args: string[]): Record<string, string | boolean> {
  const result: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIndex = arg.indexOf('=');
      if (eqIndex !== -1) {
        // --key=value format
        const key = arg.slice(2, eqIndex);
        const value = arg.slice(eqIndex + 1);
        result[key] = value;
      } else {
        // --key value or --flag format
        const key = arg.slice(2);
        const nextArg = args[i + 1];
        if (nextArg && !nextArg.startsWith('--')) {
          result[key] = nextArg;
          i++; // Skip the next arg since we consumed it as a value
        } else {
          result[key] = true;
        }
      }
    }
  }

  return result;
}
