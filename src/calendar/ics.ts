import { formatIcsDate } from "../domain/policies/calendarDate";
import { serializeRecurrenceRule } from "../domain/policies/recurrenceRule";
import type { CalendarEvent, RegionCalendar } from "../types";

// Минимальный ICS (VCALENDAR/VEVENT) сериализатор под all-day события праздников.
// Поля события: SUMMARY, DTSTART, DTEND, DTSTAMP, UID, RRULE.

const CRLF = "\r\n";
const MAX_LINE_OCTETS = 75;

export type IcsOptions = {
  /** PRODID календаря. */
  prodId: string;
  /** X-WR-CALNAME (имя календаря в клиентах). */
  calendarName: string;
  /** DTSTAMP для всех событий (UTC). */
  dtStamp: Date;
};

/** Сериализовать календарь региона в текст `.ics` (CRLF, свёрнутые строки). */
export function serializeIcs(calendar: RegionCalendar, opts: IcsOptions): string {
  const lines: string[] = [
    "BEGIN:VCALENDAR",
    `PRODID:${escapeText(opts.prodId)}`,
    "VERSION:2.0",
    `X-WR-CALNAME:${escapeText(opts.calendarName)}`,
  ];
  const stamp = formatUtcDateTime(opts.dtStamp);
  for (const ev of calendar.events) lines.push(...eventLines(ev, stamp));
  lines.push("END:VCALENDAR");

  return lines.map(foldLine).join(CRLF) + CRLF;
}

function eventLines(ev: CalendarEvent, stamp: string): string[] {
  const out = [
    "BEGIN:VEVENT",
    `SUMMARY:${escapeText(ev.title)}`,
    `DTSTART;VALUE=DATE:${formatIcsDate(ev.start)}`,
    `DTEND;VALUE=DATE:${formatIcsDate(ev.end)}`,
    `DTSTAMP:${stamp}`,
    `UID:${ev.uid}`,
  ];
  if (ev.rrule) out.push(`RRULE:${serializeRecurrenceRule(ev.rrule)}`);
  out.push("END:VEVENT");
  return out;
}

/** Экранирование TEXT-значений (RFC 5545 3.3.11). */
export function escapeText(s: string): string {
  return s.replace(/\\/g, "\\\\").replace(/;/g, "\\;").replace(/,/g, "\\,").replace(/\r\n|\r|\n/g, "\\n");
}

/**
 * Свернуть строку длиннее 75 октетов (RFC 5545 3.1).
 *
 * Режем по границам символов, а не байтов, чтобы не разломать многобайтовый UTF-8.
 */
export function foldLine(line: string): string {
  const encoder = new TextEncoder();
  if (encoder.encode(line).length <= MAX_LINE_OCTETS) return line;

  const parts: string[] = [];
  let cur = "";
  let curOctets = 0;
  // Первая строка: 75 октетов, продолжения: 74 (плюс ведущий пробел).
  let limit = MAX_LINE_OCTETS;
  for (const ch of line) {
    const n = encoder.encode(ch).length;
    if (curOctets + n > limit) {
      parts.push(cur);
      cur = "";
      curOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    cur += ch;
    curOctets += n;
  }
  parts.push(cur);
  return parts.join(`${CRLF} `);
}

function formatUtcDateTime(d: Date): string {
  const yyyy = String(d.getUTCFullYear()).padStart(4, "0");
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}T${hh}${mi}${ss}Z`;
}
