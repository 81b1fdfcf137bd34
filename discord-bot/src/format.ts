import { DateTime, FixedOffsetZone } from 'luxon';
import type {
  CalendarEvent,
  DisplayOptions,
  EmbedField,
  EmbedPayload,
  EventStart,
  MessagePayload,
} from './types.js';

// Discord API limits, https://discord.com/developers/docs/resources/message#embed-object-embed-limits
export const LIMITS = {
  content: 2000,
  embedTitle: 256,
  embedDescription: 4096,
  embedFields: 25,
  fieldName: 256,
  fieldValue: 1024,
  footer: 2048,
  embedTotal: 6000,
} as const;

const ELLIPSIS = '…';

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, Math.max(0, max - ELLIPSIS.length)) + ELLIPSIS;
}

export function offsetLabel(utcOffsetMinutes: number): string {
  if (utcOffsetMinutes === 0) return 'UTC';
  const sign = utcOffsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(utcOffsetMinutes);
  const hours = Math.floor(abs / 60);
  const minutes = abs % 60;
  return minutes ? `UTC${sign}${hours}:${String(minutes).padStart(2, '0')}` : `UTC${sign}${hours}`;
}

/**
 * Renders an event start for display. Instants are shown in the configured
 * fixed offset, never in the viewer's zone; all-day starts never carry a clock
 * time.
 */
export function formatStart(start: EventStart, display: DisplayOptions): string {
  if (start.kind === 'date') {
    const day = DateTime.fromISO(start.date, { zone: 'utc' }).setLocale('en-US');
    return `${day.toFormat('cccc, LLL dd')} (All-day)`;
  }
  const zone = FixedOffsetZone.instance(display.utcOffsetMinutes);
  const at = DateTime.fromJSDate(start.at).setZone(zone).setLocale('en-US');
  return `${at.toFormat("cccc, LLL dd 'at' HH:mm")} (${offsetLabel(display.utcOffsetMinutes)})`;
}

/** Instant used for ordering and retention; all-day starts resolve to midnight UTC. */
export function startInstant(start: EventStart): Date {
  if (start.kind === 'instant') return start.at;
  return DateTime.fromISO(start.date, { zone: 'utc' }).toJSDate();
}

/** When the event is over: its end if later than its start, else its start. */
export function endInstant(event: CalendarEvent): Date {
  const start = startInstant(event.start);
  if (!event.end) return start;
  const end = startInstant(event.end);
  return end.getTime() > start.getTime() ? end : start;
}

/**
 * Splits text into chunks no longer than `max`, preferring line boundaries.
 * A single line longer than `max` is cut hard.
 */
export function chunkText(text: string, max: number = LIMITS.content): string[] {
  if (text.length <= max) return [text];
  const chunks: string[] = [];
  let current = '';
  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= max) {
      current = candidate;
      continue;
    }
    if (current) chunks.push(current);
    let rest = line;
    while (rest.length > max) {
      let cut = max;
      if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) cut -= 1;
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }
  if (current) chunks.push(current);
  return chunks;
}

function isHighSurrogate(code: number) {
  return code >= 0xd800 && code <= 0xdbff;
}

export function textPayloads(text: string): MessagePayload[] {
  return chunkText(text).map((content): MessagePayload => ({ kind: 'text', content }));
}

function embedSize(embed: EmbedPayload): number {
  return (
    embed.title.length +
    (embed.description?.length ?? 0) +
    (embed.footer?.length ?? 0) +
    embed.fields.reduce((n, f) => n + f.name.length + f.value.length, 0)
  );
}

/** Clamps every embed part to Discord's limits, dropping trailing fields if needed. */
export function fitEmbed(embed: EmbedPayload): EmbedPayload {
  const fitted: EmbedPayload = {
    ...embed,
    title: truncate(embed.title, LIMITS.embedTitle),
    description: embed.description === undefined ? undefined : truncate(embed.description, LIMITS.embedDescription),
    footer: embed.footer === undefined ? undefined : truncate(embed.footer, LIMITS.footer),
    fields: embed.fields.map(f => ({
      ...f,
      name: truncate(f.name, LIMITS.fieldName),
      value: truncate(f.value || '\u200b', LIMITS.fieldValue),
    })),
  };

  const overflowField = (dropped: number): EmbedField => ({
    name: `…and ${dropped} more`,
    value: 'Not shown to keep this post within Discord limits.',
  });

  let kept = fitted.fields;
  let dropped = 0;
  if (kept.length > LIMITS.embedFields) {
    dropped = kept.length - (LIMITS.embedFields - 1);
    kept = kept.slice(0, LIMITS.embedFields - 1);
  }
  let result: EmbedPayload = { ...fitted, fields: dropped ? [...kept, overflowField(dropped)] : kept };
  while (embedSize(result) > LIMITS.embedTotal && kept.length > 0) {
    kept = kept.slice(0, -1);
    dropped += 1;
    result = { ...fitted, fields: [...kept, overflowField(dropped)] };
  }
  return result;
}

export type TextLabels = {
  heading: string;
  time: string;
  location: string;
  link: string;
  notes: string;
};

export const DIVIDER = '---------------------------------';

/** Announcement body for one event, already translated where needed. */
export function renderAnnouncement(
  parts: { title: string; start: string; location?: string | null; link?: string | null; description?: string | null },
  labels: TextLabels,
): MessagePayload[] {
  const lines = [`**${labels.heading}: ${parts.title}**`, DIVIDER, `**${labels.time}:** ${parts.start}`];
  if (parts.location) lines.push(`**${labels.location}:** ${parts.location}`);
  if (parts.link) lines.push(`**${labels.link}:** <${parts.link}>`);
  if (parts.description) lines.push(`**${labels.notes}:** ${parts.description}`);
  return textPayloads(lines.join('\n'));
}
