import { describe, expect, it } from 'vitest';
import {
  LIMITS,
  chunkText,
  endInstant,
  fitEmbed,
  formatStart,
  offsetLabel,
  renderAnnouncement,
  startInstant,
  truncate,
} from '../src/format.js';

const display = { utcOffsetMinutes: -120 };

describe('formatStart', () => {
  it('renders instants in the configured fixed offset', () => {
    // 2026-10-19 is a Monday; 12:30Z is 10:30 at UTC-2
    const out = formatStart({ kind: 'instant', at: new Date('2026-10-19T12:30:00Z') }, display);
    expect(out).toBe('Monday, Oct 19 at 10:30 (UTC-2)');
  });

  it('crosses the date line when the offset does', () => {
    const out = formatStart({ kind: 'instant', at: new Date('2026-10-19T01:00:00Z') }, display);
    expect(out).toBe('Sunday, Oct 18 at 23:00 (UTC-2)');
  });

  it('renders all-day events without a clock time', () => {
    const out = formatStart({ kind: 'date', date: '2026-10-20' }, display);
    expect(out).toBe('Tuesday, Oct 20 (All-day)');
    expect(out).not.toMatch(/\d{2}:\d{2}/);
  });

  it('labels half-hour offsets', () => {
    expect(offsetLabel(330)).toBe('UTC+5:30');
    expect(offsetLabel(0)).toBe('UTC');
    expect(offsetLabel(-120)).toBe('UTC-2');
  });
});

describe('startInstant', () => {
  it('maps all-day starts to midnight UTC', () => {
    expect(startInstant({ kind: 'date', date: '2026-10-20' }).toISOString()).toBe('2026-10-20T00:00:00.000Z');
  });
});

describe('endInstant', () => {
  it('uses the end of a multi-day event', () => {
    const event = {
      id: 'conf',
      title: 'Conference',
      start: { kind: 'date', date: '2026-10-14' },
      end: { kind: 'date', date: '2026-10-21' },
    } as const;
    expect(endInstant(event).toISOString()).toBe('2026-10-21T00:00:00.000Z');
  });

  it('falls back to the start without an end', () => {
    const at = new Date('2026-10-19T09:00:00Z');
    expect(endInstant({ id: 'a', title: 'A', start: { kind: 'instant', at } })).toEqual(at);
  });
});

describe('chunkText', () => {
  it('leaves short text alone', () => {
    expect(chunkText('hello')).toEqual(['hello']);
  });

  it('splits on line boundaries under the limit', () => {
    const line = 'x'.repeat(8);
    const text = [line, line, line].join('\n');
    expect(chunkText(text, 17)).toEqual([`${line}\n${line}`, line]);
  });

  it('hard-splits a single overlong line', () => {
    expect(chunkText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('does not cut an emoji in half', () => {
    // each emoji is two UTF-16 units
    expect(chunkText('a🚂🚂', 4)).toEqual(['a🚂', '🚂']);
  });

  it('never exceeds the Discord content limit', () => {
    const text = Array.from({ length: 300 }, (_, i) => `line ${i} `.repeat(3)).join('\n');
    const chunks = chunkText(text);
    expect(chunks.length).toBeGreaterThan(1);
    for (const c of chunks) expect(c.length).toBeLessThanOrEqual(LIMITS.content);
    expect(chunks.join('\n')).toBe(text);
  });
});

describe('fitEmbed', () => {
  it('caps field count and summarizes the overflow', () => {
    const fields = Array.from({ length: 30 }, (_, i) => ({ name: `f${i}`, value: 'v' }));
    const out = fitEmbed({ title: 't', fields });
    expect(out.fields).toHaveLength(25);
    expect(out.fields[24].name).toBe('…and 6 more');
    expect(out.fields[23].name).toBe('f23');
  });

  it('truncates oversize field values and titles', () => {
    const out = fitEmbed({ title: 'T'.repeat(300), fields: [{ name: 'n', value: 'v'.repeat(2000) }] });
    expect(out.title).toHaveLength(LIMITS.embedTitle);
    expect(out.title.endsWith('…')).toBe(true);
    expect(out.fields[0].value).toHaveLength(LIMITS.fieldValue);
  });

  it('drops trailing fields to stay under the total size', () => {
    const fields = Array.from({ length: 10 }, (_, i) => ({ name: `f${i}`, value: 'v'.repeat(1000) }));
    const out = fitEmbed({ title: 't', fields });
    const total = out.title.length + out.fields.reduce((n, f) => n + f.name.length + f.value.length, 0);
    expect(total).toBeLessThanOrEqual(LIMITS.embedTotal);
    expect(out.fields.at(-1)?.name).toMatch(/^…and \d+ more$/);
  });
});

describe('renderAnnouncement', () => {
  const labels = { heading: 'EVENT STARTING NOW', time: 'Time', location: 'Location', link: 'Link', notes: 'Notes' };

  it('lays out the announcement lines', () => {
    const [payload] = renderAnnouncement(
      { title: 'Kickoff', start: 'Monday, Oct 19 at 10:30 (UTC-2)', link: 'https://cal.example/e1', description: 'Bring snacks' },
      labels,
    );
    expect(payload).toEqual({
      kind: 'text',
      content: [
        '**EVENT STARTING NOW: Kickoff**',
        '---------------------------------',
        '**Time:** Monday, Oct 19 at 10:30 (UTC-2)',
        '**Link:** <https://cal.example/e1>',
        '**Notes:** Bring snacks',
      ].join('\n'),
    });
  });

  it('chunks long notes into several messages', () => {
    const payloads = renderAnnouncement({ title: 'Long', start: 's', description: 'n'.repeat(4500) }, labels);
    expect(payloads.length).toBe(4);
    for (const p of payloads) expect(p.kind === 'text' && p.content.length <= LIMITS.content).toBe(true);
  });
});

describe('truncate', () => {
  it('keeps text within the limit', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abc', 4)).toBe('abc');
  });
});
