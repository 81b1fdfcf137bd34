import type { AnnouncementProfile } from './announce.js';
import type { TimeWindowCalendarClient } from './calendar.js';
import { describeError } from './errors.js';
import { endInstant, formatStart, textPayloads } from './format.js';
import type { ChannelFanout } from './notify.js';
import type { AnnouncedEventStore } from './store.js';
import type { CalendarEvent, DisplayOptions, DomainName, MessagePayload, OnDemandDedup } from './types.js';

export const DM_FAILED = "I couldn't send you a DM. Please check your privacy settings.";
export const NO_CHANNELS = 'Error: Could not find any of the configured channels.';
export const FETCH_FAILED = 'An error occurred while fetching the schedule. Please try again later.';

/** The person who invoked a command, seen through whatever surface they used. */
export interface Requester {
  readonly displayName: string;
  /** Present when the surface can carry a reply only the requester sees. */
  replyPrivately?(payloads: MessagePayload[]): Promise<void>;
  sendDirect(payloads: MessagePayload[]): Promise<void>;
  /** Visible acknowledgement on the invoking surface. */
  notify(text: string): Promise<void>;
}

export type OnDemandTrigger = {
  domain: DomainName;
  horizonHours: number;
  limit?: number;
};

export type Delivery = { kind: 'shared' } | { kind: 'private' };

export type DomainContext = {
  calendarId?: string;
  profile: AnnouncementProfile;
  fanout: ChannelFanout;
  store: AnnouncedEventStore;
};

export type OnDemandOutcome =
  | { status: 'empty' }
  | { status: 'unconfigured' }
  | { status: 'fetch-failed' }
  | { status: 'shared'; channels: string[] }
  | { status: 'private'; via: 'reply' | 'dm' }
  | { status: 'dm-failed' };

export function describeSpan(hours: number): string {
  if (hours === 24) return '24 Hours';
  if (hours % 24 === 0) return `${hours / 24} Days`;
  return `${hours} Hours`;
}

export function renderDigest(
  events: CalendarEvent[],
  profile: AnnouncementProfile,
  display: DisplayOptions,
  span: string,
  footer?: string,
): MessagePayload[] {
  const parts = [`**${profile.digestTitle(span)}**`, '------------------------------------'];
  if (events.length === 0) parts.push(`No upcoming ${profile.noun} found in the next ${span.toLowerCase()}.`);
  for (const event of events) {
    const details = [
      `${profile.emoji} **${event.title}**`,
      `**${profile.digestStartLabel}:** ${formatStart(event.start, display)}`,
    ];
    if (event.location) details.push(`**Where:** ${event.location}`);
    if (event.description) details.push(`**${profile.labels.notes}:** ${event.description}`);
    if (event.link) details.push(`[View on Google Calendar](<${event.link}>)`);
    parts.push(details.join('\n'));
  }
  let text = parts.join('\n\n');
  if (footer) text += `\n\n*${footer}*`;
  return textPayloads(text);
}

/**
 * "Announce for window W now". Whether these runs read or write the
 * announced-id store is set by `dedup`.
 */
export class OnDemandService {
  constructor(
    private readonly opts: {
      calendar: TimeWindowCalendarClient;
      domains: Record<DomainName, DomainContext>;
      display: DisplayOptions;
      dedup: OnDemandDedup;
      clock?: () => Date;
    },
  ) {}

  async run(trigger: OnDemandTrigger, delivery: Delivery, requester: Requester): Promise<OnDemandOutcome> {
    const domain = this.opts.domains[trigger.domain];
    const span = describeSpan(trigger.horizonHours);

    if (!domain.calendarId) {
      await requester.notify(`Error: No calendar is configured for ${domain.profile.noun}.`);
      return { status: 'unconfigured' };
    }
    if (delivery.kind === 'shared' && domain.fanout.keys().length === 0) {
      await requester.notify('Error: No announcement channels are configured.');
      return { status: 'unconfigured' };
    }

    const now = (this.opts.clock ?? (() => new Date()))();
    const result = await this.opts.calendar.fetch(domain.calendarId, {
      timeMin: now,
      timeMax: new Date(now.getTime() + trigger.horizonHours * 3_600_000),
      limit: trigger.limit,
    });
    if (!result.ok) {
      await requester.notify(FETCH_FAILED);
      return { status: 'fetch-failed' };
    }

    const events =
      this.opts.dedup === 'ignore' ? result.events : result.events.filter(e => !domain.store.has(e.id));

    if (delivery.kind === 'private' && events.length === 0) {
      await requester.notify(`You have no upcoming ${domain.profile.noun} in the next ${span.toLowerCase()}.`);
      return { status: 'empty' };
    }

    const outcome =
      delivery.kind === 'shared'
        ? await this.deliverShared(domain, renderDigest(events, domain.profile, this.opts.display, span), span, requester)
        : await this.deliverPrivate(
            renderDigest(events, domain.profile, this.opts.display, span, `Requested by ${requester.displayName}`),
            requester,
          );

    if (this.opts.dedup === 'update' && events.length > 0 && outcome.status !== 'dm-failed') {
      for (const e of events) domain.store.add(e.id, endInstant(e));
      await domain.store.save();
    }
    return outcome;
  }

  private async deliverShared(
    domain: DomainContext,
    payloads: MessagePayload[],
    span: string,
    requester: Requester,
  ): Promise<OnDemandOutcome> {
    const channels: string[] = [];
    for (const key of domain.fanout.keys()) {
      const outcome = await domain.fanout.deliver(key, payloads);
      const destination = domain.fanout.resolve(key);
      if (outcome.ok && destination) channels.push(`<#${destination.channelId}>`);
    }
    if (channels.length === 0) {
      await requester.notify(NO_CHANNELS);
    } else {
      await requester.notify(`Posted ${domain.profile.noun} for the next ${span.toLowerCase()} to ${channels.join(', ')}.`);
    }
    return { status: 'shared', channels };
  }

  private async deliverPrivate(payloads: MessagePayload[], requester: Requester): Promise<OnDemandOutcome> {
    if (requester.replyPrivately) {
      await requester.replyPrivately(payloads);
      return { status: 'private', via: 'reply' };
    }
    try {
      await requester.sendDirect(payloads);
    } catch (err) {
      console.warn('Could not DM requester', { requester: requester.displayName, err: describeError(err) });
      await requester.notify(DM_FAILED);
      return { status: 'dm-failed' };
    }
    await requester.notify("I've sent your schedule to your DMs.");
    return { status: 'private', via: 'dm' };
  }
}
