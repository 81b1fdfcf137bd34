import { DiscordAPIError, REST, makeURLSearchParams } from '@discordjs/rest';
import { Routes, type APIEmbed, type RESTPostAPIChannelMessageJSONBody } from 'discord-api-types/v10';
import { z } from 'zod';
import {
  MissingDestinationError,
  PermissionError,
  TransportError,
  describeError,
} from './errors.js';
import { fitEmbed } from './format.js';
import type { Audience, EmbedPayload, MessagePayload, PostedMessage } from './types.js';

export interface Destination {
  readonly channelId: string;
  /** Resolves to the new message id. */
  send(payload: MessagePayload): Promise<string>;
  /** Most recent messages first; `fromSelf` marks those this bot authored. */
  recent(limit: number): Promise<(PostedMessage & { fromSelf: boolean })[]>;
  delete(messageId: string): Promise<void>;
}

export function toDiscordEmbed(payload: EmbedPayload): APIEmbed {
  const embed = fitEmbed(payload);
  return {
    title: embed.title,
    description: embed.description,
    color: embed.color,
    fields: embed.fields,
    footer: embed.footer ? { text: embed.footer } : undefined,
  };
}

export function toDiscordBody(payload: MessagePayload): RESTPostAPIChannelMessageJSONBody {
  const allowed_mentions = { parse: [] };
  return payload.kind === 'text'
    ? { content: payload.content, allowed_mentions }
    : { embeds: [toDiscordEmbed(payload.embed)], allowed_mentions };
}

const PERMISSION_CODES = new Set([50001, 50013]); // Missing Access, Missing Permissions
const NOT_FOUND_CODES = new Set([10003, 10008]); // Unknown Channel, Unknown Message

/** Maps a REST failure onto the error taxonomy the engines log and branch on. */
export function classifyDiscordError(err: unknown, target: string): Error {
  if (err instanceof DiscordAPIError) {
    if (err.status === 403 || PERMISSION_CODES.has(Number(err.code))) return new PermissionError(target, { cause: err });
    if (err.status === 404 || NOT_FOUND_CODES.has(Number(err.code))) return new MissingDestinationError(target, { cause: err });
  }
  return new TransportError(`Discord request for ${target} failed: ${describeError(err)}`, { cause: err });
}

const idSchema = z.object({ id: z.string() });
const messageListSchema = z.array(
  z.object({
    id: z.string(),
    author: z.object({ id: z.string() }),
    embeds: z.array(z.object({ title: z.string().optional() })).default([]),
  }),
);

export class DiscordRestTransport {
  private self: Promise<string> | null = null;

  constructor(readonly rest: REST) {}

  static fromToken(token: string): DiscordRestTransport {
    return new DiscordRestTransport(new REST({ version: '10' }).setToken(token));
  }

  /** The bot's own user id, looked up once. */
  selfId(): Promise<string> {
    if (!this.self) {
      this.self = this.rest.get(Routes.user()).then(user => idSchema.parse(user).id);
      this.self.catch(() => {
        this.self = null;
      });
    }
    return this.self;
  }

  channel(channelId: string): Destination {
    return new DiscordChannelDestination(this, channelId);
  }
}

class DiscordChannelDestination implements Destination {
  constructor(
    private readonly transport: DiscordRestTransport,
    readonly channelId: string,
  ) {}

  async send(payload: MessagePayload): Promise<string> {
    try {
      const res = await this.transport.rest.post(Routes.channelMessages(this.channelId), {
        body: toDiscordBody(payload),
      });
      return idSchema.parse(res).id;
    } catch (err) {
      throw classifyDiscordError(err, this.channelId);
    }
  }

  async recent(limit: number) {
    try {
      const [selfId, res] = await Promise.all([
        this.transport.selfId(),
        this.transport.rest.get(Routes.channelMessages(this.channelId), {
          query: makeURLSearchParams({ limit }),
        }),
      ]);
      return messageListSchema.parse(res).map(m => ({
        id: m.id,
        authorId: m.author.id,
        embedTitles: m.embeds.flatMap(e => (e.title ? [e.title] : [])),
        fromSelf: m.author.id === selfId,
      }));
    } catch (err) {
      throw classifyDiscordError(err, this.channelId);
    }
  }

  async delete(messageId: string) {
    try {
      await this.transport.rest.delete(Routes.channelMessage(this.channelId, messageId));
    } catch (err) {
      throw classifyDiscordError(err, `${this.channelId}/${messageId}`);
    }
  }
}

export type DeliveryOutcome =
  | { ok: true; audience: string; messageIds: string[] }
  | { ok: false; audience: string; error: Error };

/**
 * Owns the audience -> destination bindings, resolved once at construction.
 * `deliver` never rejects; failures come back as outcomes and are logged here.
 */
export class ChannelFanout {
  private readonly bindings: ReadonlyMap<string, Destination>;

  constructor(audiences: Audience[], open: (channelId: string) => Destination) {
    this.bindings = new Map(audiences.map((a): [string, Destination] => [a.key, open(a.channelId)]));
  }

  keys(): string[] {
    return [...this.bindings.keys()];
  }

  resolve(key: string): Destination | undefined {
    return this.bindings.get(key);
  }

  async deliver(key: string, payloads: MessagePayload[]): Promise<DeliveryOutcome> {
    const destination = this.bindings.get(key);
    if (!destination) {
      const error = new MissingDestinationError(key);
      console.error('Failed to send message', { audience: key, err: error.message });
      return { ok: false, audience: key, error };
    }
    const messageIds: string[] = [];
    try {
      for (const payload of payloads) messageIds.push(await destination.send(payload));
      return { ok: true, audience: key, messageIds };
    } catch (err) {
      const error = err instanceof Error ? err : new TransportError(String(err));
      console.error('Failed to send message', {
        audience: key,
        channel_id: destination.channelId,
        err: describeError(err),
      });
      return { ok: false, audience: key, error };
    }
  }
}
