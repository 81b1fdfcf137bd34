import {
  Client,
  GatewayIntentBits,
  Partials,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type BaseMessageOptions,
  type ChatInputCommandInteraction,
  type Message,
} from 'discord.js';
import { REST } from '@discordjs/rest';
import { Routes } from 'discord-api-types/v10';
import type { App } from './app.js';
import { describeError } from './errors.js';
import { toDiscordEmbed } from './notify.js';
import type { Delivery, OnDemandTrigger, Requester } from './ondemand.js';
import type { MessagePayload } from './types.js';

export const PREFIX = '!';

export type CommandSpec = {
  name: string;
  description: string;
  admin: boolean;
  action: { kind: 'on-demand'; trigger: OnDemandTrigger; delivery: Delivery } | { kind: 'summary' };
};

export const COMMANDS: CommandSpec[] = [
  {
    name: 'upcoming_events',
    description: 'Shows your upcoming events for the next 3 days privately.',
    admin: false,
    action: { kind: 'on-demand', trigger: { domain: 'events', horizonHours: 72, limit: 25 }, delivery: { kind: 'private' } },
  },
  {
    name: 'upcoming_trains',
    description: 'Shows upcoming train departures for the next 3 days privately.',
    admin: false,
    action: { kind: 'on-demand', trigger: { domain: 'trains', horizonHours: 72 }, delivery: { kind: 'private' } },
  },
  {
    name: 'manual_train_trigger',
    description: 'Posts train departures in the next 24 hours.',
    admin: true,
    action: { kind: 'on-demand', trigger: { domain: 'trains', horizonHours: 24 }, delivery: { kind: 'shared' } },
  },
  {
    name: 'manual_trigger',
    description: 'Posts the upcoming events summary now.',
    admin: true,
    action: { kind: 'summary' },
  },
];

export function toMessageOptions(payload: MessagePayload): BaseMessageOptions {
  const allowedMentions = { parse: [] };
  return payload.kind === 'text'
    ? { content: payload.content, allowedMentions }
    : { embeds: [toDiscordEmbed(payload.embed)], allowedMentions };
}

/** Runs one command for a requester, reporting every outcome back to them. */
export async function runCommand(app: App, spec: CommandSpec, requester: Requester, isAdmin: boolean) {
  if (spec.admin && !isAdmin) {
    await requester.notify('You need administrator permissions to use this command.');
    return;
  }
  try {
    if (spec.action.kind === 'on-demand') {
      await app.onDemand.run(spec.action.trigger, spec.action.delivery, requester);
      return;
    }
    const destination = app.summary.destination;
    if (!destination) {
      await requester.notify('Error: No summary channel is configured. Please contact an admin.');
      return;
    }
    const result = await app.summary.run();
    if (result.status === 'posted') {
      await requester.notify(`Posted upcoming events to <#${destination.channelId}>.`);
    } else {
      await requester.notify(`Error: Could not post upcoming events to <#${destination.channelId}> (${result.reason}).`);
    }
  } catch (err) {
    console.error(`Error in ${spec.name} command`, { requester: requester.displayName, err: describeError(err) });
    await requester.notify('An error occurred while handling this command. Please try again later.');
  }
}

function interactionRequester(interaction: ChatInputCommandInteraction): Requester {
  let answered = false;
  // the deferred ephemeral reply is edited first; anything after it follows up
  const respond = async (options: BaseMessageOptions) => {
    if (!answered) {
      answered = true;
      await interaction.editReply(options);
    } else {
      await interaction.followUp({ ...options, ephemeral: true });
    }
  };
  return {
    displayName: interaction.user.displayName,
    async replyPrivately(payloads) {
      for (const p of payloads) await respond(toMessageOptions(p));
    },
    async sendDirect(payloads) {
      for (const p of payloads) await interaction.user.send(toMessageOptions(p));
    },
    notify: text => respond({ content: text, allowedMentions: { parse: [] } }),
  };
}

// Text commands have no private reply, so private output goes by DM.
function messageRequester(message: Message): Requester {
  return {
    displayName: message.member?.displayName ?? message.author.displayName,
    async sendDirect(payloads) {
      for (const p of payloads) await message.author.send(toMessageOptions(p));
    },
    notify: async text => {
      await message.reply({ content: text, allowedMentions: { parse: [] } });
    },
  };
}

export async function registerCommands(app: App) {
  const { token, appId, guildIds } = app.config.discord;
  if (!token || !appId) {
    console.warn('Skipping command registration: missing DISCORD_TOKEN or APP_ID');
    return;
  }

  const commands = COMMANDS.map(spec => {
    const builder = new SlashCommandBuilder().setName(spec.name).setDescription(spec.description);
    if (spec.admin) builder.setDefaultMemberPermissions(PermissionFlagsBits.Administrator);
    return builder.toJSON();
  });

  const rest = app.transport?.rest ?? new REST({ version: '10' }).setToken(token);

  if (guildIds.length > 0) {
    for (const gid of guildIds) {
      await rest.put(Routes.applicationGuildCommands(appId, gid), { body: commands });
      console.log(`Registered ${commands.length} command(s) for guild ${gid}`);
    }
  } else {
    await rest.put(Routes.applicationCommands(appId), { body: commands });
    console.log(`Registered ${commands.length} command(s) globally`);
  }
}

/** Connects the gateway client that answers slash and prefixed text commands. */
export async function startCommandBot(app: App): Promise<Client | null> {
  const { token } = app.config.discord;
  if (!token) {
    console.warn('DISCORD_TOKEN not set; command bot will not connect.');
    return null;
  }

  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    partials: [Partials.Channel],
  });

  client.once('ready', c => {
    console.log(`Command bot logged in as ${c.user.tag}`);
  });

  client.on('interactionCreate', async interaction => {
    if (!interaction.isChatInputCommand()) return;
    const spec = COMMANDS.find(c => c.name === interaction.commandName);
    if (!spec) return;
    try {
      await interaction.deferReply({ ephemeral: true });
      const isAdmin = interaction.memberPermissions?.has(PermissionFlagsBits.Administrator) ?? false;
      await runCommand(app, spec, interactionRequester(interaction), isAdmin);
    } catch (err) {
      console.error(`Failed to answer /${spec.name}`, { user: interaction.user.id, err: describeError(err) });
    }
  });

  client.on('messageCreate', async message => {
    if (message.author.bot || !message.content.startsWith(PREFIX)) return;
    const name = message.content.slice(PREFIX.length).trim().split(/\s+/)[0];
    const spec = COMMANDS.find(c => c.name === name);
    if (!spec) return;
    try {
      const isAdmin = message.member?.permissions.has(PermissionFlagsBits.Administrator) ?? false;
      await runCommand(app, spec, messageRequester(message), isAdmin);
    } catch (err) {
      console.error(`Failed to answer ${PREFIX}${spec.name}`, { user: message.author.id, err: describeError(err) });
    }
  });

  await registerCommands(app);
  await client.login(token);
  return client;
}
