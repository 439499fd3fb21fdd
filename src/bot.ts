// src/bot.ts
import {
    ActivityType,
    Client,
    Events,
    GatewayIntentBits,
    Partials,
    REST,
    Routes,
    SlashCommandBuilder,
    type Interaction,
    type Message,
} from 'discord.js';
import axios from 'axios';
import type { AppConfig } from './config';
import { describeError } from './errors';
import { WELCOME_MESSAGE } from './format';
import { MESSAGES, type ReceiptPipeline } from './services/pipeline';
import type { ChatSender } from './types';
import { isImageMimeType } from './utils/image';
import { createLogger } from './utils/logger';

const log = createLogger('bot');

export interface IncomingAttachment {
    url: string;
    name: string;
    contentType: string | null;
    size: number;
}

export type MessageRoute =
    | { kind: 'photo'; attachment: IncomingAttachment }
    | { kind: 'text'; text: string }
    | { kind: 'skip' };

// A photo wins over any caption sent with it; command-looking text is left alone.
export function routeMessage(content: string, attachments: IncomingAttachment[]): MessageRoute {
    const photo = attachments.find(attachment => isImageMimeType(attachment.contentType));
    if (photo) return { kind: 'photo', attachment: photo };

    const text = content.trim();
    if (!text || text.startsWith('/') || text.startsWith('!')) return { kind: 'skip' };
    return { kind: 'text', text };
}

export const commands = [
    new SlashCommandBuilder()
        .setName('help')
        .setDescription('Explain how to log a receipt or a shopping note.'),
];

export function createDiscordClient(): Client {
    return new Client({
        intents: [
            GatewayIntentBits.Guilds,
            GatewayIntentBits.GuildMessages,
            GatewayIntentBits.MessageContent,
            GatewayIntentBits.DirectMessages,
        ],
        // DMs arrive on uncached channels
        partials: [Partials.Message, Partials.Channel],
    });
}

export class ExpenseBot {
    constructor(
        private readonly client: Client,
        private readonly pipeline: ReceiptPipeline,
        private readonly chat: ChatSender,
        private readonly config: AppConfig['discord'],
    ) {}

    async start(): Promise<void> {
        this.client.once(Events.ClientReady, readyClient => {
            log.info('Logged in', { tag: readyClient.user.tag });
            readyClient.user.setActivity('your receipts', { type: ActivityType.Watching });
        });
        this.client.on(Events.MessageCreate, message => {
            this.onMessage(message).catch(error => log.error('Unhandled message error', { error: describeError(error) }));
        });
        this.client.on(Events.InteractionCreate, interaction => {
            this.onInteraction(interaction).catch(error =>
                log.error('Unhandled interaction error', { error: describeError(error) }),
            );
        });

        await this.registerCommands();
        await this.client.login(this.config.token);
    }

    async stop(): Promise<void> {
        await this.client.destroy();
        log.info('Bot stopped');
    }

    private async registerCommands(): Promise<void> {
        const rest = new REST({ version: '10' }).setToken(this.config.token);
        const route = this.config.guildId
            ? Routes.applicationGuildCommands(this.config.clientId, this.config.guildId)
            : Routes.applicationCommands(this.config.clientId);
        try {
            log.info('Refreshing application (/) commands', { guildId: this.config.guildId ?? 'global' });
            await rest.put(route, { body: commands.map(command => command.toJSON()) });
        } catch (error) {
            log.error('Failed to register application commands', { error: describeError(error) });
        }
    }

    private async onInteraction(interaction: Interaction): Promise<void> {
        if (!interaction.isChatInputCommand()) return;
        if (interaction.commandName === 'help') {
            await interaction.reply({ content: WELCOME_MESSAGE, ephemeral: true });
        }
    }

    private async onMessage(message: Message): Promise<void> {
        if (message.author.bot) return;

        const attachments: IncomingAttachment[] = [...message.attachments.values()].map(attachment => ({
            url: attachment.url,
            name: attachment.name,
            contentType: attachment.contentType,
            size: attachment.size,
        }));
        await this.dispatch(message.channelId, routeMessage(message.content, attachments));
    }

    async dispatch(chatId: string, route: MessageRoute): Promise<void> {
        if (route.kind === 'text') {
            await this.pipeline.handleNote(chatId, route.text);
        } else if (route.kind === 'photo') {
            const data = await this.download(route.attachment);
            if (data) {
                await this.pipeline.handleImage(chatId, { data, mimeType: route.attachment.contentType ?? undefined });
            } else {
                // Same ack-then-apology sequence the pipeline sends for a failed extraction
                await this.chat.send(chatId, MESSAGES.photoReceived, 'plain');
                await this.chat.send(chatId, MESSAGES.photoFailed, 'plain');
            }
        }
    }

    private async download(attachment: IncomingAttachment): Promise<Buffer | undefined> {
        if (attachment.size > this.config.maxImageBytes) {
            log.warn('Attachment too large', { name: attachment.name, size: attachment.size });
            return undefined;
        }
        try {
            const response = await axios.get<ArrayBuffer>(attachment.url, {
                responseType: 'arraybuffer',
                maxContentLength: this.config.maxImageBytes,
            });
            return Buffer.from(response.data);
        } catch (error) {
            log.error('Error downloading attachment', { name: attachment.name, error: describeError(error) });
            return undefined;
        }
    }
}
