// src/services/discord-chat.ts
import { escapeMarkdown } from 'discord.js';
import type { ChatSender, MessageFormat } from '../types';

// Discord's hard limit on message content
export const MAX_MESSAGE_LENGTH = 2000;

const HIGH_SURROGATE = /[\uD800-\uDBFF]/;

export function fitMessage(text: string): string {
    if (text.length <= MAX_MESSAGE_LENGTH) return text;
    let end = MAX_MESSAGE_LENGTH - 1;
    // Never split a surrogate pair
    if (HIGH_SURROGATE.test(text[end - 1])) end -= 1;
    return `${text.slice(0, end)}…`;
}

export interface SendableChannel {
    send(content: string): Promise<unknown>;
}

export interface LookedUpChannel {
    isSendable(): this is SendableChannel;
}

// The slice of discord.js's ChannelManager this sender needs
export interface ChannelDirectory {
    fetch(id: string): Promise<LookedUpChannel | null>;
}

export class DiscordChat implements ChatSender {
    constructor(private readonly channels: ChannelDirectory) {}

    async send(chatId: string, text: string, format: MessageFormat): Promise<void> {
        const channel = await this.channels.fetch(chatId);
        if (!channel || !channel.isSendable()) {
            throw new Error(`Channel ${chatId} cannot receive messages`);
        }
        await channel.send(fitMessage(format === 'plain' ? escapeMarkdown(text) : text));
    }
}
