import { describe, expect, it } from 'vitest';
import { DiscordChat, fitMessage, MAX_MESSAGE_LENGTH, type ChannelDirectory, type SendableChannel } from './discord-chat';

class FakeChannel {
    readonly sent: string[] = [];

    constructor(private readonly sendable: boolean) {}

    isSendable(): this is SendableChannel {
        return this.sendable;
    }

    async send(content: string): Promise<void> {
        this.sent.push(content);
    }
}

function directory(channels: Record<string, FakeChannel>): ChannelDirectory {
    return { fetch: async id => channels[id] ?? null };
}

describe('fitMessage', () => {
    it('leaves short messages alone', () => {
        expect(fitMessage('hello')).toBe('hello');
    });

    it('truncates to the Discord limit', () => {
        const fitted = fitMessage('x'.repeat(MAX_MESSAGE_LENGTH + 10));

        expect(fitted).toHaveLength(MAX_MESSAGE_LENGTH);
        expect(fitted.endsWith('x…')).toBe(true);
    });

    it('does not cut an emoji in half', () => {
        const text = `${'x'.repeat(MAX_MESSAGE_LENGTH - 2)}🧾 and more`;

        expect(fitMessage(text)).toBe(`${'x'.repeat(MAX_MESSAGE_LENGTH - 2)}…`);
    });
});

describe('DiscordChat', () => {
    it('escapes markdown in plain messages', async () => {
        const channel = new FakeChannel(true);
        const chat = new DiscordChat(directory({ 'chan-1': channel }));

        await chat.send('chan-1', 'Deli *Express*', 'plain');

        expect(channel.sent).toEqual(['Deli \\*Express\\*']);
    });

    it('sends markdown messages untouched', async () => {
        const channel = new FakeChannel(true);
        const chat = new DiscordChat(directory({ 'chan-1': channel }));

        await chat.send('chan-1', '**Total:** 90', 'markdown');

        expect(channel.sent).toEqual(['**Total:** 90']);
    });

    it('throws for channels that cannot receive messages', async () => {
        const chat = new DiscordChat(directory({ voice: new FakeChannel(false) }));

        await expect(chat.send('voice', 'hello', 'plain')).rejects.toThrow('Channel voice cannot receive messages');
        await expect(chat.send('missing', 'hello', 'plain')).rejects.toThrow('Channel missing cannot receive messages');
    });
});
