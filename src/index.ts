// src/index.ts
import { createDiscordClient, ExpenseBot } from './bot';
import { loadConfig, loadEnvFile } from './config';
import { describeError } from './errors';
import { DiscordChat } from './services/discord-chat';
import { Enricher } from './services/enricher';
import { Extractor } from './services/extractor';
import { GeminiGenerator } from './services/gemini';
import { ReceiptPipeline } from './services/pipeline';
import { GoogleSheetsLedger } from './services/sheets';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('main');

async function main(): Promise<void> {
    loadEnvFile();
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const client = createDiscordClient();
    const chat = new DiscordChat(client.channels);

    const extractor = new Extractor(
        new GeminiGenerator({
            apiKey: config.gemini.apiKey,
            model: config.gemini.extractionModel,
            timeoutMs: config.gemini.timeoutMs,
        }),
        config.extraction,
    );
    const enricher = new Enricher(
        new GeminiGenerator({
            apiKey: config.gemini.apiKey,
            model: config.gemini.insightsModel,
            timeoutMs: config.gemini.timeoutMs,
        }),
    );

    const pipeline = new ReceiptPipeline({
        extractor,
        enricher,
        ledger: new GoogleSheetsLedger(config.sheets),
        chat,
        reportChatId: config.discord.reportChannelId,
    });

    const bot = new ExpenseBot(client, pipeline, chat, config.discord);

    const shutdown = (signal: string) => {
        log.info('Shutting down', { signal });
        bot.stop().then(
            () => process.exit(0),
            error => {
                log.error('Error during shutdown', { error: describeError(error) });
                process.exit(1);
            },
        );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    log.info('Starting expense bot');
    await bot.start();
}

main().catch(error => {
    log.error('Fatal startup error', { error: describeError(error) });
    process.exit(1);
});
