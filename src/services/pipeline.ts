// src/services/pipeline.ts
import { describeError, ExtractionError, NotificationError, PersistenceError } from '../errors';
import { formatReceiptSummary, toSheetRow } from '../format';
import type { ChatEvent, ChatSender, FinalRecord, ImageInput, MessageFormat, ReceiptRecord, RowAppender } from '../types';
import { attempt } from '../utils/result';
import { createLogger } from '../utils/logger';
import type { Enricher } from './enricher';
import type { Extractor } from './extractor';

const log = createLogger('pipeline');

export type PipelineStage =
    | 'RECEIVED'
    | 'EXTRACTING'
    | 'EXTRACTED'
    | 'ENRICHING'
    | 'ENRICHED'
    | 'PERSISTING'
    | 'NOTIFYING'
    | 'DONE'
    | 'ERROR';

export type StageListener = (stage: PipelineStage, chatId: string) => void;

export type PipelineOutcome =
    | { status: 'done'; record: FinalRecord }
    | { status: 'error'; error: ExtractionError }
    | { status: 'ignored' };

export const MESSAGES = {
    photoReceived: 'Receipt photo received! Processing...',
    noteReceived: 'Note received! Converting to receipt format...',
    photoFailed: "Sorry, I couldn't process that receipt photo. Please try again.",
    noteFailed: "Sorry, I couldn't understand that note. Please try formatting it a bit more clearly.",
} as const;

export interface PipelineDeps {
    extractor: Extractor;
    enricher: Enricher;
    ledger: RowAppender;
    chat: ChatSender;
    // Summaries go here instead of the originating chat when set
    reportChatId?: string;
    onStage?: StageListener;
}

interface Intake {
    source: 'photo' | 'note';
    ack: string;
    failure: string;
    extract: () => Promise<ReceiptRecord>;
}

export class ReceiptPipeline {
    constructor(private readonly deps: PipelineDeps) {}

    handle(chatId: string, event: ChatEvent): Promise<PipelineOutcome> {
        return event.kind === 'photo' ? this.handleImage(chatId, event.image) : this.handleNote(chatId, event.text);
    }

    handleImage(chatId: string, image: ImageInput): Promise<PipelineOutcome> {
        return this.run(chatId, {
            source: 'photo',
            ack: MESSAGES.photoReceived,
            failure: MESSAGES.photoFailed,
            extract: () => this.deps.extractor.fromImage(image),
        });
    }

    async handleNote(chatId: string, noteText: string): Promise<PipelineOutcome> {
        const note = noteText.trim();
        if (!note) return { status: 'ignored' };
        return this.run(chatId, {
            source: 'note',
            ack: MESSAGES.noteReceived,
            failure: MESSAGES.noteFailed,
            extract: () => this.deps.extractor.fromNote(note),
        });
    }

    private async run(chatId: string, intake: Intake): Promise<PipelineOutcome> {
        this.enter('RECEIVED', chatId);
        await this.notify(chatId, intake.ack, 'plain');

        this.enter('EXTRACTING', chatId);
        let receipt: ReceiptRecord;
        try {
            receipt = await intake.extract();
        } catch (error) {
            const extractionError =
                error instanceof ExtractionError
                    ? error
                    : new ExtractionError(`Receipt extraction from ${intake.source} failed`, { cause: error });
            this.enter('ERROR', chatId);
            log.error(`Error processing ${intake.source}`, { chatId, error: describeError(extractionError) });
            await this.notify(chatId, intake.failure, 'plain');
            return { status: 'error', error: extractionError };
        }
        this.enter('EXTRACTED', chatId);

        this.enter('ENRICHING', chatId);
        const insights = await this.deps.enricher.enrich(receipt);
        const record: FinalRecord = { ...receipt, ...insights };
        this.enter('ENRICHED', chatId);

        this.enter('PERSISTING', chatId);
        const persisted = await attempt(
            () => this.deps.ledger.appendRow(toSheetRow(record)),
            cause => new PersistenceError(cause),
        );
        if (!persisted.ok) {
            log.error('Error logging receipt to spreadsheet', { chatId, error: describeError(persisted.error) });
        }

        this.enter('NOTIFYING', chatId);
        await this.notify(this.deps.reportChatId ?? chatId, formatReceiptSummary(record), 'markdown');

        this.enter('DONE', chatId);
        return { status: 'done', record };
    }

    private async notify(chatId: string, text: string, format: MessageFormat): Promise<void> {
        const sent = await attempt(
            () => this.deps.chat.send(chatId, text, format),
            cause => new NotificationError(chatId, cause),
        );
        if (!sent.ok) {
            log.error('Error sending chat message', { chatId, error: describeError(sent.error) });
        }
    }

    private enter(stage: PipelineStage, chatId: string): void {
        log.debug('Stage', { chatId, stage });
        this.deps.onStage?.(stage, chatId);
    }
}
