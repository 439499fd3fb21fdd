// src/services/extractor.ts
import type { ZodType, ZodTypeDef } from 'zod';
import { describeError, ExtractionError } from '../errors';
import { buildImagePrompt, buildNotePrompt, type NotePromptOptions } from '../prompts';
import { imageReceiptRecord, noteReceiptRecord, receiptImageSchema, receiptNoteSchema } from '../schemas';
import type { ImageInput, ReceiptRecord, TextGenerator } from '../types';
import { sniffImageType } from '../utils/image';
import { createLogger } from '../utils/logger';

const log = createLogger('extractor');

// Local calendar date in the process time zone
export function todayIso(now: Date = new Date()): string {
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    return `${now.getFullYear()}-${month}-${day}`;
}

export interface ExtractorOptions extends NotePromptOptions {
    // Reference date for receipts and notes that state none
    today?: () => string;
}

/**
 * Turns a receipt photo or a shopping note into a {@link ReceiptRecord}.
 * One generation call per input, no retries; every failure surfaces as an
 * {@link ExtractionError}.
 */
export class Extractor {
    private readonly today: () => string;

    constructor(
        private readonly generator: TextGenerator,
        private readonly options: ExtractorOptions = {},
    ) {
        this.today = options.today ?? todayIso;
    }

    async fromImage(image: ImageInput): Promise<ReceiptRecord> {
        const mimeType = image.mimeType ?? sniffImageType(image.data);
        if (image.data.length === 0 || !mimeType) {
            throw new ExtractionError('The photo is not a recognised image');
        }
        log.info('Extracting receipt from image', { mimeType, bytes: image.data.length });
        return this.run('image', () =>
            this.generator.generate(buildImagePrompt(this.today()), { data: image.data, mimeType }, receiptImageSchema),
            imageReceiptRecord,
        );
    }

    async fromNote(noteText: string, referenceDate: string = this.today()): Promise<ReceiptRecord> {
        log.info('Converting note to receipt', { length: noteText.length, referenceDate });
        const prompt = buildNotePrompt(noteText, referenceDate, {
            currency: this.options.currency,
            vendorAliases: this.options.vendorAliases,
        });
        return this.run('note', () => this.generator.generate(prompt, undefined, receiptNoteSchema), noteReceiptRecord);
    }

    private async run(
        source: 'image' | 'note',
        call: () => Promise<string>,
        validator: ZodType<ReceiptRecord, ZodTypeDef, unknown>,
    ): Promise<ReceiptRecord> {
        let text: string;
        try {
            text = await call();
        } catch (error) {
            log.error('Generation failed during extraction', { source, error: describeError(error) });
            throw new ExtractionError(`Receipt extraction from ${source} failed`, { cause: error });
        }

        let payload: unknown;
        try {
            payload = JSON.parse(text);
        } catch (error) {
            throw new ExtractionError(`Receipt extraction from ${source} returned invalid JSON`, { cause: error });
        }

        const parsed = validator.safeParse(payload);
        if (!parsed.success) {
            throw new ExtractionError(`Receipt extraction from ${source} did not match the receipt schema`, {
                cause: parsed.error,
            });
        }
        log.info('Extracted receipt', { source, vendor: parsed.data.vendor_name, total: parsed.data.total_amount });
        return parsed.data;
    }
}
