// src/services/enricher.ts
import { describeError, EnrichmentError } from '../errors';
import { buildInsightsPrompt } from '../prompts';
import { rawInsights } from '../schemas';
import { EXPENSE_CATEGORIES, UNCATEGORIZED, type ExpenseCategory, type Insights, type ReceiptRecord, type TextGenerator } from '../types';
import { attempt, recover } from '../utils/result';
import { createLogger } from '../utils/logger';

const log = createLogger('enricher');

export const FALLBACK_INSIGHTS: Insights = Object.freeze({
    category: UNCATEGORIZED,
    memo: 'Could not generate memo.',
});

// Model output is often wrapped in a fenced code block
export function stripCodeFences(text: string): string {
    return text.trim().replaceAll('```json', '').replaceAll('```', '').trim();
}

export function normalizeCategory(category: unknown): ExpenseCategory {
    if (typeof category !== 'string') return 'Other';
    const wanted = category.trim().toLowerCase();
    return EXPENSE_CATEGORIES.find(name => name.toLowerCase() === wanted) ?? 'Other';
}

export function parseInsights(text: string): Insights {
    const parsed = rawInsights.parse(JSON.parse(stripCodeFences(text)));
    return { category: normalizeCategory(parsed.category), memo: parsed.memo };
}

export class Enricher {
    constructor(private readonly generator: TextGenerator) {}

    /** Never rejects: any failure degrades to {@link FALLBACK_INSIGHTS}. */
    async enrich(record: ReceiptRecord): Promise<Insights> {
        const result = await attempt(
            async () => parseInsights(await this.generator.generate(buildInsightsPrompt(record))),
            cause => new EnrichmentError(cause),
        );
        if (result.ok) {
            log.info('Generated insights', { category: result.value.category });
        } else {
            log.warn('Falling back to default insights', { error: describeError(result.error) });
        }
        return recover(result, FALLBACK_INSIGHTS);
    }
}
