import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ReceiptRecord } from '../types';
import { CannedGenerator } from './canned-generator';
import { Enricher, FALLBACK_INSIGHTS, normalizeCategory, stripCodeFences } from './enricher';

const record: ReceiptRecord = {
    vendor_name: 'SM Supermarket',
    receipt_date: '2024-03-01',
    total_amount: '90',
    line_items: [
        { description: 'milk', quantity: 1, amount: '50' },
        { description: 'bread', quantity: 1, amount: '40' },
    ],
};

describe('stripCodeFences', () => {
    it('removes json fences and surrounding whitespace', () => {
        expect(stripCodeFences('  ```json\n{"a":1}\n```  ')).toBe('{"a":1}');
        expect(stripCodeFences('```\n{"a":1}\n```')).toBe('{"a":1}');
        expect(stripCodeFences('{"a":1}')).toBe('{"a":1}');
    });
});

describe('normalizeCategory', () => {
    it('maps case variants onto the canonical name', () => {
        expect(normalizeCategory('food & dining')).toBe('Food & Dining');
        expect(normalizeCategory(' UTILITIES ')).toBe('Utilities');
    });

    it('coerces unknown categories to Other', () => {
        expect(normalizeCategory('Groceries')).toBe('Other');
        expect(normalizeCategory('')).toBe('Other');
    });

    it('coerces non-string categories to Other', () => {
        expect(normalizeCategory(null)).toBe('Other');
        expect(normalizeCategory(undefined)).toBe('Other');
        expect(normalizeCategory(42)).toBe('Other');
    });
});

describe('Enricher', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    it('parses a fenced response into insights', async () => {
        const generator = new CannedGenerator([
            '```json\n{"category": "Food & Dining", "memo": "Groceries at SM Supermarket."}\n```',
        ]);

        await expect(new Enricher(generator).enrich(record)).resolves.toEqual({
            category: 'Food & Dining',
            memo: 'Groceries at SM Supermarket.',
        });
    });

    it('embeds the serialised record without a schema or image', async () => {
        const generator = new CannedGenerator([{ category: 'Food & Dining', memo: 'Groceries.' }]);
        await new Enricher(generator).enrich(record);

        const [call] = generator.calls;
        expect(call.prompt).toContain(JSON.stringify(record, null, 2));
        expect(call.prompt).toContain(
            'Food & Dining, Travel, Office Supplies, Transportation, Utilities, Other',
        );
        expect(call.schema).toBeUndefined();
        expect(call.image).toBeUndefined();
    });

    it('coerces an out-of-vocabulary category to Other', async () => {
        const generator = new CannedGenerator([{ category: 'Groceries', memo: 'Weekly groceries.' }]);

        await expect(new Enricher(generator).enrich(record)).resolves.toEqual({
            category: 'Other',
            memo: 'Weekly groceries.',
        });
    });

    it('keeps the memo when the category is null or missing', async () => {
        const generator = new CannedGenerator(['{"category": null, "memo": "Lunch."}', { memo: 'Taxi to the office.' }]);
        const enricher = new Enricher(generator);

        await expect(enricher.enrich(record)).resolves.toEqual({ category: 'Other', memo: 'Lunch.' });
        await expect(enricher.enrich(record)).resolves.toEqual({ category: 'Other', memo: 'Taxi to the office.' });
    });

    it('falls back when the generator fails', async () => {
        const generator = new CannedGenerator([new Error('fetch failed')]);

        await expect(new Enricher(generator).enrich(record)).resolves.toEqual(FALLBACK_INSIGHTS);
    });

    it('falls back on unparseable or incomplete responses', async () => {
        const generator = new CannedGenerator(['I think this is food.', { category: 'Travel' }, { category: 'Travel', memo: '  ' }]);
        const enricher = new Enricher(generator);

        await expect(enricher.enrich(record)).resolves.toEqual(FALLBACK_INSIGHTS);
        await expect(enricher.enrich(record)).resolves.toEqual(FALLBACK_INSIGHTS);
        await expect(enricher.enrich(record)).resolves.toEqual(FALLBACK_INSIGHTS);
    });

    it('handles degenerate records', async () => {
        const empty: ReceiptRecord = { vendor_name: '', receipt_date: '2024-03-01', total_amount: '0', line_items: [] };
        const generator = new CannedGenerator([new Error('400 Bad Request')]);

        await expect(new Enricher(generator).enrich(empty)).resolves.toEqual({
            category: 'Uncategorized',
            memo: 'Could not generate memo.',
        });
    });
});
