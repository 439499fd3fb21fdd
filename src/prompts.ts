// src/prompts.ts
import type { VendorAlias } from './config';
import { EXPENSE_CATEGORIES, type ReceiptRecord } from './types';

export interface NotePromptOptions {
    currency?: string;
    vendorAliases?: VendorAlias[];
}

const DEFAULT_ALIAS: VendorAlias = { alias: 'SM', name: 'SM Supermarket' };

export function buildImagePrompt(referenceDate: string): string {
    return `Analyze this receipt image and extract the vendor name, date, line items, and the final total amount. Format the output according to the provided JSON schema.
If the receipt does not show a date, use ${referenceDate}. Write the date in YYYY-MM-DD format.`;
}

export function buildNotePrompt(noteText: string, referenceDate: string, options: NotePromptOptions = {}): string {
    const aliases = [DEFAULT_ALIAS, ...(options.vendorAliases ?? []).filter(a => a.alias !== DEFAULT_ALIAS.alias)];
    const aliasExamples = aliases.map(a => `'${a.alias}' means '${a.name}'`).join(', ');
    const currencyLine = options.currency ? `\n- Prices are in ${options.currency}.` : '';

    return `
You are an expert data entry assistant. Analyze the following unstructured shopping note and convert it into a structured receipt format based on the provided JSON schema.

- Today's date is ${referenceDate}. Use this if no other date is mentioned.${currencyLine}
- Infer the vendor if possible (e.g., ${aliasExamples}). If the store cannot be inferred, use 'General Store'.
- Keep the total if the note states one. Otherwise calculate the total by summing the item amounts.
- Assume a quantity of 1 for items unless specified otherwise.

Here is the note:
---
${noteText}
---
`;
}

export function getCategoryPromptString(): string {
    return EXPENSE_CATEGORIES.join(', ');
}

export function buildInsightsPrompt(record: ReceiptRecord): string {
    return `
Based on the following receipt data, please perform two tasks:
1.  Categorize this expense into one of the following common business categories: ${getCategoryPromptString()}.
2.  Write a concise, one-sentence expense memo describing the purchase.

Receipt Data:
${JSON.stringify(record, null, 2)}

Provide the output as a JSON object with two keys: "category" and "memo".
`;
}
