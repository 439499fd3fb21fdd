// src/types.ts
import type { ResponseSchema } from '@google/generative-ai';

// One purchased entry on a receipt. Amounts stay as text because receipts
// and notes format them inconsistently.
export interface LineItem {
    description: string;
    amount: string;
    quantity?: number;
}

// Structured purchase as returned by the extraction step
export interface ReceiptRecord {
    vendor_name: string;
    receipt_date: string; // YYYY-MM-DD
    total_amount: string;
    line_items?: LineItem[];
}

export const EXPENSE_CATEGORIES = [
    'Food & Dining',
    'Travel',
    'Office Supplies',
    'Transportation',
    'Utilities',
    'Other',
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

// Only ever produced as a fallback, never offered to the model
export const UNCATEGORIZED = 'Uncategorized';

export interface Insights {
    category: ExpenseCategory | typeof UNCATEGORIZED;
    memo: string;
}

export type FinalRecord = ReceiptRecord & Insights;

export interface ImageInput {
    data: Buffer;
    mimeType?: string;
}

export type ChatEvent =
    | { kind: 'photo'; image: ImageInput }
    | { kind: 'text'; text: string };

export type MessageFormat = 'plain' | 'markdown';

// --- Collaborators ---

export interface TextGenerator {
    /**
     * When `schema` is given the returned text must be JSON conforming to it.
     */
    generate(prompt: string, image?: Required<ImageInput>, schema?: ResponseSchema): Promise<string>;
}

export interface ChatSender {
    send(chatId: string, text: string, format: MessageFormat): Promise<void>;
}

export interface RowAppender {
    appendRow(values: string[]): Promise<void>;
}
