// src/format.ts
import { escapeMarkdown } from 'discord.js';
import type { FinalRecord, LineItem } from './types';

// Column order of the expense sheet
export function toSheetRow(record: FinalRecord): string[] {
    return [record.receipt_date, record.vendor_name, record.total_amount, record.category, record.memo];
}

function formatLineItem(item: LineItem): string {
    const quantity = item.quantity === undefined ? '' : ` ×${item.quantity}`;
    return `• ${escapeMarkdown(item.description)}${quantity} — ${escapeMarkdown(item.amount)}`;
}

export function formatReceiptSummary(record: FinalRecord): string {
    const lines = [
        '🧾 **New Receipt Processed!**',
        '',
        `**Vendor:** ${escapeMarkdown(record.vendor_name)}`,
        `**Date:** ${escapeMarkdown(record.receipt_date)}`,
        `**Total:** ${escapeMarkdown(record.total_amount)}`,
        `**Category:** ${escapeMarkdown(record.category)}`,
        '',
        `**Memo:** _${escapeMarkdown(record.memo)}_`,
    ];
    const items = record.line_items ?? [];
    if (items.length > 0) {
        lines.push('', '**Items:**', ...items.map(formatLineItem));
    }
    return lines.join('\n');
}

export const WELCOME_MESSAGE = `Hello! I'm your expense bot.

➡️ Send me a photo of a receipt to process it.
➡️ Send me a text note of your purchases to convert it into a receipt.`;
