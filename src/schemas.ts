// src/schemas.ts
// Each contract exists twice: the ResponseSchema sent to Gemini and the zod
// schema that checks what actually came back.
import { SchemaType, type ResponseSchema } from '@google/generative-ai';
import { z } from 'zod';

export const receiptImageSchema: ResponseSchema = {
    type: SchemaType.OBJECT,
    properties: {
        vendor_name: { type: SchemaType.STRING, description: 'The name of the store or vendor.' },
        receipt_date: { type: SchemaType.STRING, description: 'The date on the receipt in YYYY-MM-DD format.' },
        total_amount: { type: SchemaType.STRING, description: 'The final total amount paid.' },
        line_items: {
            type: SchemaType.ARRAY,
            items: {
                type: SchemaType.OBJECT,
                properties: {
                    description: { type: SchemaType.STRING, description: 'Description of the purchased item.' },
                    amount: { type: SchemaType.STRING, description: 'Price of the individual item.' },
                },
                required: ['description', 'amount'],
            },
        },
    },
    required: ['vendor_name', 'receipt_date', 'total_amount'],
};

export const receiptNoteSchema: ResponseSchema = {
    type: SchemaType.OBJECT,
    properties: {
        vendor_name: {
            type: SchemaType.STRING,
            description: "The name of the supermarket or store. Infer this from the note if possible, otherwise use 'General Store'.",
        },
        receipt_date: {
            type: SchemaType.STRING,
            description: 'The date of the purchase in YYYY-MM-DD format.',
        },
        total_amount: {
            type: SchemaType.STRING,
            description: 'The final total amount paid. Calculate this by summing all line items if not explicitly mentioned.',
        },
        line_items: {
            type: SchemaType.ARRAY,
            items: {
                type: SchemaType.OBJECT,
                properties: {
                    description: { type: SchemaType.STRING, description: 'Description of the purchased item.' },
                    quantity: {
                        type: SchemaType.INTEGER,
                        description: 'The quantity of the item purchased, default to 1 if not specified.',
                    },
                    amount: { type: SchemaType.STRING, description: 'Price of the individual item or total for the quantity.' },
                },
                required: ['description', 'amount', 'quantity'],
            },
        },
    },
    required: ['vendor_name', 'receipt_date', 'total_amount', 'line_items'],
};

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');

const imageLineItem = z.object({
    description: z.string(),
    amount: z.string(),
    quantity: z.number().int().optional(),
});

export const imageReceiptRecord = z.object({
    vendor_name: z.string(),
    receipt_date: isoDate,
    total_amount: z.string(),
    line_items: z.array(imageLineItem).optional(),
});

export const noteReceiptRecord = z.object({
    vendor_name: z.string(),
    receipt_date: isoDate,
    total_amount: z.string(),
    line_items: z.array(
        z.object({
            description: z.string(),
            amount: z.string(),
            quantity: z.number().int(),
        }),
    ),
});

// Enrichment is free-form text; category is checked against the vocabulary later
export const rawInsights = z.object({
    category: z.unknown(),
    memo: z.string().trim().min(1),
});
