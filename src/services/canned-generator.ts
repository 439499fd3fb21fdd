// src/services/canned-generator.ts
import type { ResponseSchema } from '@google/generative-ai';
import type { ImageInput, TextGenerator } from '../types';

export interface GenerateCall {
    prompt: string;
    image?: Required<ImageInput>;
    schema?: ResponseSchema;
}

export type CannedResponse = string | object | Error;

/**
 * Deterministic stand-in for a model: replays queued responses in order and
 * records every call. Objects are serialised to JSON; errors are thrown.
 */
export class CannedGenerator implements TextGenerator {
    readonly calls: GenerateCall[] = [];
    private readonly queue: CannedResponse[];

    constructor(responses: CannedResponse[] = []) {
        this.queue = [...responses];
    }

    enqueue(...responses: CannedResponse[]): this {
        this.queue.push(...responses);
        return this;
    }

    async generate(prompt: string, image?: Required<ImageInput>, schema?: ResponseSchema): Promise<string> {
        this.calls.push({ prompt, image, schema });
        const next = this.queue.shift();
        if (next === undefined) {
            throw new Error('CannedGenerator has no response queued');
        }
        if (next instanceof Error) throw next;
        return typeof next === 'string' ? next : JSON.stringify(next);
    }
}
