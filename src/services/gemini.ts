// src/services/gemini.ts
import { GoogleGenerativeAI, type GenerativeModel, type Part, type ResponseSchema } from '@google/generative-ai';
import type { ImageInput, TextGenerator } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('gemini');

export interface GeminiOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
}

export class GeminiGenerator implements TextGenerator {
    private readonly model: GenerativeModel;

    constructor(private readonly options: GeminiOptions) {
        const genAI = new GoogleGenerativeAI(options.apiKey);
        this.model = genAI.getGenerativeModel({ model: options.model }, { timeout: options.timeoutMs });
    }

    async generate(prompt: string, image?: Required<ImageInput>, schema?: ResponseSchema): Promise<string> {
        const parts: Part[] = [];
        if (image) {
            parts.push({
                inlineData: {
                    data: image.data.toString('base64'),
                    mimeType: image.mimeType,
                },
            });
        }
        parts.push({ text: prompt });

        log.debug('Calling Gemini', { model: this.options.model, promptLength: prompt.length, withImage: !!image, withSchema: !!schema });
        const result = await this.model.generateContent({
            contents: [{ role: 'user', parts }],
            generationConfig: schema ? { responseMimeType: 'application/json', responseSchema: schema } : undefined,
        });
        return result.response.text();
    }
}
