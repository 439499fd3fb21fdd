// src/config.ts
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
    .string()
    .optional()
    .transform(str => (str && str.trim() !== '' ? str.trim() : undefined));

const positiveInt = (fallback: number) =>
    z
        .string()
        .optional()
        .transform((str, ctx) => {
            if (!str) return fallback;
            const value = Number(str);
            if (!Number.isInteger(value) || value <= 0) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive integer, got "${str}"` });
                return z.NEVER;
            }
            return value;
        });

export interface VendorAlias {
    alias: string;
    name: string;
}

// "SM=SM Supermarket;7E=7-Eleven"
export function parseVendorAliases(raw: string | undefined): VendorAlias[] {
    if (!raw) return [];
    return raw
        .split(';')
        .map(pair => pair.split('='))
        .filter(parts => parts.length === 2 && parts[0].trim() !== '' && parts[1].trim() !== '')
        .map(([alias, name]) => ({ alias: alias.trim(), name: name.trim() }));
}

// Accepts either a bare spreadsheet ID or the full sheet URL
export function getSpreadsheetId(value: string): string {
    const match = value.match(/\/d\/([a-zA-Z0-9_-]+)/);
    return match ? match[1] : value;
}

const envSchema = z.object({
    GEMINI_API_KEY: z.string().min(1),
    GEMINI_EXTRACTION_MODEL: z.string().default('gemini-2.0-flash'),
    GEMINI_INSIGHTS_MODEL: z.string().default('gemini-2.0-flash'),
    GEMINI_TIMEOUT_MS: positiveInt(60_000),
    DISCORD_BOT_TOKEN: z.string().min(1),
    DISCORD_CLIENT_ID: z.string().min(1),
    DISCORD_GUILD_ID: optionalString,
    REPORT_CHANNEL_ID: optionalString,
    GOOGLE_SHEET_ID: z.string().min(1).transform(getSpreadsheetId),
    GOOGLE_SHEET_RANGE: z.string().default('Sheet1!A1'),
    GOOGLE_SERVICE_ACCOUNT_FILE: z.string().default('credentials.json'),
    EXPENSE_CURRENCY: optionalString,
    VENDOR_ALIASES: z.string().optional().transform(parseVendorAliases),
    // 5MB
    MAX_IMAGE_BYTES: positiveInt(5_242_880),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
    gemini: {
        apiKey: string;
        extractionModel: string;
        insightsModel: string;
        timeoutMs: number;
    };
    discord: {
        token: string;
        clientId: string;
        guildId?: string;
        reportChannelId?: string;
        maxImageBytes: number;
    };
    sheets: {
        spreadsheetId: string;
        range: string;
        keyFile: string;
    };
    extraction: {
        currency?: string;
        vendorAliases: VendorAlias[];
    };
    logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    const vars = parsed.data;
    return {
        gemini: {
            apiKey: vars.GEMINI_API_KEY,
            extractionModel: vars.GEMINI_EXTRACTION_MODEL,
            insightsModel: vars.GEMINI_INSIGHTS_MODEL,
            timeoutMs: vars.GEMINI_TIMEOUT_MS,
        },
        discord: {
            token: vars.DISCORD_BOT_TOKEN,
            clientId: vars.DISCORD_CLIENT_ID,
            guildId: vars.DISCORD_GUILD_ID,
            reportChannelId: vars.REPORT_CHANNEL_ID,
            maxImageBytes: vars.MAX_IMAGE_BYTES,
        },
        sheets: {
            spreadsheetId: vars.GOOGLE_SHEET_ID,
            range: vars.GOOGLE_SHEET_RANGE,
            keyFile: vars.GOOGLE_SERVICE_ACCOUNT_FILE,
        },
        extraction: {
            currency: vars.EXPENSE_CURRENCY,
            vendorAliases: vars.VENDOR_ALIASES,
        },
        logLevel: vars.LOG_LEVEL,
    };
}

export function loadEnvFile(): void {
    dotenv.config({ path: process.env.DOTENV_PATH });
}
