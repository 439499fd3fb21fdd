// src/services/sheets.ts
import { google, type sheets_v4 } from 'googleapis';
import type { RowAppender } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('sheets');

export interface SheetsOptions {
    spreadsheetId: string;
    range: string;
    keyFile: string;
}

export class GoogleSheetsLedger implements RowAppender {
    private readonly sheets: sheets_v4.Sheets;

    constructor(private readonly options: SheetsOptions) {
        this.sheets = google.sheets({
            version: 'v4',
            auth: new google.auth.GoogleAuth({
                keyFile: options.keyFile,
                scopes: ['https://www.googleapis.com/auth/spreadsheets'],
            }),
        });
    }

    async appendRow(values: string[]): Promise<void> {
        await this.sheets.spreadsheets.values.append({
            spreadsheetId: this.options.spreadsheetId,
            range: this.options.range,
            valueInputOption: 'USER_ENTERED',
            requestBody: {
                values: [values],
            },
        });
        log.info('Google Sheet updated', { range: this.options.range });
    }
}
