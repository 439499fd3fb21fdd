import { describe, expect, it } from 'vitest';
import { PNG_BYTES } from '../testing/fakes';
import { isImageMimeType, sniffImageType } from './image';

describe('sniffImageType', () => {
    it('recognises common receipt photo formats', () => {
        expect(sniffImageType(PNG_BYTES)).toBe('image/png');
        expect(sniffImageType(Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00]))).toBe('image/jpeg');
        expect(sniffImageType(Buffer.from('GIF89a', 'latin1'))).toBe('image/gif');
        expect(sniffImageType(Buffer.from('RIFF\x00\x00\x00\x00WEBPVP8 ', 'latin1'))).toBe('image/webp');
    });

    it('returns undefined for anything else', () => {
        expect(sniffImageType(Buffer.from('hello world'))).toBeUndefined();
        expect(sniffImageType(Buffer.alloc(0))).toBeUndefined();
    });
});

describe('isImageMimeType', () => {
    it('only accepts image types', () => {
        expect(isImageMimeType('image/jpeg')).toBe(true);
        expect(isImageMimeType('application/pdf')).toBe(false);
        expect(isImageMimeType(null)).toBe(false);
    });
});
