// src/utils/image.ts

const SIGNATURES: { mimeType: string; matches: (data: Buffer) => boolean }[] = [
    { mimeType: 'image/png', matches: data => data.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) },
    { mimeType: 'image/jpeg', matches: data => data.subarray(0, 3).equals(Buffer.from([0xff, 0xd8, 0xff])) },
    { mimeType: 'image/gif', matches: data => data.subarray(0, 4).toString('latin1') === 'GIF8' },
    {
        mimeType: 'image/webp',
        matches: data => data.subarray(0, 4).toString('latin1') === 'RIFF' && data.subarray(8, 12).toString('latin1') === 'WEBP',
    },
];

/** Detects the image type from its leading bytes; `undefined` when unrecognised. */
export function sniffImageType(data: Buffer): string | undefined {
    return SIGNATURES.find(signature => signature.matches(data))?.mimeType;
}

export function isImageMimeType(mimeType: string | null | undefined): mimeType is string {
    return !!mimeType && mimeType.startsWith('image/');
}
