import { guessMimeType, imageExtensionFor, isImageFile, isPdfFile, sanitizeFilename } from './fileTypes';

describe('file type checks', () => {
    it('recognises PDFs by extension or MIME type', () => {
        expect(isPdfFile('Spec.PDF')).toBe(true);
        expect(isPdfFile('blob', 'application/pdf')).toBe(true);
        expect(isPdfFile('notes.txt', 'text/plain')).toBe(false);
    });

    it('recognises images by MIME type only', () => {
        expect(isImageFile('image/png')).toBe(true);
        expect(isImageFile('application/octet-stream')).toBe(false);
        expect(isImageFile(null)).toBe(false);
    });

    it('guesses MIME types from extensions', () => {
        expect(guessMimeType('a.jpeg')).toBe('image/jpeg');
        expect(guessMimeType('a.unknown')).toBeNull();
        expect(imageExtensionFor('image/webp')).toBe('.webp');
        expect(imageExtensionFor('image/x-icon')).toBe('.png');
    });
});

describe('sanitizeFilename', () => {
    it('keeps only the last path segment', () => {
        expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
        expect(sanitizeFilename('C:\\temp\\接口文档.pdf')).toBe('接口文档.pdf');
    });

    it('replaces reserved characters and whitespace', () => {
        expect(sanitizeFilename('my "spec" v1?.pdf')).toBe('my__spec__v1_.pdf');
        expect(sanitizeFilename('.hidden')).toBe('hidden');
        expect(sanitizeFilename('')).toBe('file');
    });

    it('shortens long names and keeps the extension', () => {
        const name = sanitizeFilename(`${'a'.repeat(300)}.pdf`);
        expect(name).toHaveLength(120);
        expect(name.endsWith('.pdf')).toBe(true);
    });
});
