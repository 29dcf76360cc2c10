import { PayloadTooLargeError, ValidationError } from '../lib/errors';
import { decodeClipboardImage } from './clipboard';

describe('decodeClipboardImage', () => {
    const bytes = Buffer.from('fake-image-bytes');

    it('decodes a data URL and keeps its MIME type', () => {
        const file = decodeClipboardImage(`data:image/jpeg;base64,${bytes.toString('base64')}`, 1024, 1700000000000);

        expect(file.originalName).toBe('clipboard_1700000000000.jpg');
        expect(file.mimeType).toBe('image/jpeg');
        expect(file.buffer.equals(bytes)).toBe(true);
    });

    it('treats bare base64 as PNG', () => {
        const file = decodeClipboardImage(bytes.toString('base64'), 1024, 42);

        expect(file.originalName).toBe('clipboard_42.png');
        expect(file.mimeType).toBe('image/png');
    });

    it('rejects text that is not base64', () => {
        expect(() => decodeClipboardImage('hello, world!', 1024)).toThrow(ValidationError);
        expect(() => decodeClipboardImage('data:image/png;base64,', 1024)).toThrow(ValidationError);
    });

    it('rejects images over the size limit', () => {
        expect(() => decodeClipboardImage(bytes.toString('base64'), 4)).toThrow(PayloadTooLargeError);
    });
});
