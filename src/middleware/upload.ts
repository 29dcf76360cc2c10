import { RequestHandler } from 'express';
import multer from 'multer';
import Container from 'typedi';
import { APP_CONFIG } from '../lib/container';
import type { UploadedFile } from '../types/attachment.types';

export const MAX_FILES_PER_REQUEST = 20;

function uploader(): multer.Multer {
    const { maxUploadBytes } = Container.get(APP_CONFIG);
    return multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: maxUploadBytes,
            files: MAX_FILES_PER_REQUEST,
            // clipboard_data carries a base64 image in a text field
            fieldSize: Math.ceil(maxUploadBytes * 4 / 3) + 1024
        }
    });
}

export const singleFile = (field: string): RequestHandler => (req, res, next) => {
    uploader().single(field)(req, res, next);
};

export const fileArray = (field: string): RequestHandler => (req, res, next) => {
    uploader().array(field, MAX_FILES_PER_REQUEST)(req, res, next);
};

/**
 * Busboy decodes multipart filenames as latin1; UTF-8 names (Chinese file
 * names in particular) need re-decoding.
 */
export function decodeFilename(name: string): string {
    const decoded = Buffer.from(name, 'latin1').toString('utf8');
    return decoded.includes('\uFFFD') ? name : decoded;
}

export function toUploadedFile(file: Express.Multer.File): UploadedFile {
    return {
        originalName: decodeFilename(file.originalname),
        mimeType: file.mimetype,
        buffer: file.buffer
    };
}

export function uploadedFiles(files: Express.Multer.File[] | { [field: string]: Express.Multer.File[] } | undefined): UploadedFile[] {
    if (!files) return [];
    const list = Array.isArray(files) ? files : Object.values(files).flat();
    return list.map(toUploadedFile);
}
