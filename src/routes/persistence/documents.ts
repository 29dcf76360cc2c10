import { Router } from 'express';
import Container from 'typedi';
import { ValidationError } from '../../lib/errors';
import { parseId, sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { fileArray, singleFile, toUploadedFile, uploadedFiles } from '../../middleware/upload';
import { DocumentService } from '../../services/persistence/DocumentService';
import {
    attachmentUploadSchema,
    createDocumentSchema,
    listDocumentsQuerySchema,
    updateDocumentSchema
} from '../../validation/document.schemas';

const router = Router();

// GET /api/documents?keyword=&document_type=&region=&person=&page=&page_size=
router.get('/', async (req, res) => {
    try {
        const query = listDocumentsQuerySchema.parse(req.query);
        res.json(await Container.get(DocumentService).list(query));
    } catch (error) {
        sendError(res, error);
    }
});

// Multipart: metadata fields plus files[] or clipboard_data
router.post('/', fileArray('files'), async (req, res) => {
    try {
        const input = createDocumentSchema.parse(req.body);
        const document = await Container.get(DocumentService)
            .create(input, uploadedFiles(req.files), requireUser(req));
        res.status(201).json(document);
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id', async (req, res) => {
    try {
        res.json(await Container.get(DocumentService).get(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.put('/:id', async (req, res) => {
    try {
        const input = updateDocumentSchema.parse(req.body);
        res.json(await Container.get(DocumentService).update(parseId(req.params.id), input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id', async (req, res) => {
    try {
        await Container.get(DocumentService).delete(parseId(req.params.id), requireUser(req));
        res.status(204).end();
    } catch (error) {
        sendError(res, error);
    }
});

// POST /api/documents/:id/attachments (multipart "file", optional "category")
router.post('/:id/attachments', singleFile('file'), async (req, res) => {
    try {
        if (!req.file) throw new ValidationError('No file uploaded (field "file")');
        const { category } = attachmentUploadSchema.parse(req.body ?? {});
        const attachments = await Container.get(DocumentService)
            .addAttachment(parseId(req.params.id), toUploadedFile(req.file), requireUser(req), category);
        res.json({ attachments });
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id/attachments/:storedFilename', async (req, res) => {
    try {
        const attachments = await Container.get(DocumentService)
            .removeAttachment(parseId(req.params.id), req.params.storedFilename, requireUser(req));
        res.json({ attachments });
    } catch (error) {
        sendError(res, error);
    }
});

export const documentsRouter = router;
