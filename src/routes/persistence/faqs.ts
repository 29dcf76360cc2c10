import { Router } from 'express';
import Container from 'typedi';
import { ValidationError } from '../../lib/errors';
import { parseId, sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { fileArray, singleFile, toUploadedFile, uploadedFiles } from '../../middleware/upload';
import { FaqService } from '../../services/persistence/FaqService';
import { createFaqSchema, listFaqsQuerySchema, updateFaqSchema } from '../../validation/document.schemas';

const router = Router();

// GET /api/faqs?keyword=&module=&person=&content_type=&page=&page_size=
router.get('/', async (req, res) => {
    try {
        const query = listFaqsQuerySchema.parse(req.query);
        res.json(await Container.get(FaqService).list(query));
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/', fileArray('files'), async (req, res) => {
    try {
        const input = createFaqSchema.parse(req.body);
        const faq = await Container.get(FaqService).create(input, uploadedFiles(req.files), requireUser(req));
        res.status(201).json(faq);
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id', async (req, res) => {
    try {
        res.json(await Container.get(FaqService).get(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.put('/:id', async (req, res) => {
    try {
        const input = updateFaqSchema.parse(req.body);
        res.json(await Container.get(FaqService).update(parseId(req.params.id), input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id', async (req, res) => {
    try {
        await Container.get(FaqService).delete(parseId(req.params.id), requireUser(req));
        res.status(204).end();
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/:id/attachments', singleFile('file'), async (req, res) => {
    try {
        if (!req.file) throw new ValidationError('No file uploaded (field "file")');
        const attachments = await Container.get(FaqService)
            .addAttachment(parseId(req.params.id), toUploadedFile(req.file), requireUser(req));
        res.json({ attachments });
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id/attachments/:storedFilename', async (req, res) => {
    try {
        const attachments = await Container.get(FaqService)
            .removeAttachment(parseId(req.params.id), req.params.storedFilename, requireUser(req));
        res.json({ attachments });
    } catch (error) {
        sendError(res, error);
    }
});

export const faqsRouter = router;
