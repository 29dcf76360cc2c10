import { Router } from 'express';
import Container from 'typedi';
import { ValidationError } from '../../lib/errors';
import { parseId, sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { singleFile, toUploadedFile } from '../../middleware/upload';
import { DictionaryService } from '../../services/persistence/DictionaryService';
import { InterfaceService } from '../../services/persistence/InterfaceService';
import { ProjectService } from '../../services/persistence/ProjectService';
import { createProjectSchema, listProjectsQuerySchema, updateProjectSchema } from '../../validation/project.schemas';

const router = Router();

// GET /api/projects?keyword=&page=&page_size=
router.get('/', async (req, res) => {
    try {
        const query = listProjectsQuerySchema.parse(req.query);
        res.json(await Container.get(ProjectService).list(query));
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/', async (req, res) => {
    try {
        const input = createProjectSchema.parse(req.body);
        res.status(201).json(await Container.get(ProjectService).create(input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id', async (req, res) => {
    try {
        res.json(await Container.get(ProjectService).get(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.put('/:id', async (req, res) => {
    try {
        const input = updateProjectSchema.parse(req.body);
        res.json(await Container.get(ProjectService).update(parseId(req.params.id), input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id', async (req, res) => {
    try {
        await Container.get(ProjectService).delete(parseId(req.params.id), requireUser(req));
        res.status(204).end();
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id/interfaces', async (req, res) => {
    try {
        res.json(await Container.get(InterfaceService).listByProject(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id/dictionaries', async (req, res) => {
    try {
        res.json(await Container.get(DictionaryService).listByProject(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

// POST /api/projects/:id/attachments (multipart, field "file")
router.post('/:id/attachments', singleFile('file'), async (req, res) => {
    try {
        if (!req.file) throw new ValidationError('No file uploaded (field "file")');
        const attachments = await Container.get(ProjectService)
            .addAttachment(parseId(req.params.id), toUploadedFile(req.file), requireUser(req));
        res.json({ attachments });
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id/attachments/:storedFilename', async (req, res) => {
    try {
        const attachments = await Container.get(ProjectService)
            .removeAttachment(parseId(req.params.id), req.params.storedFilename, requireUser(req));
        res.json({ attachments });
    } catch (error) {
        sendError(res, error);
    }
});

export const projectsRouter = router;
