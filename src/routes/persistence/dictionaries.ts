import { Router } from 'express';
import Container from 'typedi';
import { parseId, sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { DictionaryService } from '../../services/persistence/DictionaryService';
import {
    createDictionarySchema,
    dictionaryValueSchema,
    listDictionariesQuerySchema,
    updateDictionarySchema
} from '../../validation/dictionary.schemas';

const router = Router();

// GET /api/dictionaries?project_id=&keyword=&page=&page_size=
router.get('/', async (req, res) => {
    try {
        const query = listDictionariesQuerySchema.parse(req.query);
        res.json(await Container.get(DictionaryService).list(query));
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/', async (req, res) => {
    try {
        const input = createDictionarySchema.parse(req.body);
        res.status(201).json(await Container.get(DictionaryService).create(input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/code/:code', async (req, res) => {
    try {
        res.json(await Container.get(DictionaryService).getByCode(req.params.code));
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/values/:valueId', async (req, res) => {
    try {
        await Container.get(DictionaryService).deleteValue(parseId(req.params.valueId, 'value id'), requireUser(req));
        res.status(204).end();
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id', async (req, res) => {
    try {
        res.json(await Container.get(DictionaryService).get(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.put('/:id', async (req, res) => {
    try {
        const input = updateDictionarySchema.parse(req.body);
        res.json(await Container.get(DictionaryService).update(parseId(req.params.id), input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id', async (req, res) => {
    try {
        await Container.get(DictionaryService).delete(parseId(req.params.id), requireUser(req));
        res.status(204).end();
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id/values', async (req, res) => {
    try {
        res.json(await Container.get(DictionaryService).listValues(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/:id/values', async (req, res) => {
    try {
        const input = dictionaryValueSchema.parse(req.body);
        res.status(201).json(await Container.get(DictionaryService).addValue(parseId(req.params.id), input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

export const dictionariesRouter = router;
