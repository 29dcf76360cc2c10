import { Router } from 'express';
import Container from 'typedi';
import { parseId, sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { InterfaceService } from '../../services/persistence/InterfaceService';
import {
    createInterfaceSchema,
    listInterfacesQuerySchema,
    searchInterfacesSchema,
    updateInterfaceSchema
} from '../../validation/interface.schemas';

const router = Router();

// GET /api/interfaces?project_id=&page=&page_size=
router.get('/', async (req, res) => {
    try {
        const query = listInterfacesQuerySchema.parse(req.query);
        res.json(await Container.get(InterfaceService).list(query));
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/search', async (req, res) => {
    try {
        const input = searchInterfacesSchema.parse(req.body ?? {});
        res.json(await Container.get(InterfaceService).search(input));
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/code/:code', async (req, res) => {
    try {
        res.json(await Container.get(InterfaceService).getByCode(req.params.code));
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/', async (req, res) => {
    try {
        const input = createInterfaceSchema.parse(req.body);
        res.status(201).json(await Container.get(InterfaceService).create(input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id', async (req, res) => {
    try {
        res.json(await Container.get(InterfaceService).get(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.put('/:id', async (req, res) => {
    try {
        const input = updateInterfaceSchema.parse(req.body);
        res.json(await Container.get(InterfaceService).update(parseId(req.params.id), input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id', async (req, res) => {
    try {
        await Container.get(InterfaceService).delete(parseId(req.params.id), requireUser(req));
        res.status(204).end();
    } catch (error) {
        sendError(res, error);
    }
});

export const interfacesRouter = router;
