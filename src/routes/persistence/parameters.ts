import { Router } from 'express';
import Container from 'typedi';
import { parseId, sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { ParameterService } from '../../services/persistence/ParameterService';
import {
    importCommitSchema,
    importPreviewSchema,
    listParametersQuerySchema,
    parameterFieldsSchema,
    updateParameterSchema
} from '../../validation/parameter.schemas';

const router = Router();

// GET /api/parameters/interface/:interfaceId?param_type=input|output
router.get('/interface/:interfaceId', async (req, res) => {
    try {
        const { param_type } = listParametersQuerySchema.parse(req.query);
        res.json(await Container.get(ParameterService).listForInterface(parseId(req.params.interfaceId), param_type));
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/interface/:interfaceId', async (req, res) => {
    try {
        const input = parameterFieldsSchema.parse(req.body);
        const parameter = await Container.get(ParameterService)
            .create(parseId(req.params.interfaceId), input, requireUser(req));
        res.status(201).json(parameter);
    } catch (error) {
        sendError(res, error);
    }
});

// Parses pasted text without saving anything
router.post('/interface/:interfaceId/import/preview', async (req, res) => {
    try {
        const { text, param_type } = importPreviewSchema.parse(req.body);
        const parameters = await Container.get(ParameterService)
            .previewImport(parseId(req.params.interfaceId), text, param_type);
        res.json({ parameters });
    } catch (error) {
        sendError(res, error);
    }
});

router.post('/interface/:interfaceId/import/commit', async (req, res) => {
    try {
        const input = importCommitSchema.parse(req.body);
        const parameters = await Container.get(ParameterService)
            .commitImport(parseId(req.params.interfaceId), input, requireUser(req));
        res.json({ parameters });
    } catch (error) {
        sendError(res, error);
    }
});

router.get('/:id', async (req, res) => {
    try {
        res.json(await Container.get(ParameterService).get(parseId(req.params.id)));
    } catch (error) {
        sendError(res, error);
    }
});

router.put('/:id', async (req, res) => {
    try {
        const input = updateParameterSchema.parse(req.body);
        res.json(await Container.get(ParameterService).update(parseId(req.params.id), input, requireUser(req)));
    } catch (error) {
        sendError(res, error);
    }
});

router.delete('/:id', async (req, res) => {
    try {
        await Container.get(ParameterService).delete(parseId(req.params.id), requireUser(req));
        res.status(204).end();
    } catch (error) {
        sendError(res, error);
    }
});

export const parametersRouter = router;
