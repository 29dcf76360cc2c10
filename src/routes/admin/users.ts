import { Router } from 'express';
import Container from 'typedi';
import { parseId, sendError } from '../../lib/http';
import { requireUser } from '../../middleware/auth';
import { UserService } from '../../services/persistence/UserService';
import { assertAdmin } from '../../utils/permissions';
import { updateUserSchema } from '../../validation/auth.schemas';

const router = Router();

// GET /api/users
router.get('/', async (req, res) => {
    try {
        assertAdmin(requireUser(req));
        res.json(await Container.get(UserService).listUsers());
    } catch (error) {
        sendError(res, error);
    }
});

// PUT /api/users/:id
router.put('/:id', async (req, res) => {
    try {
        assertAdmin(requireUser(req));
        const input = updateUserSchema.parse(req.body);
        res.json(await Container.get(UserService).updateUser(parseId(req.params.id), input));
    } catch (error) {
        sendError(res, error);
    }
});

export const usersRouter = router;
