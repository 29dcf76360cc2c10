import express from 'express';
import Container from 'typedi';
import { NotFoundError } from '../lib/errors';
import { sendError } from '../lib/http';
import { authMiddleware, requireUser } from '../middleware/auth';
import { AuthService } from '../services/auth/AuthService';
import { toPublicUser, UserService } from '../services/persistence/UserService';
import { loginSchema, registerSchema } from '../validation/auth.schemas';

const router = express.Router();

// POST /api/auth/login
router.post('/login', async (req, res) => {
    try {
        const input = loginSchema.parse(req.body);
        res.json(await Container.get(AuthService).login(input));
    } catch (error) {
        sendError(res, error);
    }
});

// POST /api/auth/register
router.post('/register', async (req, res) => {
    try {
        const input = registerSchema.parse(req.body);
        res.status(201).json(await Container.get(AuthService).register(input));
    } catch (error) {
        sendError(res, error);
    }
});

// GET /api/auth/me
router.get('/me', authMiddleware, async (req, res) => {
    try {
        const caller = requireUser(req);
        const user = await Container.get(UserService).getUser(caller.id);
        if (!user) throw new NotFoundError(`User not found: ${caller.id}`);
        res.json(toPublicUser(user));
    } catch (error) {
        sendError(res, error);
    }
});

// Tokens are stateless; the client discards its copy
router.post('/logout', authMiddleware, (req, res) => {
    res.json({ success: true });
});

export const authRouter = router;
