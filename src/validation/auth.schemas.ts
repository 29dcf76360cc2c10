import { z } from 'zod';
import { USER_ROLES } from '../types/domain.types';
import { requiredText } from './common';

export const loginSchema = z.object({
    username: requiredText(50),
    password: z.string().optional().nullable()
});

export const registerSchema = z.object({
    username: requiredText(50).regex(/^[\w.@-]+$/, 'Only letters, digits and _ . @ - are allowed'),
    name: requiredText(100),
    password: z.string().max(200).optional().nullable()
});

export const updateUserSchema = z.object({
    name: requiredText(100).optional(),
    role: z.enum(USER_ROLES).optional(),
    is_active: z.boolean().optional(),
    // Empty string clears the password
    password: z.string().max(200).nullable().optional()
});

export type LoginInput = z.infer<typeof loginSchema>;
export type RegisterInput = z.infer<typeof registerSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
