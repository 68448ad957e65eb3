import { z } from 'zod';

// Shape checks only; credential policy (lengths, formats) lives in CredentialStore.

export const loginSchema = z.object({
    username: z.string().trim().min(1, 'Username and password are required'),
    password: z.string().min(1, 'Username and password are required'),
});

export const createUserSchema = z.object({
    username: z.string().min(1),
    email: z.string().min(1),
    password: z.string().min(1),
});

export const changePasswordSchema = z.object({
    currentPassword: z.string().min(1),
    newPassword: z.string().min(1),
});

export const updateProfileSchema = z.object({
    email: z.string().min(1),
});

/** The HTML profile form posts both actions to one endpoint. */
export const profileFormSchema = z.discriminatedUnion('action', [
    z.object({
        action: z.literal('update_profile'),
        email: z.string(),
    }),
    z.object({
        action: z.literal('change_password'),
        current_password: z.string(),
        new_password: z.string(),
        confirm_password: z.string(),
    }),
]);
