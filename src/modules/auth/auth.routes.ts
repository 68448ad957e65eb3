import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { AuthError } from '../../errors';
import { parseInput } from '../../utils/validation';
import type { AuthHooks } from './auth.middleware';
import { changePasswordSchema, createUserSchema, loginSchema, updateProfileSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import type {
    ChangePasswordBody,
    CreateUserBody,
    IssuedSession,
    LoginRequestBody,
    RequestAuth,
    UpdateProfileBody,
} from './auth.types';

export interface AuthRoutesOptions {
    authService: AuthService;
    hooks: AuthHooks;
}

function currentAuth(request: FastifyRequest): RequestAuth {
    if (!request.auth) {
        throw new AuthError('unauthorized');
    }
    return request.auth;
}

const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify: FastifyInstance, { authService, hooks }) => {
    const sendSession = (reply: FastifyReply, session: IssuedSession) => {
        hooks.setSessionCookie(reply, session.token, session.expiresAt);
        return {
            token: session.token,
            csrfToken: session.csrfToken,
            expiresAt: session.expiresAt.toISOString(),
        };
    };

    // POST /api/auth/register - Create an account (when registration is enabled)
    fastify.post<{ Body: CreateUserBody }>('/register', async (request, reply) => {
        const { username, email, password } = parseInput(createUserSchema, request.body);
        const user = await authService.register(username, email, password);
        reply.status(201).send({ user });
    });

    // POST /api/auth/login - Exchange credentials for a session cookie
    fastify.post<{ Body: LoginRequestBody }>('/login', async (request, reply) => {
        const { username, password } = parseInput(loginSchema, request.body);
        const { user, session } = await authService.login(username, password, request.auth?.sessionToken);
        reply.send({ user, ...sendSession(reply, session) });
    });

    // POST /api/auth/logout - Idempotent
    fastify.post('/logout', { preHandler: hooks.verifyCsrf }, async (request, reply) => {
        const token = request.auth?.sessionToken ?? hooks.readSessionToken(request)?.token;
        await authService.logout(token);
        hooks.clearSessionCookie(reply);
        reply.send({ message: 'Logged out successfully' });
    });

    // GET /api/auth/me - Current user
    fastify.get('/me', { preHandler: hooks.requireApiAuth }, async (request, reply) => {
        const auth = currentAuth(request);
        reply.send({ user: auth.user, csrfToken: auth.csrfToken });
    });

    // PATCH /api/auth/me - Update email
    fastify.patch<{ Body: UpdateProfileBody }>(
        '/me',
        { preHandler: [hooks.requireApiAuth, hooks.verifyCsrf] },
        async (request, reply) => {
            const auth = currentAuth(request);
            const { email } = parseInput(updateProfileSchema, request.body);
            const user = await authService.updateEmail(auth.user.id, email);
            reply.send({ user });
        },
    );

    // POST /api/auth/password - Change password; every existing session is revoked
    fastify.post<{ Body: ChangePasswordBody }>(
        '/password',
        { preHandler: [hooks.requireApiAuth, hooks.verifyCsrf] },
        async (request, reply) => {
            const auth = currentAuth(request);
            const { currentPassword, newPassword } = parseInput(changePasswordSchema, request.body);
            const session = await authService.changePassword(auth.user.id, currentPassword, newPassword);
            reply.send({ message: 'Password changed successfully', ...sendSession(reply, session) });
        },
    );

    // POST /api/auth/sessions/cleanup - Purge expired sessions
    fastify.post(
        '/sessions/cleanup',
        { preHandler: [hooks.requireApiAuth, hooks.verifyCsrf] },
        async (request, reply) => {
            const cleanedSessions = await authService.cleanupExpiredSessions();
            reply.send({ message: 'Session cleanup completed', cleanedSessions });
        },
    );
};

export default authRoutes;
