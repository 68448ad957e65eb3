import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import logger from '../../config/logger';
import { AuthError, isAppError, StorageError } from '../../errors';
import { formatHumanTime } from '../../utils/formatTime';
import { parseInput } from '../../utils/validation';
import { CSRF_FIELD, type AuthHooks } from '../auth/auth.middleware';
import { loginSchema, profileFormSchema } from '../auth/auth.schemas';
import type { AuthService } from '../auth/auth.service';
import type { PublicUser, RequestAuth } from '../auth/auth.types';
import type { CatalogService } from '../catalog/catalog.service';

export interface WebRoutesOptions {
    authService: AuthService;
    catalogService: CatalogService;
    hooks: AuthHooks;
    serviceName: string;
    version: string;
}

interface LoginForm {
    username?: string;
    password?: string;
}

type PageVars = Record<string, unknown>;

function signedIn(request: FastifyRequest): RequestAuth {
    if (!request.auth) {
        throw new AuthError('unauthorized');
    }
    return request.auth;
}

const webRoutes: FastifyPluginAsync<WebRoutesOptions> = async (fastify: FastifyInstance, options) => {
    const { authService, catalogService, hooks } = options;

    const render = (reply: FastifyReply, template: string, auth: RequestAuth | null, vars: PageVars) =>
        reply.view(template, {
            serviceName: options.serviceName,
            version: options.version,
            serverTime: formatHumanTime(new Date()),
            currentUser: auth?.user ?? null,
            isAuthenticated: auth !== null,
            csrfField: CSRF_FIELD,
            csrfToken: auth?.csrfToken ?? null,
            ...vars,
        });

    const renderProfile = (
        reply: FastifyReply,
        auth: RequestAuth,
        user: PublicUser,
        messages: { success?: string; error?: string },
    ) => render(reply, 'profile.njk', { ...auth, user }, {
        title: 'Profile',
        user,
        success: messages.success ?? null,
        error: messages.error ?? null,
    });

    // GET / - Landing page with the item list
    fastify.get('/', async (request, reply) => {
        const [categories, items] = await Promise.all([
            catalogService.getAllCategories(),
            catalogService.getAllItems(),
        ]);
        return render(reply, 'index.njk', request.auth, { title: 'Home', categories, items });
    });

    // GET /login - Login form; signed-in users go home
    fastify.get('/login', async (request, reply) => {
        if (request.auth) {
            return reply.redirect('/');
        }
        return render(reply, 'login.njk', null, { title: 'Login', error: null, username: '' });
    });

    // POST /login - Form login
    fastify.post<{ Body: LoginForm }>('/login', async (request, reply) => {
        const username = typeof request.body?.username === 'string' ? request.body.username : '';
        const loginPage = (status: number, error: string) =>
            render(reply.status(status), 'login.njk', null, { title: 'Login', error, username });

        try {
            const form = parseInput(loginSchema, request.body);
            const { session } = await authService.login(form.username, form.password, request.auth?.sessionToken);
            hooks.setSessionCookie(reply, session.token, session.expiresAt);
            return reply.redirect('/');
        } catch (error) {
            if (error instanceof AuthError) {
                return loginPage(401, error.message);
            }
            if (error instanceof StorageError) {
                logger.error('Login failed on storage error', { error: error.reason });
                return loginPage(500, 'System error. Please try again later.');
            }
            if (isAppError(error) && error.kind === 'validation_error') {
                return loginPage(400, 'Username and password are required');
            }
            throw error;
        }
    });

    // POST /logout - Destroy the session and go back to the login page
    fastify.post('/logout', { preHandler: hooks.verifyCsrf }, async (request, reply) => {
        await authService.logout(request.auth?.sessionToken ?? hooks.readSessionToken(request)?.token);
        hooks.clearSessionCookie(reply);
        return reply.redirect('/login');
    });

    // GET /profile - Account page
    fastify.get('/profile', { preHandler: hooks.requireWebAuth }, async (request, reply) => {
        const auth = signedIn(request);
        return renderProfile(reply, auth, auth.user, {});
    });

    // POST /profile - Update email or change password
    fastify.post(
        '/profile',
        { preHandler: [hooks.requireWebAuth, hooks.verifyCsrf] },
        async (request, reply) => {
            const auth = signedIn(request);

            try {
                const form = parseInput(profileFormSchema, request.body);

                if (form.action === 'update_profile') {
                    const user = await authService.updateEmail(auth.user.id, form.email);
                    return renderProfile(reply, auth, user, { success: 'Profile updated successfully!' });
                }

                if (form.new_password !== form.confirm_password) {
                    return renderProfile(reply.status(400), auth, auth.user, { error: 'New passwords do not match' });
                }
                const session = await authService.changePassword(auth.user.id, form.current_password, form.new_password);
                hooks.setSessionCookie(reply, session.token, session.expiresAt);
                const refreshed: RequestAuth = { ...auth, sessionToken: session.token, csrfToken: session.csrfToken };
                return renderProfile(reply, refreshed, auth.user, { success: 'Password changed successfully!' });
            } catch (error) {
                if (error instanceof AuthError) {
                    return renderProfile(reply.status(400), auth, auth.user, { error: 'Current password is incorrect' });
                }
                if (isAppError(error) && error.statusCode < 500) {
                    return renderProfile(reply.status(error.statusCode), auth, auth.user, { error: error.message });
                }
                throw error;
            }
        },
    );
};

export default webRoutes;
