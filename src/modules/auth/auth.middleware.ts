import { timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { SessionConfig } from '../../config';
import { AuthError, ForbiddenError } from '../../errors';
import type { AuthService } from './auth.service';
import type { AuthTransport, RequestAuth } from './auth.types';

// Extend Fastify request interface to include the request-scoped identity
declare module 'fastify' {
    interface FastifyRequest {
        auth: RequestAuth | null;
    }
}

export const CSRF_HEADER = 'x-csrf-token';
export const CSRF_FIELD = '_csrf' as const;
const STATE_CHANGING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;

export interface AuthHooks {
    /** Attaches `request.auth` or leaves it null. */
    loadIdentity: AuthHook;
    /** 401 `unauthorized` for the JSON API. */
    requireApiAuth: AuthHook;
    /** Redirect to the login page for HTML routes. */
    requireWebAuth: AuthHook;
    /** Rejects state-changing cookie requests whose CSRF token does not match. */
    verifyCsrf: AuthHook;
    setSessionCookie: (reply: FastifyReply, token: string, expiresAt: Date) => void;
    clearSessionCookie: (reply: FastifyReply) => void;
    readSessionToken: (request: FastifyRequest) => { token: string; via: AuthTransport } | null;
}

export function tokensMatch(expected: string, provided: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(provided);
    return a.length === b.length && timingSafeEqual(a, b);
}

function providedCsrfToken(request: FastifyRequest): string | null {
    const header = request.headers[CSRF_HEADER];
    if (typeof header === 'string' && header.length > 0) {
        return header;
    }
    const body = request.body;
    if (typeof body === 'object' && body !== null && CSRF_FIELD in body) {
        const field = body[CSRF_FIELD];
        return typeof field === 'string' ? field : null;
    }
    return null;
}

/**
 * Builds the auth pipeline stages. Routes compose them in order, e.g.
 * `preHandler: [hooks.requireApiAuth, hooks.verifyCsrf]`; `loadIdentity`
 * is an `onRequest` hook on the scope holding the auth, catalog and web routes.
 */
export function createAuthHooks(authService: AuthService, sessionConfig: SessionConfig): AuthHooks {
    const signed = sessionConfig.secret !== undefined;

    const setSessionCookie = (reply: FastifyReply, token: string, expiresAt: Date): void => {
        reply.setCookie(sessionConfig.cookieName, token, {
            httpOnly: true,
            secure: sessionConfig.secureCookie,
            sameSite: 'lax',
            path: '/',
            expires: expiresAt,
            signed,
        });
    };

    const clearSessionCookie = (reply: FastifyReply): void => {
        reply.clearCookie(sessionConfig.cookieName, { path: '/' });
    };

    const readSessionToken = (request: FastifyRequest): { token: string; via: AuthTransport } | null => {
        const raw = request.cookies[sessionConfig.cookieName];
        if (raw) {
            if (!signed) {
                return { token: raw, via: 'cookie' };
            }
            const unsigned = request.unsignCookie(raw);
            if (unsigned.valid && unsigned.value) {
                return { token: unsigned.value, via: 'cookie' };
            }
        }

        const authHeader = request.headers.authorization;
        if (authHeader?.startsWith('Bearer ')) {
            const token = authHeader.slice('Bearer '.length).trim();
            if (token) {
                return { token, via: 'bearer' };
            }
        }
        return null;
    };

    const loadIdentity: AuthHook = async (request, reply) => {
        request.auth = null;

        const presented = readSessionToken(request);
        if (!presented) {
            return;
        }

        const identity = await authService.identify(presented.token);
        if (!identity) {
            if (presented.via === 'cookie') {
                clearSessionCookie(reply);
            }
            return;
        }

        request.auth = {
            user: identity.user,
            sessionToken: presented.token,
            csrfToken: identity.session.csrfToken,
            via: presented.via,
        };

        if (identity.session.renewed && presented.via === 'cookie') {
            setSessionCookie(reply, presented.token, identity.session.expiresAt);
        }
    };

    const requireApiAuth: AuthHook = async (request) => {
        if (!request.auth) {
            throw new AuthError('unauthorized');
        }
    };

    const requireWebAuth: AuthHook = async (request, reply) => {
        if (!request.auth) {
            return reply.redirect('/login');
        }
    };

    const verifyCsrf: AuthHook = async (request) => {
        if (!STATE_CHANGING_METHODS.has(request.method)) {
            return;
        }
        const auth = request.auth;
        // Bearer tokens are never sent implicitly by a browser
        if (!auth || auth.via === 'bearer') {
            return;
        }
        const provided = providedCsrfToken(request);
        if (!provided || !tokensMatch(auth.csrfToken, provided)) {
            throw new ForbiddenError('Invalid or missing CSRF token');
        }
    };

    return {
        loadIdentity,
        requireApiAuth,
        requireWebAuth,
        verifyCsrf,
        setSessionCookie,
        clearSessionCookie,
        readSessionToken,
    };
}
