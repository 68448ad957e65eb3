import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { apiLogin, cookieValue, createTestApp, formBody, TEST_PASSWORD, type TestApp } from '../common/testApp';

const FORM = { 'content-type': 'application/x-www-form-urlencoded' };

describe('HTML pages', () => {
    let ctx: TestApp;

    beforeEach(async () => {
        ctx = await createTestApp();
        const general = ctx.store.catalog.addCategory('general', 'General', 0);
        ctx.store.catalog.addItem({ title: 'Welcome', categoryId: general.id });
        await ctx.services.credentials.createUser('alice', 'alice@example.com', TEST_PASSWORD);
    });

    afterEach(async () => {
        await ctx.app.close();
    });

    it('renders the index with items for anonymous visitors', async () => {
        const response = await ctx.app.inject({ method: 'GET', url: '/' });

        expect(response.statusCode).toBe(200);
        expect(response.headers['content-type']).toContain('text/html');
        expect(response.body).toContain('<strong>Welcome</strong>');
        expect(response.body).toContain('<a href="/login">Log in</a>');
    });

    it('signs in through the login form', async () => {
        const page = await ctx.app.inject({ method: 'GET', url: '/login' });
        expect(page.statusCode).toBe(200);
        expect(page.body).toContain('<h1>Sign in</h1>');

        const response = await ctx.app.inject({
            method: 'POST',
            url: '/login',
            headers: FORM,
            payload: formBody({ username: 'alice', password: TEST_PASSWORD }),
        });

        expect(response.statusCode).toBe(302);
        expect(response.headers.location).toBe('/');
        const token = cookieValue(response) ?? '';
        expect((await ctx.services.authService.identify(token))?.user.username).toBe('alice');

        const home = await ctx.app.inject({ method: 'GET', url: '/', cookies: { sid: token } });
        expect(home.body).toContain('<a href="/profile">alice</a>');

        const loginAgain = await ctx.app.inject({ method: 'GET', url: '/login', cookies: { sid: token } });
        expect(loginAgain.statusCode).toBe(302);
        expect(loginAgain.headers.location).toBe('/');
    });

    it('replaces an existing session when signing in through the form', async () => {
        const { body } = await apiLogin(ctx.app, 'alice');

        const response = await ctx.app.inject({
            method: 'POST',
            url: '/login',
            cookies: { sid: body.token },
            headers: FORM,
            payload: formBody({ username: 'alice', password: TEST_PASSWORD }),
        });

        expect(response.statusCode).toBe(302);
        const fresh = cookieValue(response) ?? '';
        expect(fresh).not.toBe(body.token);
        expect(await ctx.services.authService.identify(body.token)).toBeNull();
        expect((await ctx.services.authService.identify(fresh))?.user.username).toBe('alice');
    });

    it('re-renders the login form with a generic error on failure', async () => {
        const response = await ctx.app.inject({
            method: 'POST',
            url: '/login',
            headers: FORM,
            payload: formBody({ username: 'alice', password: 'wrong-password' }),
        });

        expect(response.statusCode).toBe(401);
        expect(response.body).toContain('<p class="error" role="alert">Invalid username or password</p>');
        expect(response.body).toContain('value="alice"');
        expect(cookieValue(response)).toBeUndefined();
    });

    it('asks for both fields', async () => {
        const response = await ctx.app.inject({
            method: 'POST',
            url: '/login',
            headers: FORM,
            payload: formBody({ username: 'alice', password: '' }),
        });

        expect(response.statusCode).toBe(400);
        expect(response.body).toContain('Username and password are required');
    });

    it('redirects anonymous visitors away from the profile', async () => {
        const response = await ctx.app.inject({ method: 'GET', url: '/profile' });

        expect(response.statusCode).toBe(302);
        expect(response.headers.location).toBe('/login');
    });

    it('shows the profile with the CSRF token embedded in its forms', async () => {
        const { body } = await apiLogin(ctx.app, 'alice');

        const response = await ctx.app.inject({ method: 'GET', url: '/profile', cookies: { sid: body.token } });

        expect(response.statusCode).toBe(200);
        expect(response.body).toContain(`<input type="hidden" name="_csrf" value="${body.csrfToken}">`);
        expect(response.body).toContain('<dt>Email</dt><dd>alice@example.com</dd>');
    });

    it('updates the email from the profile form', async () => {
        const { body } = await apiLogin(ctx.app, 'alice');

        const response = await ctx.app.inject({
            method: 'POST',
            url: '/profile',
            cookies: { sid: body.token },
            headers: FORM,
            payload: formBody({ _csrf: body.csrfToken, action: 'update_profile', email: 'alice@new.example.com' }),
        });

        expect(response.statusCode).toBe(200);
        expect(response.body).toContain('Profile updated successfully!');
        expect(response.body).toContain('<dt>Email</dt><dd>alice@new.example.com</dd>');
    });

    it('refuses profile changes without the CSRF token', async () => {
        const { body } = await apiLogin(ctx.app, 'alice');

        const response = await ctx.app.inject({
            method: 'POST',
            url: '/profile',
            cookies: { sid: body.token },
            headers: FORM,
            payload: formBody({ action: 'update_profile', email: 'mallory@example.com' }),
        });

        expect(response.statusCode).toBe(403);
        expect(ctx.store.users.rows.get(body.user.id)?.email).toBe('alice@example.com');
    });

    it('changes the password from the profile form and rotates the session', async () => {
        const { body } = await apiLogin(ctx.app, 'alice');

        const mismatch = await ctx.app.inject({
            method: 'POST',
            url: '/profile',
            cookies: { sid: body.token },
            headers: FORM,
            payload: formBody({
                _csrf: body.csrfToken,
                action: 'change_password',
                current_password: TEST_PASSWORD,
                new_password: 'test-password-2',
                confirm_password: 'test-password-3',
            }),
        });
        expect(mismatch.statusCode).toBe(400);
        expect(mismatch.body).toContain('New passwords do not match');

        const wrongCurrent = await ctx.app.inject({
            method: 'POST',
            url: '/profile',
            cookies: { sid: body.token },
            headers: FORM,
            payload: formBody({
                _csrf: body.csrfToken,
                action: 'change_password',
                current_password: 'wrong-password',
                new_password: 'test-password-2',
                confirm_password: 'test-password-2',
            }),
        });
        expect(wrongCurrent.statusCode).toBe(400);
        expect(wrongCurrent.body).toContain('Current password is incorrect');

        const changed = await ctx.app.inject({
            method: 'POST',
            url: '/profile',
            cookies: { sid: body.token },
            headers: FORM,
            payload: formBody({
                _csrf: body.csrfToken,
                action: 'change_password',
                current_password: TEST_PASSWORD,
                new_password: 'test-password-2',
                confirm_password: 'test-password-2',
            }),
        });
        expect(changed.statusCode).toBe(200);
        expect(changed.body).toContain('Password changed successfully!');

        const fresh = cookieValue(changed) ?? '';
        expect(fresh).not.toBe(body.token);
        expect(await ctx.services.authService.identify(body.token)).toBeNull();
        expect((await ctx.services.authService.identify(fresh))?.user.username).toBe('alice');
    });

    it('logs out through the form', async () => {
        const { body } = await apiLogin(ctx.app, 'alice');

        const response = await ctx.app.inject({
            method: 'POST',
            url: '/logout',
            cookies: { sid: body.token },
            headers: FORM,
            payload: formBody({ _csrf: body.csrfToken }),
        });

        expect(response.statusCode).toBe(302);
        expect(response.headers.location).toBe('/login');
        expect(cookieValue(response)).toBe('');
        expect(await ctx.services.authService.identify(body.token)).toBeNull();
    });
});
