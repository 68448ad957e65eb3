import type { AppConfig } from './config';
import type { Database } from './db/client';
import { AuthService } from './modules/auth/auth.service';
import { CredentialStore } from './modules/auth/credential.store';
import { PasswordService } from './modules/auth/password.service';
import { DrizzleSessionRepository, type SessionRepository } from './modules/auth/session.repository';
import { SessionStore } from './modules/auth/session.store';
import { DrizzleUserRepository, type UserRepository } from './modules/auth/user.repository';
import { DrizzleCatalogRepository, type CatalogRepository } from './modules/catalog/catalog.repository';
import { CatalogService } from './modules/catalog/catalog.service';

export interface Repositories {
    users: UserRepository;
    sessions: SessionRepository;
    catalog: CatalogRepository;
}

export interface Services {
    credentials: CredentialStore;
    sessions: SessionStore;
    authService: AuthService;
    catalogService: CatalogService;
}

export function createRepositories(db: Database): Repositories {
    return {
        users: new DrizzleUserRepository(db),
        sessions: new DrizzleSessionRepository(db),
        catalog: new DrizzleCatalogRepository(db),
    };
}

/** Wires stores and services over any repository implementation. */
export function createServices(repositories: Repositories, appConfig: AppConfig): Services {
    const credentials = new CredentialStore(
        repositories.users,
        new PasswordService(appConfig.password),
        appConfig.auth,
    );
    const sessions = new SessionStore(repositories.sessions, appConfig.session);

    return {
        credentials,
        sessions,
        authService: new AuthService(credentials, sessions, appConfig.auth),
        catalogService: new CatalogService(repositories.catalog),
    };
}
