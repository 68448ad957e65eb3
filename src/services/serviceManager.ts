import logger from '../config/logger';

export interface Service {
    name: string;
    start: () => Promise<void>;
    stop: () => void | Promise<void>;
}

/** Background services that live as long as the HTTP server. */
export class ServiceManager {
    private static instance: ServiceManager | undefined;
    private services: Map<string, Service> = new Map();
    private started: string[] = [];
    private isShuttingDown = false;

    public static getInstance(): ServiceManager {
        if (!ServiceManager.instance) {
            ServiceManager.instance = new ServiceManager();
        }
        return ServiceManager.instance;
    }

    public registerService(service: Service): void {
        if (this.services.has(service.name)) {
            logger.warn(`Service ${service.name} is already registered. Overwriting.`);
        }
        this.services.set(service.name, service);
        logger.debug(`Service ${service.name} registered`);
    }

    public async startAll(): Promise<void> {
        logger.info(`Starting ${this.services.size} services...`);

        for (const [name, service] of this.services) {
            try {
                await service.start();
                this.started.push(name);
                logger.info(`Service ${name} started successfully`);
            } catch (error) {
                logger.error(`Failed to start service ${name}`, { error });
                throw error;
            }
        }
    }

    /** Stops started services in reverse start order; a failing stop does not block the rest. */
    public async stopAll(): Promise<void> {
        if (this.isShuttingDown) {
            logger.warn('Service manager is already shutting down');
            return;
        }

        this.isShuttingDown = true;
        try {
            for (const name of [...this.started].reverse()) {
                const service = this.services.get(name);
                if (!service) continue;
                try {
                    await service.stop();
                    logger.info(`Service ${name} stopped successfully`);
                } catch (error) {
                    logger.error(`Error stopping service ${name}`, { error });
                }
            }
            this.started = [];
        } finally {
            this.isShuttingDown = false;
        }
    }

    public getService(name: string): Service | undefined {
        return this.services.get(name);
    }

    public isRunning(name: string): boolean {
        return this.started.includes(name);
    }
}
