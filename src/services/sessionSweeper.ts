import logger from '../config/logger';
import type { Service } from './serviceManager';

export interface SweepTarget {
    cleanupExpiredSessions(): Promise<number>;
}

/**
 * Periodically deletes expired session rows. Expired sessions never resolve
 * anyway; this only keeps the table small.
 */
export class SessionSweeper implements Service {
    readonly name = 'SessionSweeper';
    private timer: NodeJS.Timeout | null = null;
    private running: Promise<number> | null = null;

    constructor(
        private readonly target: SweepTarget,
        private readonly intervalMs: number,
    ) { }

    async start(): Promise<void> {
        if (this.timer) {
            return;
        }
        this.timer = setInterval(() => {
            this.sweep().catch((error: unknown) => {
                logger.error('Session sweep failed', { error });
            });
        }, this.intervalMs);
        this.timer.unref();
        logger.info(`Session sweeper running every ${Math.round(this.intervalMs / 1000)}s`);
    }

    /** Skips a tick while a previous sweep is still in flight. */
    async sweep(): Promise<number> {
        if (this.running) {
            return 0;
        }
        this.running = this.target.cleanupExpiredSessions();
        try {
            return await this.running;
        } finally {
            this.running = null;
        }
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }
}
