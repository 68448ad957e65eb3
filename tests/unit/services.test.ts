import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { ServiceManager, type Service } from '../../src/services/serviceManager';
import { SessionSweeper } from '../../src/services/sessionSweeper';

describe('ServiceManager', () => {
    it('starts in registration order and stops in reverse', async () => {
        const events: string[] = [];
        const service = (name: string): Service => ({
            name,
            start: async () => { events.push(`start ${name}`); },
            stop: () => { events.push(`stop ${name}`); },
        });
        const manager = new ServiceManager();
        manager.registerService(service('first'));
        manager.registerService(service('second'));

        await manager.startAll();
        expect(manager.isRunning('second')).toBe(true);
        await manager.stopAll();

        expect(events).toEqual(['start first', 'start second', 'stop second', 'stop first']);
        expect(manager.isRunning('first')).toBe(false);
    });

    it('keeps stopping when one service fails to stop', async () => {
        const stopped: string[] = [];
        const manager = new ServiceManager();
        manager.registerService({ name: 'ok', start: async () => undefined, stop: () => { stopped.push('ok'); } });
        manager.registerService({
            name: 'broken',
            start: async () => undefined,
            stop: async () => { throw new Error('stuck'); },
        });

        await manager.startAll();
        await manager.stopAll();

        expect(stopped).toEqual(['ok']);
    });

    it('propagates a start failure', async () => {
        const manager = new ServiceManager();
        manager.registerService({
            name: 'failing',
            start: async () => { throw new Error('no database'); },
            stop: () => undefined,
        });

        await expect(manager.startAll()).rejects.toThrow('no database');
        expect(manager.isRunning('failing')).toBe(false);
    });

    it('is a process-wide singleton', () => {
        expect(ServiceManager.getInstance()).toBe(ServiceManager.getInstance());
    });
});

describe('SessionSweeper', () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    it('purges expired sessions on every interval until stopped', async () => {
        jest.useFakeTimers();
        const cleanup = jest.fn(async () => 3);
        const sweeper = new SessionSweeper({ cleanupExpiredSessions: cleanup }, 1000);

        await sweeper.start();
        await jest.advanceTimersByTimeAsync(2500);
        expect(cleanup).toHaveBeenCalledTimes(2);

        sweeper.stop();
        await jest.advanceTimersByTimeAsync(5000);
        expect(cleanup).toHaveBeenCalledTimes(2);
    });

    it('skips a sweep while the previous one is still running', async () => {
        let release: (count: number) => void = () => undefined;
        const cleanup = jest.fn(() => new Promise<number>((resolve) => { release = resolve; }));
        const sweeper = new SessionSweeper({ cleanupExpiredSessions: cleanup }, 1000);

        const first = sweeper.sweep();
        await expect(sweeper.sweep()).resolves.toBe(0);
        release(4);

        await expect(first).resolves.toBe(4);
        expect(cleanup).toHaveBeenCalledTimes(1);
    });
});
