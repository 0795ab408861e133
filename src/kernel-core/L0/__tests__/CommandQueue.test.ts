import { describe, test, expect } from '@jest/globals';
import { CommandQueue } from '../CommandQueue.js';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('Command Queue (Single Writer)', () => {
    test('tasks run one at a time in submission order', async () => {
        const queue = new CommandQueue();
        const log: string[] = [];

        const slow = queue.run(async () => {
            log.push('a:start');
            await tick();
            await tick();
            log.push('a:end');
            return 'a';
        });
        const fast = queue.run(() => {
            log.push('b');
            return 'b';
        });

        expect(await Promise.all([slow, fast])).toEqual(['a', 'b']);
        expect(log).toEqual(['a:start', 'a:end', 'b']);
    });

    test('a failing task does not block the ones behind it', async () => {
        const queue = new CommandQueue();
        const failed = queue.run(async () => { throw new Error('boom'); });
        const next = queue.run(async () => 42);

        await expect(failed).rejects.toThrow('boom');
        await expect(next).resolves.toBe(42);
    });

    test('depth counts unsettled tasks and drain waits for them', async () => {
        const queue = new CommandQueue();
        const first = queue.run(async () => { await tick(); });
        const second = queue.run(async () => { await tick(); });
        expect(queue.depth).toBe(2);

        await queue.drain();
        expect(queue.depth).toBe(0);
        await Promise.all([first, second]);
    });
});
