import { describe, it, expect } from 'vitest';
import { serializeBy, wrapChain, type MiddlewareFn } from '../../src/server/middleware.js';
import { MutationSerializer } from '../../src/server/MutationSerializer.js';
import { success, type ToolResponse } from '../../src/server/response.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => { resolve = r; });
    return { promise, resolve };
}

const tick = (): Promise<void> => new Promise(r => setTimeout(r, 0));

describe('wrapChain', () => {
    it('runs the first middleware outermost', async () => {
        const order: string[] = [];
        const tag = (name: string): MiddlewareFn<null> => async (_ctx, _args, next) => {
            order.push(`${name}:before`);
            const result = await next();
            order.push(`${name}:after`);
            return result;
        };
        const chain = wrapChain<null>(async () => {
            order.push('handler');
            return success('ok');
        }, [tag('a'), tag('b')]);

        await chain(null, {});
        expect(order).toEqual(['a:before', 'b:before', 'handler', 'b:after', 'a:after']);
    });

    it('lets a middleware answer without calling the handler', async () => {
        let called = false;
        const chain = wrapChain<null>(async () => {
            called = true;
            return success('handler');
        }, [async () => success('blocked')]);

        expect((await chain(null, {})).content[0]?.text).toBe('blocked');
        expect(called).toBe(false);
    });
});

describe('MutationSerializer', () => {
    it('runs calls on one key one after the other', async () => {
        const serializer = new MutationSerializer();
        const gate = deferred();
        const order: string[] = [];

        const first = serializer.serialize('k', async () => {
            await gate.promise;
            order.push('first');
        });
        const second = serializer.serialize('k', async () => {
            order.push('second');
        });

        await tick();
        expect(order).toEqual([]);
        expect(serializer.activeChains).toBe(1);

        gate.resolve();
        await Promise.all([first, second]);
        expect(order).toEqual(['first', 'second']);
        expect(serializer.activeChains).toBe(0);
    });

    it('does not hold other keys back', async () => {
        const serializer = new MutationSerializer();
        const gate = deferred();
        const order: string[] = [];

        const slow = serializer.serialize('a', async () => {
            await gate.promise;
            order.push('a');
        });
        await serializer.serialize('b', async () => { order.push('b'); });
        expect(order).toEqual(['b']);

        gate.resolve();
        await slow;
        expect(order).toEqual(['b', 'a']);
    });

    it('keeps the queue going after a failure', async () => {
        const serializer = new MutationSerializer();
        const failing = serializer.serialize('k', async () => { throw new Error('write failed'); });
        const next = serializer.serialize('k', async () => 'ran');

        await expect(failing).rejects.toThrow('write failed');
        await expect(next).resolves.toBe('ran');
    });
});

describe('serializeBy', () => {
    it('queues calls that share a key', async () => {
        const gate = deferred();
        const order: string[] = [];
        const mw = serializeBy<null>(args => [`dashboard:${String(args['id'])}`]);

        const slow = mw(null, { id: 1 }, async (): Promise<ToolResponse> => {
            await gate.promise;
            order.push('slow');
            return success('slow');
        });
        const fast = mw(null, { id: 1 }, async () => {
            order.push('fast');
            return success('fast');
        });
        const other = mw(null, { id: 2 }, async () => {
            order.push('other');
            return success('other');
        });

        await other;
        expect(order).toEqual(['other']);
        gate.resolve();
        await Promise.all([slow, fast]);
        expect(order).toEqual(['other', 'slow', 'fast']);
    });

    it('runs at once without a key', async () => {
        const mw = serializeBy<null>(() => []);
        const response = await mw(null, {}, async () => success('direct'));
        expect(response.content[0]?.text).toBe('direct');
    });
});
