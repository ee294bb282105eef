import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MaskScope } from '../../libs/context/requestContext.js';
import type { EndpointContext } from '../../libs/context/endpoint.js';

const mockContextA: EndpointContext = {
    endpoint: 'GET /notes/:id',
    method: 'GET',
    path: '/notes/1',
    requestId: 'req-A'
};

const mockContextB: EndpointContext = {
    ...mockContextA,
    endpoint: 'GET /categories',
    path: '/categories',
    requestId: 'req-B'
};

describe('MaskScope', () => {
    it('should report no scope outside run()', () => {
        assert.strictEqual(MaskScope.current(), undefined);
    });

    it('should throw from require() outside run()', () => {
        assert.throws(() => MaskScope.require(), /MISSING_MASK_SCOPE/);
    });

    it('should return context inside run()', () => {
        const result = MaskScope.run(mockContextA, () => {
            assert.deepStrictEqual(MaskScope.current(), mockContextA);
            assert.deepStrictEqual(MaskScope.require(), mockContextA);
            return 'success';
        });
        assert.strictEqual(result, 'success');
    });

    it('should freeze the stored context', () => {
        MaskScope.run(mockContextA, () => {
            assert.ok(Object.isFrozen(MaskScope.current()));
        });
    });

    it('should maintain isolation between concurrent async requests', async () => {
        // Two interleaved async flows
        const flowA = MaskScope.run(mockContextA, async () => {
            assert.deepStrictEqual(MaskScope.current(), mockContextA);
            await new Promise(resolve => setTimeout(resolve, 50));
            assert.deepStrictEqual(MaskScope.current(), mockContextA);
            return 'A';
        });

        const flowB = MaskScope.run(mockContextB, async () => {
            assert.deepStrictEqual(MaskScope.current(), mockContextB);
            await new Promise(resolve => setTimeout(resolve, 20));
            assert.deepStrictEqual(MaskScope.current(), mockContextB);
            return 'B';
        });

        const [resA, resB] = await Promise.all([flowA, flowB]);
        assert.strictEqual(resA, 'A');
        assert.strictEqual(resB, 'B');
    });
});
