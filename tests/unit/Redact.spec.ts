import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import pino from 'pino';
import { Writable } from 'stream';

function captureLogger(lines: Record<string, unknown>[]) {
    const stream = new Writable({
        write(chunk, encoding, callback) {
            lines.push(JSON.parse(chunk.toString()));
            callback();
        }
    });

    return pino({
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    }, stream);
}

describe('Log Redaction', () => {
    it('should redact sensitive keys in objects', () => {
        const lines: Record<string, unknown>[] = [];

        captureLogger(lines).info({
            password: 'placeholder-password',
            authorization: 'Bearer test-token',
            nested: {
                secret: 'test-secret',
                other: 'safe'
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        const log = lines[0];
        assert.strictEqual(log?.password, REDACT_CENSOR);
        assert.strictEqual(log?.authorization, REDACT_CENSOR);
        assert.deepStrictEqual(log?.nested, { secret: REDACT_CENSOR, other: 'safe' });
        assert.strictEqual(log?.visible, 'ok');
    });

    it('should redact credentials carried on a calling context', () => {
        const lines: Record<string, unknown>[] = [];

        captureLogger(lines).warn({
            context: {
                endpoint: 'GET /notes/:id',
                headers: { authorization: 'Bearer test-token', 'x-api-key': 'test-key', accept: 'application/json' }
            }
        }, 'context message');

        assert.deepStrictEqual(lines[0]?.context, {
            endpoint: 'GET /notes/:id',
            headers: { authorization: REDACT_CENSOR, 'x-api-key': REDACT_CENSOR, accept: 'application/json' }
        });
    });

    it('should redact member values echoed by error payloads', () => {
        const lines: Record<string, unknown>[] = [];

        captureLogger(lines).error({
            internalDetails: { path: '$.password', value: 'placeholder-password' }
        }, 'error message');

        assert.deepStrictEqual(lines[0]?.internalDetails, { path: '$.password', value: REDACT_CENSOR });
    });
});
