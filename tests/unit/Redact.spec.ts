import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import pino from 'pino';
import { Writable } from 'stream';

function captureLogger() {
    const lines: Record<string, unknown>[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            lines.push(JSON.parse(chunk.toString()));
            callback();
        }
    });

    const testLogger = pino({
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    }, stream);

    return { testLogger, lines };
}

describe('Log Redaction', () => {
    it('should redact sensitive keys in objects', () => {
        const { testLogger, lines } = captureLogger();

        testLogger.info({
            password: 'test-secret',
            authorization: 'Bearer test-secret',
            nested: {
                secret: 'test-secret',
                other: 'safe'
            },
            visible: 'ok'
        }, 'test message');

        const [log] = lines;
        assert.ok(log);
        assert.strictEqual(log.password, REDACT_CENSOR);
        assert.strictEqual(log.authorization, REDACT_CENSOR);
        assert.deepStrictEqual(log.nested, { secret: REDACT_CENSOR, other: 'safe' });
        assert.strictEqual(log.visible, 'ok');
    });

    it('should keep uploaded file contents out of the log', () => {
        const { testLogger, lines } = captureLogger();

        testLogger.debug({ args: { binary_data: 'aGVsbG8=', description: 'Testcase input' } }, 'RPC issued');
        testLogger.info({ args: { binary_data: 'aGVsbG8=', description: 'Testcase input' } }, 'RPC issued');

        const [log] = lines;
        assert.ok(log);
        assert.deepStrictEqual(log.args, { binary_data: REDACT_CENSOR, description: 'Testcase input' });
    });
});
