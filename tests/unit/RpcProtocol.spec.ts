/**
 * Unit Tests: RPC wire framing
 *
 * @see libs/rpc/protocol.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { LineDecoder, encodeFrame, isErrorFrame, parseResponseFrame } from '../../libs/rpc/protocol.js';
import { ValidationError } from '../../libs/errors/coordinationErrors.js';

describe('RPC protocol', () => {
    it('should encode a request as one JSON line', () => {
        const line = encodeFrame({ id: 'c1', service: 'LogService', shard: 0, method: 'last_messages', args: {} });

        assert.strictEqual(line, '{"id":"c1","service":"LogService","shard":0,"method":"last_messages","args":{}}\n');
    });

    it('should classify result and error frames', () => {
        const result = parseResponseFrame({ id: 'c1', result: [1, 2] }, 'test');
        const failure = parseResponseFrame({ id: 'c2', error: 'boom' }, 'test');

        assert.strictEqual(isErrorFrame(result), false);
        assert.strictEqual(isErrorFrame(failure), true);
    });

    it('should accept a result frame with a null result', () => {
        const frame = parseResponseFrame({ id: 'c3', result: null }, 'test');
        assert.strictEqual(isErrorFrame(frame), false);
    });

    it('should reject frames without an id', () => {
        assert.throws(() => parseResponseFrame({ result: 1 }, 'test'), ValidationError);
        assert.throws(() => parseResponseFrame({ id: '', error: 'x' }, 'test'), ValidationError);
    });

    describe('LineDecoder', () => {
        it('should keep a partial line until it is completed', () => {
            const decoder = new LineDecoder();

            assert.deepStrictEqual(decoder.push('{"id":"a"'), []);
            assert.deepStrictEqual(decoder.push(',"result":1}\n{"id":"b",'), ['{"id":"a","result":1}']);
            assert.deepStrictEqual(decoder.push('"result":2}\n'), ['{"id":"b","result":2}']);
        });

        it('should skip blank lines', () => {
            const decoder = new LineDecoder();
            assert.deepStrictEqual(decoder.push('\n  \n{"id":"a","result":1}\n\n'), ['{"id":"a","result":1}']);
        });

        it('should refuse an oversized line and start over', () => {
            const decoder = new LineDecoder(8);

            assert.throws(() => decoder.push('0123456789'), { message: 'RPC frame exceeds 8 characters' });
            assert.deepStrictEqual(decoder.push('ok\n'), ['ok']);
        });

        it('should measure a line in characters, not encoded bytes', () => {
            const decoder = new LineDecoder(4);

            // Four characters, eight bytes in UTF-8.
            assert.deepStrictEqual(decoder.push('éééé'), []);
            assert.deepStrictEqual(decoder.push('\n'), ['éééé']);
        });

        it('should drop buffered data on reset', () => {
            const decoder = new LineDecoder();
            decoder.push('stale');
            decoder.reset();

            assert.deepStrictEqual(decoder.push('fresh\n'), ['fresh']);
        });
    });
});
