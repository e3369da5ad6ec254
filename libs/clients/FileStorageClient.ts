import { z } from 'zod';
import { LRUCache } from 'lru-cache';
import { RemoteCallError } from '../errors/coordinationErrors.js';
import { RpcChannel, InvokeStatus } from '../rpc/RpcChannel.js';

const DigestSchema = z.string().min(1);
const ContentSchema = z.string();

export type StoreOutcome<TTag> =
    | { readonly ok: true; readonly digest: string; readonly tag: TTag }
    | { readonly ok: false; readonly error: string; readonly tag: TTag };

export interface ContentStore {
    putFile<TTag>(
        data: Buffer,
        description: string,
        onComplete: (outcome: StoreOutcome<TTag>) => void,
        tag: TTag
    ): InvokeStatus;
    getFile(digest: string): Promise<Buffer>;
}

const CACHE_MAX_BYTES = 64 * 1024 * 1024;

/**
 * Client of the content-addressed file store. Digests are opaque here:
 * identical content yields the same digest, which is why fetched bodies can
 * be cached by digest indefinitely.
 */
export class FileStorageClient implements ContentStore {
    private readonly cache = new LRUCache<string, Buffer>({
        max: 512,
        maxSize: CACHE_MAX_BYTES,
        sizeCalculation: body => Math.max(body.length, 1)
    });

    constructor(private readonly channel: RpcChannel) { }

    putFile<TTag>(
        data: Buffer,
        description: string,
        onComplete: (outcome: StoreOutcome<TTag>) => void,
        tag: TTag
    ): InvokeStatus {
        return this.channel.invoke(
            'put_file',
            { binary_data: data.toString('base64'), description },
            outcome => {
                if (!outcome.ok) {
                    onComplete({ ok: false, error: outcome.error, tag: outcome.tag });
                    return;
                }
                const parsed = DigestSchema.safeParse(outcome.result);
                if (parsed.success) {
                    onComplete({ ok: true, digest: parsed.data, tag: outcome.tag });
                } else {
                    onComplete({ ok: false, error: 'File storage answered without a digest', tag: outcome.tag });
                }
            },
            tag
        );
    }

    async getFile(digest: string): Promise<Buffer> {
        const cached = this.cache.get(digest);
        if (cached) return cached;

        const result = await this.channel.call('get_file', { digest });
        const parsed = ContentSchema.safeParse(result);
        if (!parsed.success) {
            throw new RemoteCallError(`File storage returned malformed content for ${digest}`);
        }
        const body = Buffer.from(parsed.data, 'base64');
        this.cache.set(digest, body);
        return body;
    }
}
