import path from 'path';
import { describe, expect, it } from 'vitest';
import type { FileStore } from './fileStore';
import { ShareInUseError, ShareRegistry } from './shareRegistry';

function storeFor(filePath: string): FileStore {
    return {
        path: filePath,
        read: async () => Buffer.alloc(0),
        write: async () => {},
    };
}

describe('ShareRegistry', () => {
    it('hands out pending shares oldest first', () => {
        const registry = new ShareRegistry();
        registry.add('/srv/a.txt', storeFor('/srv/a.txt'));
        registry.add('/srv/b.txt', storeFor('/srv/b.txt'));

        expect(registry.claimNext()?.path).toBe('/srv/a.txt');
        expect(registry.claimNext()?.path).toBe('/srv/b.txt');
        expect(registry.claimNext()).toBeUndefined();
    });

    it('refuses a second share of the same path', () => {
        const registry = new ShareRegistry();
        registry.add('/srv/a.txt', storeFor('/srv/a.txt'));

        expect(() => registry.add('/srv/../srv/a.txt', storeFor('/srv/a.txt'))).toThrow(ShareInUseError);

        registry.claimNext();
        expect(() => registry.add('/srv/a.txt', storeFor('/srv/a.txt'))).toThrow(ShareInUseError);
    });

    it('frees the path once the share is released', () => {
        const registry = new ShareRegistry();
        registry.add('/srv/a.txt', storeFor('/srv/a.txt'));
        const share = registry.claimNext();
        expect(share?.status).toBe('active');

        expect(share && registry.release(share)).toBe(true);
        expect(registry.has('/srv/a.txt')).toBe(false);
        expect(registry.size).toBe(0);
        expect(registry.add('/srv/a.txt', storeFor('/srv/a.txt')).status).toBe('pending');
    });

    it('resolves relative paths against the working directory', () => {
        const registry = new ShareRegistry();
        const share = registry.add('notes.txt', storeFor('notes.txt'));

        expect(share.path).toBe(path.resolve('notes.txt'));
    });

    it('lists pending and active shares', () => {
        const registry = new ShareRegistry();
        registry.add('/srv/a.txt', storeFor('/srv/a.txt'));
        registry.add('/srv/b.txt', storeFor('/srv/b.txt'));
        registry.claimNext();

        expect(registry.list().map(({ path: p, status }) => [p, status])).toEqual([
            ['/srv/b.txt', 'pending'],
            ['/srv/a.txt', 'active'],
        ]);
        expect(registry.releasePending().map((share) => share.path)).toEqual(['/srv/b.txt']);
        expect(registry.size).toBe(1);
    });
});
