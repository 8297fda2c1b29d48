import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FontCacheService } from './font-cache.service';
import { buildRenderConfig, configServiceFor } from '../testing/render-config.fixture';

describe('FontCacheService', () => {
    let cacheDir: string;
    let cache: FontCacheService;

    beforeEach(async () => {
        cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'font-cache-spec-'));
        cache = new FontCacheService(configServiceFor(buildRenderConfig({ fontCacheDir: cacheDir })));
    });

    afterEach(async () => {
        await fs.rm(cacheDir, { recursive: true, force: true });
    });

    it('derives a stable url key', () => {
        const key = cache.keyForUrl('https://fonts.test/brand.ttf');
        expect(key).toMatch(/^custom-[0-9a-f]{16}$/);
        expect(cache.keyForUrl('https://fonts.test/brand.ttf')).toBe(key);
        expect(cache.keyForUrl('https://fonts.test/other.ttf')).not.toBe(key);
    });

    it('populates a key once for concurrent callers', async () => {
        const populate = jest.fn(async () => Buffer.from('font-bytes'));

        const paths = await Promise.all([
            cache.acquire('montserrat-bold', populate),
            cache.acquire('montserrat-bold', populate),
            cache.acquire('montserrat-bold', populate),
        ]);

        expect(populate).toHaveBeenCalledTimes(1);
        expect(new Set(paths)).toEqual(new Set([path.join(cacheDir, 'montserrat-bold.ttf')]));
        expect(await fs.readFile(paths[0], 'utf8')).toBe('font-bytes');
    });

    it('serves later calls from memory', async () => {
        const populate = jest.fn(async () => Buffer.from('font-bytes'));

        await cache.acquire('montserrat-semibold', populate);
        await cache.acquire('montserrat-semibold', populate);

        expect(populate).toHaveBeenCalledTimes(1);
    });

    it('leaves only the final file behind', async () => {
        await cache.acquire('montserrat-bold', async () => Buffer.from('font-bytes'));
        expect(await fs.readdir(cacheDir)).toEqual(['montserrat-bold.ttf']);
    });

    it('reuses a file already on disk', async () => {
        await fs.writeFile(path.join(cacheDir, 'montserrat-bold.ttf'), 'from-disk');
        const populate = jest.fn(async () => Buffer.from('font-bytes'));

        const filePath = await cache.acquire('montserrat-bold', populate);

        expect(populate).not.toHaveBeenCalled();
        expect(await fs.readFile(filePath, 'utf8')).toBe('from-disk');
    });

    it('does not remember failures', async () => {
        const populate = jest
            .fn<Promise<Buffer>, []>()
            .mockRejectedValueOnce(new Error('offline'))
            .mockResolvedValueOnce(Buffer.from('font-bytes'));

        await expect(cache.acquire('montserrat-bold', populate)).rejects.toThrow('offline');
        await expect(cache.acquire('montserrat-bold', populate)).resolves.toBe(path.join(cacheDir, 'montserrat-bold.ttf'));
        expect(populate).toHaveBeenCalledTimes(2);
    });

    it('rejects an empty download', async () => {
        await expect(cache.acquire('montserrat-bold', async () => Buffer.alloc(0))).rejects.toThrow('is empty');
        expect(await fs.readdir(cacheDir)).toEqual([]);
    });

    it('populates an evicted key again', async () => {
        const populate = jest
            .fn<Promise<Buffer>, []>()
            .mockResolvedValueOnce(Buffer.from('<html>'))
            .mockResolvedValueOnce(Buffer.from('font-bytes'));

        const filePath = await cache.acquire('montserrat-bold', populate);
        await cache.evict('montserrat-bold');
        expect(await fs.readdir(cacheDir)).toEqual([]);

        await expect(cache.acquire('montserrat-bold', populate)).resolves.toBe(filePath);
        expect(populate).toHaveBeenCalledTimes(2);
        expect(await fs.readFile(filePath, 'utf8')).toBe('font-bytes');
    });
});
