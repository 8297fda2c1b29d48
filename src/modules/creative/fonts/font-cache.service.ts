import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RenderConfig } from '../../../config/render.config';

/**
 * Font Cache
 *
 * Content-addressed font files on local disk, shared by every request.
 * Each key is populated at most once: concurrent callers wait on the same
 * in-flight promise, and files appear under their final name only after a
 * complete write. Failed populations are not remembered.
 */
@Injectable()
export class FontCacheService {
    private readonly logger = new Logger(FontCacheService.name);
    private readonly cacheDir: string;
    private readonly ready = new Map<string, string>();
    private readonly inFlight = new Map<string, Promise<string>>();

    constructor(private readonly configService: ConfigService) {
        this.cacheDir =
            this.configService.get<RenderConfig>('render')?.fontCacheDir ?? path.join(os.tmpdir(), 'ad-creative-fonts');
    }

    /** Cache key for a font fetched from an arbitrary URL */
    keyForUrl(url: string): string {
        return `custom-${createHash('sha256').update(url).digest('hex').substring(0, 16)}`;
    }

    pathFor(key: string): string {
        return path.join(this.cacheDir, `${key}.ttf`);
    }

    async acquire(key: string, populate: () => Promise<Buffer>): Promise<string> {
        const known = this.ready.get(key);
        if (known) return known;

        const pending = this.inFlight.get(key);
        if (pending) return pending;

        const task = this.populate(key, populate).finally(() => this.inFlight.delete(key));
        this.inFlight.set(key, task);
        return task;
    }

    /** Forgets a cached file; the next acquire populates it again */
    async evict(key: string): Promise<void> {
        this.ready.delete(key);
        await fs.rm(this.pathFor(key), { force: true });
        this.logger.warn(`Evicted font ${key}`);
    }

    private async populate(key: string, populate: () => Promise<Buffer>): Promise<string> {
        const target = this.pathFor(key);

        if (await fileExists(target)) {
            this.ready.set(key, target);
            return target;
        }

        const data = await populate();
        if (data.length === 0) {
            throw new Error(`Font source for "${key}" is empty`);
        }

        await fs.mkdir(this.cacheDir, { recursive: true });
        const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
        await fs.writeFile(temp, data);
        await fs.rename(temp, target);

        this.logger.log(`Cached font ${key} (${(data.length / 1024).toFixed(1)} KB)`);
        this.ready.set(key, target);
        return target;
    }
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        return stats.isFile() && stats.size > 0;
    } catch {
        return false;
    }
}
