import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FontSource, FontWeight } from '../../../libs/enums/CreativeEnums';
import { FontRequest, ResolvedFont } from '../../../libs/types/Creative';
import { RenderConfig } from '../../../config/render.config';
import { AssetFetcherService } from '../assets/asset-fetcher.service';
import { FontCacheService, fileExists } from './font-cache.service';
import { FontRegistryService } from './font-registry.service';

export const BUILTIN_FAMILY = 'sans-serif';

/**
 * Font Resolver
 *
 * Walks custom URL → primary remote → alternate remote → system paths →
 * built-in family. Every failed step is logged and skipped; resolution
 * itself never fails.
 */
@Injectable()
export class FontResolverService {
    private readonly logger = new Logger(FontResolverService.name);
    private readonly config: RenderConfig;
    // file path → registered family alias
    private readonly registered = new Map<string, string>();

    constructor(
        private readonly configService: ConfigService,
        private readonly fontCache: FontCacheService,
        private readonly assetFetcher: AssetFetcherService,
        private readonly fontRegistry: FontRegistryService,
    ) {
        this.config = this.configService.getOrThrow<RenderConfig>('render');
    }

    async resolve(request: FontRequest): Promise<ResolvedFont> {
        const { weight, customUrl } = request;

        if (customUrl) {
            const family = await this.tryRemote(this.fontCache.keyForUrl(customUrl), customUrl, this.config.timeouts.customFontMs);
            if (family) return { family, weight, source: FontSource.CUSTOM };
        }

        const sources = this.config.fonts[weight];
        const primary = await this.tryRemote(`montserrat-${weight}`, sources.primaryUrl, this.config.timeouts.fontMs);
        if (primary) return { family: primary, weight, source: FontSource.PRIMARY };

        const alternate = await this.tryRemote(`montserrat-${weight}-alt`, sources.alternateUrl, this.config.timeouts.fontMs);
        if (alternate) return { family: alternate, weight, source: FontSource.ALTERNATE };

        for (const candidate of this.config.systemFontPaths) {
            if (!(await fileExists(candidate))) continue;
            const family = this.register(candidate, `system-${weight}`);
            if (family) return { family, weight, source: FontSource.SYSTEM };
        }

        this.logger.warn(`No font file available for ${weight}, using built-in ${BUILTIN_FAMILY}`);
        return { family: BUILTIN_FAMILY, weight, source: FontSource.BUILTIN };
    }

    private async tryRemote(key: string, url: string, timeoutMs: number): Promise<string | null> {
        if (!url) return null;

        try {
            const filePath = await this.fontCache.acquire(key, () => this.assetFetcher.download(url, timeoutMs));
            const family = this.register(filePath, key);
            if (!family) {
                this.logger.warn(`Font ${key} could not be registered from ${filePath}, evicting`);
                await this.fontCache.evict(key);
            }
            return family;
        } catch (error) {
            const errMsg = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Font ${key} unavailable from ${url.substring(0, 80)}: ${errMsg}`);
            return null;
        }
    }

    /** Registers a font file once under its alias; null when the file is not a usable font */
    private register(filePath: string, alias: string): string | null {
        const known = this.registered.get(filePath);
        if (known) return known;

        if (!this.fontRegistry.register(filePath, alias)) return null;

        this.registered.set(filePath, alias);
        return alias;
    }
}

export function cssWeight(weight: FontWeight): number {
    return weight === FontWeight.BOLD ? 700 : 600;
}
