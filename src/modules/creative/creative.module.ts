import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CreativeController } from './creative.controller';
import { CreativeService } from './creative.service';
import { ConfigurationsModule } from './configurations/configurations.module';
import { AssetFetcherService } from './assets/asset-fetcher.service';
import { FontCacheService } from './fonts/font-cache.service';
import { FontRegistryService } from './fonts/font-registry.service';
import { FontResolverService } from './fonts/font-resolver.service';
import { BidiShaperService } from './text/bidi-shaper.service';
import { LayoutPlannerService } from './layout/layout-planner.service';
import { CompositorService } from './render/compositor.service';

/**
 * Creative Module
 *
 * Full render pipeline:
 * - Asset fetcher for backgrounds, logos and font files
 * - Font cache + resolver with remote, system and built-in fallbacks
 * - Bidi shaper and layout planner for text placement
 * - Compositor for the final PNG
 */
@Module({
    imports: [
        ConfigModule,
        ConfigurationsModule, // Provides FormatCatalogService
    ],
    controllers: [CreativeController],
    providers: [
        CreativeService,
        AssetFetcherService,
        FontCacheService,
        FontRegistryService,
        FontResolverService,
        BidiShaperService,
        LayoutPlannerService,
        CompositorService,
    ],
    exports: [CreativeService],
})
export class CreativeModule {}
