import { Module } from '@nestjs/common';
import { ConfigurationsController } from './configurations.controller';
import { FormatCatalogService } from './format-catalog.service';

/**
 * Configurations Module
 *
 * Owns the format catalog and serves it for frontend dropdowns.
 */
@Module({
    controllers: [ConfigurationsController],
    providers: [FormatCatalogService],
    exports: [FormatCatalogService],
})
export class ConfigurationsModule {}
