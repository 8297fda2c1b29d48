import { Controller, Get } from '@nestjs/common';
import { FormatCatalogService } from './format-catalog.service';
import { FormatCatalogEntry } from '../../../libs/types/Creative';

/**
 * Configurations Controller
 *
 * Endpoints:
 * - GET /configs/formats → List all supported formats with aliases and safe zones
 */
@Controller('configs')
export class ConfigurationsController {
    constructor(private readonly formatCatalog: FormatCatalogService) {}

    // ═══════════════════════════════════════════════════════════
    // GET /configs/formats - Ad Formats
    // ═══════════════════════════════════════════════════════════

    @Get('formats')
    getFormats(): { success: boolean; formats: FormatCatalogEntry[] } {
        return {
            success: true,
            formats: this.formatCatalog.list(),
        };
    }
}
