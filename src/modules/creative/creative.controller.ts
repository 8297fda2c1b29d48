import { Body, Controller, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreativeService } from './creative.service';
import { GenerateAdDto } from './dto/generate-ad.dto';
import { GenerateAdResponse } from '../../libs/types/Creative';

/**
 * Creative Controller
 *
 * Endpoints:
 * - POST /generate-ad → Render one ad creative and return it as base64 PNG
 */
@ApiTags('creative')
@Controller()
export class CreativeController {
    private readonly logger = new Logger(CreativeController.name);

    constructor(private readonly creativeService: CreativeService) {}

    // ═══════════════════════════════════════════════════════════
    // POST /generate-ad - Render Ad
    // ═══════════════════════════════════════════════════════════

    @Post('generate-ad')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Render an ad creative from a background, copy and logo' })
    async generateAd(@Body() dto: GenerateAdDto): Promise<GenerateAdResponse> {
        this.logger.log(`Generate request received (format: ${dto.format || 'default'})`);
        return this.creativeService.generate(dto);
    }
}
