import { BadRequestException, HttpException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { hexToRgb } from '../../common/utils/color.util';
import { FontWeight } from '../../libs/enums/CreativeEnums';
import { CreativeMessage } from '../../libs/messages';
import { AdSpec, DecodedImage, GenerateAdResponse } from '../../libs/types/Creative';
import { RenderConfig } from '../../config/render.config';
import { AssetFetcherService } from './assets/asset-fetcher.service';
import { FormatCatalogService } from './configurations/format-catalog.service';
import { toAdSpec } from './dto/ad-spec.mapper';
import { GenerateAdDto } from './dto/generate-ad.dto';
import { CanvasTextMeasurer } from './fonts/canvas-text-measurer';
import { FontResolverService } from './fonts/font-resolver.service';
import { LayoutPlannerService, PlanFonts } from './layout/layout-planner.service';
import { AdPalette, CompositorService } from './render/compositor.service';

/**
 * Creative Service
 *
 * Orchestrates one render: request → AdSpec → assets and fonts →
 * layout plan → composited PNG.
 *
 * Background failures are the caller's fault (400); logo and font
 * failures degrade silently; anything else is a 500.
 */
@Injectable()
export class CreativeService {
    private readonly logger = new Logger(CreativeService.name);
    private readonly timeouts: RenderConfig['timeouts'];

    constructor(
        private readonly configService: ConfigService,
        private readonly formatCatalog: FormatCatalogService,
        private readonly assetFetcher: AssetFetcherService,
        private readonly fontResolver: FontResolverService,
        private readonly layoutPlanner: LayoutPlannerService,
        private readonly compositor: CompositorService,
    ) {
        this.timeouts = this.configService.getOrThrow<RenderConfig>('render').timeouts;
    }

    // ═══════════════════════════════════════════════════════════
    // GENERATE AD
    // ═══════════════════════════════════════════════════════════

    async generate(dto: GenerateAdDto): Promise<GenerateAdResponse> {
        const startTime = Date.now();

        try {
            const spec = toAdSpec(dto);
            const preset = this.formatCatalog.resolve(spec.format);
            this.logger.log(`🎨 Rendering "${spec.headline.substring(0, 40)}" as ${preset.name} (${preset.width}x${preset.height})`);

            // 1. Colours first: a bad hex should not cost a download
            const palette = toPalette(spec);

            // 2. Background (hard requirement)
            const background = await this.fetchBackground(spec.backgroundUrl);

            // 3. Fonts and logo (soft)
            const [fonts, logo] = await Promise.all([this.resolveFonts(spec), this.fetchLogo(spec.logoUrl)]);

            // 4. Layout
            const plan = this.layoutPlanner.plan({
                spec,
                preset,
                fonts,
                measurer: new CanvasTextMeasurer(),
                logo: logo ? { width: logo.width, height: logo.height } : null,
            });

            // 5. Composite
            const png = await this.compositor.render({
                plan,
                palette,
                background,
                logo,
                overlayOpacity: spec.overlay ? spec.overlayOpacity : null,
            });

            const direction = plan.headline.block.direction;
            this.logger.log(`✅ ${CreativeMessage.RENDER_COMPLETED} in ${Date.now() - startTime}ms (${direction})`);

            return {
                success: true,
                image_base64: png.toString('base64'),
                format: preset.name,
                dimensions: `${preset.width}x${preset.height}`,
                text_direction: direction,
            };
        } catch (error) {
            if (error instanceof HttpException) throw error;

            const errMsg = error instanceof Error ? error.message : String(error);
            this.logger.error(`Render failed after ${Date.now() - startTime}ms: ${errMsg}`, error instanceof Error ? error.stack : undefined);
            throw new InternalServerErrorException(`${CreativeMessage.RENDER_FAILED}: ${errMsg}`);
        }
    }

    // ═══════════════════════════════════════════════════════════
    // HELPERS
    // ═══════════════════════════════════════════════════════════

    private async fetchBackground(url: string): Promise<DecodedImage> {
        const outcome = await this.assetFetcher.fetchImage(url, this.timeouts.backgroundMs);
        if (!outcome.ok) {
            this.logger.warn(`Background unavailable: ${outcome.error.message}`);
            throw new BadRequestException(`${CreativeMessage.BACKGROUND_FETCH_FAILED}: ${outcome.error.message}`);
        }
        return outcome.value;
    }

    private async fetchLogo(url: string | null): Promise<DecodedImage | null> {
        if (!url) return null;

        const outcome = await this.assetFetcher.fetchImage(url, this.timeouts.logoMs);
        if (!outcome.ok) {
            this.logger.warn(`Logo skipped: ${outcome.error.message}`);
            return null;
        }
        return outcome.value;
    }

    private async resolveFonts(spec: AdSpec): Promise<PlanFonts> {
        const [headline, subheadline, cta] = await Promise.all([
            this.fontResolver.resolve({ weight: FontWeight.BOLD, customUrl: spec.headlineFontUrl ?? undefined }),
            this.fontResolver.resolve({ weight: FontWeight.SEMIBOLD, customUrl: spec.bodyFontUrl ?? undefined }),
            this.fontResolver.resolve({ weight: FontWeight.BOLD, customUrl: spec.bodyFontUrl ?? undefined }),
        ]);

        this.logger.log(`Fonts: headline=${headline.family} (${headline.source}), body=${subheadline.family} (${subheadline.source})`);
        return { headline, subheadline, cta };
    }
}

function toPalette(spec: AdSpec): AdPalette {
    return {
        primary: hexToRgb(spec.colors.primary),
        secondary: hexToRgb(spec.colors.secondary),
        accent: hexToRgb(spec.colors.accent),
        text: hexToRgb(spec.colors.text),
    };
}
