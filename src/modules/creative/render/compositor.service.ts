import { Injectable, Logger } from '@nestjs/common';
import { createCanvas, SKRSContext2D } from '@napi-rs/canvas';
import { RenderError } from '../../../common/errors/render.errors';
import { toCssColor } from '../../../common/utils/color.util';
import { CreativeMessage } from '../../../libs/messages';
import { CtaGeometry, DecodedImage, LayoutPlan, LogoGeometry, PlacedText, Rgb, RgbaFill } from '../../../libs/types/Creative';
import { cssFont } from '../fonts/canvas-text-measurer';

export interface AdPalette {
    primary: Rgb;
    secondary: Rgb;
    accent: Rgb;
    text: Rgb;
}

export interface CompositeInput {
    plan: LayoutPlan;
    palette: AdPalette;
    background: DecodedImage;
    logo: DecodedImage | null;
    /** Black overlay strength 0–1; null leaves the photo untouched */
    overlayOpacity: number | null;
}

interface TextShadow {
    fill: RgbaFill;
    offset: number;
}

const HEADLINE_SHADOW: TextShadow = { fill: { r: 60, g: 60, b: 60, alpha: 0.6 }, offset: 3 };
const SUBHEADLINE_SHADOW: TextShadow = { fill: { r: 60, g: 60, b: 60, alpha: 0.5 }, offset: 2 };

/**
 * Compositor
 *
 * Draws a finished LayoutPlan onto a new canvas in a fixed order:
 * background, overlay, headline, subheadline, CTA, logo plaque, logo.
 */
@Injectable()
export class CompositorService {
    private readonly logger = new Logger(CompositorService.name);

    async render(input: CompositeInput): Promise<Buffer> {
        const { plan, palette } = input;
        const { width, height } = plan.canvas;
        if (width <= 0 || height <= 0) {
            throw new RenderError(`${CreativeMessage.EMPTY_CANVAS} (${width}x${height})`);
        }

        const canvas = createCanvas(width, height);
        const ctx = canvas.getContext('2d');

        // 1. Opaque base + cover-cropped background
        ctx.fillStyle = '#ffffff';
        ctx.fillRect(0, 0, width, height);
        this.drawCover(ctx, input.background, width, height);

        // 2. Overlay
        if (input.overlayOpacity !== null && input.overlayOpacity > 0) {
            ctx.fillStyle = toCssColor({ r: 0, g: 0, b: 0, alpha: input.overlayOpacity });
            ctx.fillRect(0, 0, width, height);
        }

        // 3-4. Text blocks
        this.drawText(ctx, plan.headline, palette.text, HEADLINE_SHADOW);
        if (plan.subheadline) {
            this.drawText(ctx, plan.subheadline, palette.text, SUBHEADLINE_SHADOW);
        }

        // 5. CTA
        if (plan.cta) {
            this.drawCta(ctx, plan.cta, palette);
        }

        // 6-7. Logo
        if (plan.logo && input.logo) {
            this.drawLogo(ctx, plan.logo, input.logo);
        } else if (plan.logo) {
            this.logger.warn('Logo was planned without a decoded image, skipping');
        }

        const png = await canvas.encode('png');
        this.logger.log(`Encoded ${width}x${height} PNG (${(png.length / 1024).toFixed(1)} KB)`);
        return png;
    }

    // ═══════════════════════════════════════════════════════════
    // LAYERS
    // ═══════════════════════════════════════════════════════════

    private drawCover(ctx: SKRSContext2D, background: DecodedImage, width: number, height: number): void {
        const scale = Math.max(width / background.width, height / background.height);
        const sourceWidth = width / scale;
        const sourceHeight = height / scale;
        const sourceX = (background.width - sourceWidth) / 2;
        const sourceY = (background.height - sourceHeight) / 2;

        ctx.drawImage(background.image, sourceX, sourceY, sourceWidth, sourceHeight, 0, 0, width, height);
    }

    private drawText(ctx: SKRSContext2D, placed: PlacedText, color: Rgb, shadow: TextShadow): void {
        ctx.font = cssFont(placed.block.font);
        ctx.textBaseline = 'alphabetic';
        ctx.textAlign = 'left';

        for (const line of placed.lines) {
            // line.y is the top of the ink box
            const baseline = line.y + ctx.measureText(line.text).actualBoundingBoxAscent;

            ctx.fillStyle = toCssColor(shadow.fill);
            ctx.fillText(line.text, line.x + shadow.offset, baseline + shadow.offset);

            ctx.fillStyle = toCssColor(color);
            ctx.fillText(line.text, line.x, baseline);
        }
    }

    private drawCta(ctx: SKRSContext2D, cta: CtaGeometry, palette: AdPalette): void {
        ctx.fillStyle = toCssColor(palette.accent);
        roundedRectPath(ctx, cta.x, cta.y, cta.width, cta.height, cta.radius);
        ctx.fill();

        ctx.font = cssFont(cta.font);
        ctx.textBaseline = 'alphabetic';
        ctx.textAlign = 'left';
        ctx.fillStyle = toCssColor(palette.primary);
        ctx.fillText(cta.label.text, cta.label.x, cta.label.y + ctx.measureText(cta.label.text).actualBoundingBoxAscent);
    }

    private drawLogo(ctx: SKRSContext2D, geometry: LogoGeometry, logo: DecodedImage): void {
        const { plaque } = geometry;
        if (plaque) {
            ctx.fillStyle = toCssColor(plaque.fill);
            roundedRectPath(
                ctx,
                geometry.x - plaque.margin,
                geometry.y - plaque.margin,
                geometry.width + 2 * plaque.margin,
                geometry.height + 2 * plaque.margin,
                plaque.radius,
            );
            ctx.fill();
        }

        ctx.drawImage(logo.image, geometry.x, geometry.y, geometry.width, geometry.height);
    }
}

function roundedRectPath(ctx: SKRSContext2D, x: number, y: number, w: number, h: number, radius: number): void {
    const r = Math.max(0, Math.min(radius, Math.min(w, h) * 0.5));
    ctx.beginPath();
    ctx.moveTo(x + r, y);
    ctx.lineTo(x + w - r, y);
    ctx.quadraticCurveTo(x + w, y, x + w, y + r);
    ctx.lineTo(x + w, y + h - r);
    ctx.quadraticCurveTo(x + w, y + h, x + w - r, y + h);
    ctx.lineTo(x + r, y + h);
    ctx.quadraticCurveTo(x, y + h, x, y + h - r);
    ctx.lineTo(x, y + r);
    ctx.quadraticCurveTo(x, y, x + r, y);
    ctx.closePath();
}
