import { Injectable } from '@nestjs/common';
import { HeadlinePosition, LogoAnchor, LogoBackground, ResolvedAlignment, TextAlignment, TextDirection } from '../../../libs/enums/CreativeEnums';
import {
    AdSpec,
    CtaGeometry,
    FontHandle,
    FormatPreset,
    LayoutPlan,
    LogoGeometry,
    PlacedLine,
    PlacedText,
    ResolvedFont,
    Size,
    TextBlock,
    TextMeasurer,
} from '../../../libs/types/Creative';
import { BidiShaperService } from '../text/bidi-shaper.service';
import { ctaSize, headlineSize, subheadlineSize } from '../text/font-sizer';
import { wrapText } from '../text/line-wrapper';
import { detectDirection } from '../text/text-direction';
import { fitLogo, plaqueFor, positionLogo } from './logo-grid';

// ═══════════════════════════════════════════════════════════
// SPACING
// ═══════════════════════════════════════════════════════════

const PADDING_RATIO = 0.05;
const HEADLINE_LINE_GAP = 15;
const SUBHEADLINE_GAP = 15;
const SUBHEADLINE_LINE_GAP = 8;
const CTA_GAP = 30;
const CTA_PADDING_X = 100;
const CTA_PADDING_Y = 50;
// glyph boxes sit low in the button without this lift
const CTA_LABEL_LIFT = 0.15;
const BOTTOM_START_RATIO = 0.45;

/** Families picked for each text block; sizes are assigned here */
export interface PlanFonts {
    headline: ResolvedFont;
    subheadline: ResolvedFont;
    cta: ResolvedFont;
}

export interface PlanInput {
    spec: AdSpec;
    preset: FormatPreset;
    fonts: PlanFonts;
    measurer: TextMeasurer;
    /** Natural size of the decoded logo, when one was fetched */
    logo: Size | null;
}

/**
 * Vertical Layout Planner
 *
 * Pure geometry: decides every text line, button and logo box inside the
 * format's content band. Nothing is drawn here.
 */
@Injectable()
export class LayoutPlannerService {
    constructor(private readonly bidiShaper: BidiShaperService) {}

    plan(input: PlanInput): LayoutPlan {
        const { spec, preset, fonts, measurer } = input;
        const { width, height } = preset;

        const padding = Math.round(width * PADDING_RATIO);
        const safeTopPx = Math.round(height * preset.safeTop);
        const safeBottomPx = height - Math.round(height * preset.safeBottom);
        const maxContentWidth = width - 2 * padding;

        let y = this.startY(spec.headlinePosition, padding, safeTopPx, safeBottomPx);

        // 1. Headline
        const headlineBlock = this.buildBlock(
            spec.headline,
            { ...fonts.headline, size: headlineSize(spec.headline, width) },
            spec.uppercaseHeadline,
            spec.textAlignment,
            maxContentWidth,
            measurer,
        );
        const headline = this.placeLines(headlineBlock, y, width, padding, HEADLINE_LINE_GAP, measurer);
        y = headline.nextY;

        // 2. Subheadline
        let subheadline: PlacedText | null = null;
        if (spec.subheadline && spec.subheadline.trim()) {
            y += SUBHEADLINE_GAP;
            const block = this.buildBlock(
                spec.subheadline,
                { ...fonts.subheadline, size: subheadlineSize(width) },
                false,
                spec.textAlignment,
                maxContentWidth,
                measurer,
            );
            const placed = this.placeLines(block, y, width, padding, SUBHEADLINE_LINE_GAP, measurer);
            subheadline = placed.text;
            y = placed.nextY;
        }

        // 3. CTA button
        let cta: CtaGeometry | null = null;
        if (spec.ctaText && spec.ctaText.trim()) {
            cta = this.planCta(spec, { ...fonts.cta, size: ctaSize(width) }, y, width, padding, measurer);
        }

        // 4. Logo
        const logo = input.logo
            ? this.planLogo(input.logo, preset, spec.logoAnchor, spec.logoBackground, spec.logoScale, padding, safeTopPx, safeBottomPx)
            : null;

        return {
            canvas: { width, height },
            padding,
            safeTopPx,
            safeBottomPx,
            headline: headline.text,
            subheadline,
            cta,
            logo,
        };
    }

    startY(position: HeadlinePosition, padding: number, safeTopPx: number, safeBottomPx: number): number {
        const band = safeBottomPx - safeTopPx;
        switch (position) {
            case HeadlinePosition.TOP:
                return safeTopPx + padding;
            case HeadlinePosition.MIDDLE:
                return safeTopPx + Math.floor(band / 3);
            case HeadlinePosition.BOTTOM:
                return safeBottomPx - Math.round(band * BOTTOM_START_RATIO);
        }
    }

    planLogo(
        natural: Size,
        preset: FormatPreset,
        anchor: LogoAnchor,
        background: LogoBackground,
        scale: number,
        padding: number,
        safeTopPx: number,
        safeBottomPx: number,
    ): LogoGeometry {
        const size = fitLogo(natural, preset, preset.surface, scale);
        const point = positionLogo(anchor, size.width, size.height, preset.width, preset.height, padding, safeTopPx, safeBottomPx);
        return { ...point, ...size, plaque: plaqueFor(background) };
    }

    // ═══════════════════════════════════════════════════════════
    // HELPERS
    // ═══════════════════════════════════════════════════════════

    private buildBlock(
        text: string,
        font: FontHandle,
        uppercase: boolean,
        requested: TextAlignment,
        maxWidth: number,
        measurer: TextMeasurer,
    ): TextBlock {
        const direction = detectDirection(text);
        const source = uppercase && direction === TextDirection.LTR ? text.toUpperCase() : text;
        const lines = this.bidiShaper.shapeLines(source, (value) => wrapText(value, font, maxWidth, measurer));

        return {
            source,
            direction,
            alignment: resolveAlignment(requested, direction),
            lines,
            font,
        };
    }

    private placeLines(
        block: TextBlock,
        startY: number,
        canvasWidth: number,
        padding: number,
        lineGap: number,
        measurer: TextMeasurer,
    ): { text: PlacedText; nextY: number } {
        let y = startY;
        const lines: PlacedLine[] = [];

        for (const line of block.lines) {
            const metrics = measurer.measure(line, block.font);
            lines.push({
                text: line,
                x: alignX(block.alignment, metrics.width, canvasWidth, padding),
                y,
                width: metrics.width,
                height: metrics.height,
            });
            y += metrics.height + lineGap;
        }

        return { text: { block, y: startY, lines }, nextY: y };
    }

    private planCta(
        spec: AdSpec,
        font: FontHandle,
        currentY: number,
        canvasWidth: number,
        padding: number,
        measurer: TextMeasurer,
    ): CtaGeometry {
        const raw = spec.ctaText ?? '';
        const direction = detectDirection(raw);
        const source = spec.uppercaseCta && direction === TextDirection.LTR ? raw.toUpperCase() : raw;
        const label = this.bidiShaper.shape(source);

        const metrics = measurer.measure(label, font);
        const width = metrics.width + CTA_PADDING_X;
        const height = metrics.height + CTA_PADDING_Y;
        const x = alignX(resolveAlignment(spec.textAlignment, direction), width, canvasWidth, padding);
        const y = currentY + CTA_GAP;

        return {
            x,
            y,
            width,
            height,
            radius: Math.floor(height / 2),
            direction,
            font,
            label: {
                text: label,
                x: x + Math.floor((width - metrics.width) / 2),
                y: y + Math.floor((height - metrics.height) / 2) - Math.round(CTA_LABEL_LIFT * metrics.height),
                width: metrics.width,
                height: metrics.height,
            },
        };
    }
}

export function resolveAlignment(requested: TextAlignment, direction: TextDirection): ResolvedAlignment {
    if (requested !== TextAlignment.AUTO) return requested;
    return direction === TextDirection.RTL ? TextAlignment.RIGHT : TextAlignment.CENTER;
}

export function alignX(alignment: ResolvedAlignment, width: number, canvasWidth: number, padding: number): number {
    switch (alignment) {
        case TextAlignment.LEFT:
            return padding;
        case TextAlignment.RIGHT:
            return canvasWidth - padding - width;
        case TextAlignment.CENTER:
            return Math.floor((canvasWidth - width) / 2);
    }
}
