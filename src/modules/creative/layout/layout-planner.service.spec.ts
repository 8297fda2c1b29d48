import { LayoutPlannerService, PlanFonts } from './layout-planner.service';
import { BidiShaperService } from '../text/bidi-shaper.service';
import { FormatCatalogService } from '../configurations/format-catalog.service';
import { FixedWidthMeasurer } from '../testing/fixed-width.measurer';
import { buildAdSpec } from '../testing/ad-spec.fixture';
import {
    FontSource,
    FontWeight,
    HeadlinePosition,
    LogoAnchor,
    LogoBackground,
    TextAlignment,
    TextDirection,
} from '../../../libs/enums/CreativeEnums';
import { AdSpec, Size } from '../../../libs/types/Creative';

const FONTS: PlanFonts = {
    headline: { family: 'test-bold', weight: FontWeight.BOLD, source: FontSource.BUILTIN },
    subheadline: { family: 'test-semibold', weight: FontWeight.SEMIBOLD, source: FontSource.BUILTIN },
    cta: { family: 'test-bold', weight: FontWeight.BOLD, source: FontSource.BUILTIN },
};

describe('LayoutPlannerService', () => {
    const planner = new LayoutPlannerService(new BidiShaperService());
    const catalog = new FormatCatalogService();
    const measurer = new FixedWidthMeasurer();

    const plan = (overrides: Partial<AdSpec>, format = 'instagram_feed', logo: Size | null = null) =>
        planner.plan({ spec: buildAdSpec(overrides), preset: catalog.resolve(format), fonts: FONTS, measurer, logo });

    describe('square feed with a short headline', () => {
        const result = plan({ headline: 'Sale' });

        it('derives padding and the safe band from the preset', () => {
            expect(result.canvas).toEqual({ width: 1080, height: 1080 });
            expect(result.padding).toBe(54);
            expect(result.safeTopPx).toBe(54);
            expect(result.safeBottomPx).toBe(1026);
        });

        it('places one uppercased, centered headline line', () => {
            expect(result.headline.block.direction).toBe(TextDirection.LTR);
            expect(result.headline.block.font.size).toBe(97);
            expect(result.headline.y).toBe(589);
            expect(result.headline.lines).toEqual([{ text: 'SALE', x: 443, y: 589, width: 194, height: 97 }]);
        });

        it('puts the CTA button below the headline', () => {
            expect(result.cta).toEqual({
                x: 404,
                y: 731,
                width: 272,
                height: 93,
                radius: 46,
                direction: TextDirection.LTR,
                font: { ...FONTS.cta, size: 43 },
                label: { text: 'SHOP NOW', x: 454, y: 750, width: 172, height: 43 },
            });
        });

        it('has no subheadline or logo', () => {
            expect(result.subheadline).toBeNull();
            expect(result.logo).toBeNull();
        });
    });

    describe('headline position', () => {
        it('starts below the safe top plus padding', () => {
            expect(plan({ headlinePosition: HeadlinePosition.TOP }).headline.y).toBe(108);
        });

        it('starts a third into the band for middle', () => {
            expect(plan({ headlinePosition: HeadlinePosition.MIDDLE }).headline.y).toBe(378);
        });

        it('respects the taller safe zones of story formats', () => {
            // tiktok: safe top 384, safe bottom 1440, padding 54
            expect(plan({ headlinePosition: HeadlinePosition.TOP }, 'tiktok').headline.y).toBe(438);
        });
    });

    it('wraps a long headline at the smallest size', () => {
        const result = plan({
            headline: 'Discover our brand new summer collection today',
            headlinePosition: HeadlinePosition.TOP,
            ctaText: null,
        });

        expect(result.headline.block.font.size).toBe(59);
        expect(result.headline.lines).toEqual([
            { text: 'DISCOVER OUR BRAND NEW SUMMER', x: 112, y: 108, width: 855.5, height: 59 },
            { text: 'COLLECTION TODAY', x: 304, y: 182, width: 472, height: 59 },
        ]);
        expect(result.cta).toBeNull();
    });

    it('stacks the subheadline between headline and CTA', () => {
        const result = plan({ headline: 'Sale', subheadline: 'Limited time offer' });

        expect(result.subheadline?.y).toBe(716);
        expect(result.subheadline?.block.font).toEqual({ ...FONTS.subheadline, size: 59 });
        expect(result.subheadline?.lines).toEqual([{ text: 'Limited time offer', x: 274, y: 716, width: 531, height: 59 }]);
        expect(result.cta?.y).toBe(813);
    });

    it('skips a whitespace-only subheadline and CTA', () => {
        const result = plan({ subheadline: '   ', ctaText: ' ' });
        expect(result.subheadline).toBeNull();
        expect(result.cta).toBeNull();
    });

    describe('alignment', () => {
        it('honours explicit left and right', () => {
            expect(plan({ textAlignment: TextAlignment.LEFT }).headline.lines[0].x).toBe(54);
            expect(plan({ textAlignment: TextAlignment.RIGHT }).headline.lines[0].x).toBe(832);
        });

        it('aligns the CTA button the same way', () => {
            expect(plan({ textAlignment: TextAlignment.LEFT }).cta?.x).toBe(54);
        });
    });

    describe('right-to-left headline', () => {
        const result = plan({ headline: 'خصم sale' });

        it('is right-aligned and never uppercased', () => {
            const { block, lines } = result.headline;
            expect(block.direction).toBe(TextDirection.RTL);
            expect(block.alignment).toBe(TextAlignment.RIGHT);
            expect(block.source).toBe('خصم sale');
            expect(lines).toHaveLength(1);
            expect(lines[0].text).toContain('sale');
            expect(lines[0].text).not.toContain('SALE');
            // 8 code points at 97px
            expect(lines[0].width).toBe(388);
            expect(lines[0].x).toBe(638);
        });

        it('keeps an explicit alignment request', () => {
            expect(plan({ headline: 'خصم sale', textAlignment: TextAlignment.CENTER }).headline.block.alignment).toBe(
                TextAlignment.CENTER,
            );
        });
    });

    it('right-aligns a right-to-left CTA on its own', () => {
        const cta = plan({ ctaText: 'اشتر' }).cta;
        expect(cta?.direction).toBe(TextDirection.RTL);
        expect(cta?.width).toBe(186);
        expect(cta?.x).toBe(840);
    });

    it('keeps case when uppercasing is off', () => {
        const result = plan({ uppercaseHeadline: false, uppercaseCta: false });
        expect(result.headline.lines[0].text).toBe('Sale');
        expect(result.cta?.label.text).toBe('Shop Now');
    });

    it('fits, scales and anchors the logo', () => {
        const result = plan(
            { logoAnchor: LogoAnchor.BOTTOM_RIGHT, logoScale: 2, logoBackground: LogoBackground.DARK },
            'square',
            { width: 800, height: 400 },
        );

        expect(result.logo).toEqual({
            x: 378,
            y: 648,
            width: 648,
            height: 324,
            plaque: { margin: 10, radius: 15, fill: { r: 0, g: 0, b: 0, alpha: 150 / 255 } },
        });
    });
});
