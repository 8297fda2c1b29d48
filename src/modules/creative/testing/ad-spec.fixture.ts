import { HeadlinePosition, LogoAnchor, LogoBackground, TextAlignment } from '../../../libs/enums/CreativeEnums';
import { AdSpec } from '../../../libs/types/Creative';

/** An AdSpec with the request defaults, for specs that build one directly */
export function buildAdSpec(overrides: Partial<AdSpec> = {}): AdSpec {
    return Object.freeze({
        backgroundUrl: 'https://assets.test/background.jpg',
        headline: 'Sale',
        subheadline: null,
        ctaText: 'Shop Now',
        logoUrl: null,
        format: 'instagram_feed',
        colors: { primary: '#000000', secondary: '#FFFFFF', accent: '#FFD700', text: '#FFFFFF' },
        headlinePosition: HeadlinePosition.BOTTOM,
        textAlignment: TextAlignment.AUTO,
        logoAnchor: LogoAnchor.TOP_LEFT,
        logoBackground: LogoBackground.NONE,
        logoScale: 1,
        overlay: true,
        overlayOpacity: 0.3,
        headlineFontUrl: null,
        bodyFontUrl: null,
        uppercaseHeadline: true,
        uppercaseCta: true,
        ...overrides,
    });
}
