import { HeadlinePosition, LogoBackground, TextAlignment } from '../../../libs/enums/CreativeEnums';
import { AdSpec } from '../../../libs/types/Creative';
import { DEFAULT_FORMAT_NAME } from '../configurations/constants/format-presets';
import { resolveLogoAnchor } from '../layout/logo-grid';
import { GenerateAdDto } from './generate-ad.dto';

export const DEFAULT_CTA_TEXT = 'Shop Now';

export const DEFAULT_COLORS = Object.freeze({
    primary: '#000000',
    secondary: '#FFFFFF',
    accent: '#FFD700',
    text: '#FFFFFF',
});

const orNull = (value: string | null | undefined): string | null => (value && value.trim() ? value : null);

/** Applies every default once; the result is never mutated afterwards */
export function toAdSpec(dto: GenerateAdDto): AdSpec {
    return Object.freeze({
        backgroundUrl: dto.background_image_url.trim(),
        headline: dto.headline,
        subheadline: orNull(dto.subheadline),
        // absent → default label; explicit empty or null → no button
        ctaText: dto.cta_text === undefined ? DEFAULT_CTA_TEXT : orNull(dto.cta_text),
        logoUrl: orNull(dto.logo_url),
        format: dto.format || DEFAULT_FORMAT_NAME,
        colors: Object.freeze({
            primary: dto.primary_color ?? DEFAULT_COLORS.primary,
            secondary: dto.secondary_color ?? DEFAULT_COLORS.secondary,
            accent: dto.accent_color ?? DEFAULT_COLORS.accent,
            text: dto.text_color ?? DEFAULT_COLORS.text,
        }),
        headlinePosition: dto.headline_position ?? HeadlinePosition.BOTTOM,
        textAlignment: dto.text_alignment ?? TextAlignment.AUTO,
        logoAnchor: resolveLogoAnchor(dto.logo_position),
        logoBackground: dto.logo_background ?? LogoBackground.NONE,
        logoScale: dto.logo_scale ?? 1,
        overlay: dto.add_overlay ?? true,
        overlayOpacity: dto.overlay_opacity ?? 0.3,
        headlineFontUrl: orNull(dto.headline_font_url),
        bodyFontUrl: orNull(dto.body_font_url),
        uppercaseHeadline: dto.uppercase_headline ?? true,
        uppercaseCta: dto.uppercase_cta ?? true,
    });
}
