import {
    HeadlinePosition,
    LogoAnchor,
    LogoBackground,
    TextAlignment,
} from '../../enums/CreativeEnums';

export interface AdColors {
    readonly primary: string;
    readonly secondary: string;
    readonly accent: string;
    readonly text: string;
}

/**
 * AdSpec: the validated, immutable request.
 * Built once at ingress by `toAdSpec`; every option has a stated default.
 */
export interface AdSpec {
    readonly backgroundUrl: string;
    readonly headline: string;
    readonly subheadline: string | null;
    readonly ctaText: string | null;
    readonly logoUrl: string | null;
    readonly format: string;
    readonly colors: AdColors;
    readonly headlinePosition: HeadlinePosition;
    readonly textAlignment: TextAlignment;
    readonly logoAnchor: LogoAnchor;
    readonly logoBackground: LogoBackground;
    readonly logoScale: number;
    readonly overlay: boolean;
    readonly overlayOpacity: number;
    readonly headlineFontUrl: string | null;
    readonly bodyFontUrl: string | null;
    readonly uppercaseHeadline: boolean;
    readonly uppercaseCta: boolean;
}
