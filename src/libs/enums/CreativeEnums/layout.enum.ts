/**
 * Layout Enums
 *
 * Closed sets for every positional option a request can carry.
 * Alias handling for logo anchors lives in `resolveLogoAnchor`.
 */

export enum HeadlinePosition {
    TOP = 'top',
    MIDDLE = 'middle',
    BOTTOM = 'bottom',
}

export enum TextAlignment {
    AUTO = 'auto',
    LEFT = 'left',
    CENTER = 'center',
    RIGHT = 'right',
}

/** Alignment after `auto` has been resolved against a block's direction */
export type ResolvedAlignment = Exclude<TextAlignment, TextAlignment.AUTO>;

export enum LogoAnchor {
    TOP_LEFT = 'top_left',
    TOP_CENTER = 'top_center',
    TOP_RIGHT = 'top_right',
    MIDDLE_LEFT = 'middle_left',
    MIDDLE_CENTER = 'middle_center',
    MIDDLE_RIGHT = 'middle_right',
    BOTTOM_LEFT = 'bottom_left',
    BOTTOM_CENTER = 'bottom_center',
    BOTTOM_RIGHT = 'bottom_right',
}

export enum LogoBackground {
    NONE = 'none',
    WHITE = 'white',
    DARK = 'dark',
    BLUR = 'blur',
}
