export enum TextDirection {
    LTR = 'ltr',
    RTL = 'rtl',
}

export enum FontWeight {
    BOLD = 'bold',
    SEMIBOLD = 'semibold',
}

/** Where a resolved font family came from, in fallback order */
export enum FontSource {
    CUSTOM = 'custom',
    PRIMARY = 'primary',
    ALTERNATE = 'alternate',
    SYSTEM = 'system',
    BUILTIN = 'builtin',
}
