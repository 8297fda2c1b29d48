/**
 * Dynamic font sizing, as fractions of canvas width.
 * Short punchy headlines dominate; long ones shrink to stay in the band.
 */

const HEADLINE_BUCKETS: ReadonlyArray<{ maxChars: number; ratio: number }> = [
    { maxChars: 15, ratio: 0.09 },
    { maxChars: 25, ratio: 0.075 },
    { maxChars: 40, ratio: 0.065 },
    { maxChars: Number.POSITIVE_INFINITY, ratio: 0.055 },
];

export const SUBHEADLINE_RATIO = 0.055;
export const CTA_RATIO = 0.04;

export function headlineSize(text: string, canvasWidth: number): number {
    const length = Array.from(text).length;
    const bucket = HEADLINE_BUCKETS.find((entry) => length <= entry.maxChars) ?? HEADLINE_BUCKETS[HEADLINE_BUCKETS.length - 1];
    return Math.round(canvasWidth * bucket.ratio);
}

export function subheadlineSize(canvasWidth: number): number {
    return Math.round(canvasWidth * SUBHEADLINE_RATIO);
}

export function ctaSize(canvasWidth: number): number {
    return Math.round(canvasWidth * CTA_RATIO);
}
