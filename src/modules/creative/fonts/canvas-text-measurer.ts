import { createCanvas } from '@napi-rs/canvas';
import { FontHandle, TextMeasurer, TextMetrics } from '../../../libs/types/Creative';
import { BUILTIN_FAMILY, cssWeight } from './font-resolver.service';

export function cssFont(font: FontHandle): string {
    // generic families must stay unquoted
    const family = font.family === BUILTIN_FAMILY ? font.family : `"${font.family}"`;
    return `${cssWeight(font.weight)} ${font.size}px ${family}`;
}

/**
 * Measures ink bounds with the same engine that draws the text,
 * so wrapping and placement match the rendered glyphs.
 */
export class CanvasTextMeasurer implements TextMeasurer {
    private readonly ctx = createCanvas(1, 1).getContext('2d');

    measure(text: string, font: FontHandle): TextMetrics {
        if (!text) return { width: 0, height: 0 };

        this.ctx.font = cssFont(font);
        const metrics = this.ctx.measureText(text);
        return {
            width: Math.round(metrics.width),
            height: Math.round(metrics.actualBoundingBoxAscent + metrics.actualBoundingBoxDescent),
        };
    }
}
