import { FontHandle, TextMeasurer } from '../../../libs/types/Creative';

/**
 * Greedy word wrap against measured pixel widths.
 *
 * A word wider than `maxWidth` on its own is emitted as its own line and
 * left to overflow; it is never split into characters.
 */
export function wrapText(text: string, font: FontHandle, maxWidth: number, measurer: TextMeasurer): string[] {
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    const lines: string[] = [];
    let current = '';

    for (const word of words) {
        const candidate = current ? `${current} ${word}` : word;
        if (measurer.measure(candidate, font).width <= maxWidth) {
            current = candidate;
            continue;
        }
        if (current) lines.push(current);
        current = word;
    }
    if (current) lines.push(current);

    return lines;
}
