import { Injectable, Logger } from '@nestjs/common';
import { TextDirection } from '../../../libs/enums/CreativeEnums';
import { joinArabicLetters } from './arabic-joining';
import { paragraphDirection, reorderVisual } from './bidi-reorder';
import { isRightToLeft } from './text-direction';

/**
 * Bidi Shaper
 *
 * Turns logical right-to-left text into what a left-to-right glyph placer
 * must draw: contextual letter forms first, then visual reordering.
 * Left-to-right input passes through untouched. Shaping problems are
 * cosmetic, so every failure falls back to the unshaped text.
 */
@Injectable()
export class BidiShaperService {
    private readonly logger = new Logger(BidiShaperService.name);

    shape(text: string): string {
        if (!isRightToLeft(text)) return text;

        const shaped = this.attempt(text, () => this.reorder(this.joinLetters(text), paragraphDirection(text)));
        return shaped ?? text;
    }

    /**
     * Shapes a block that will be wrapped onto several lines.
     * Wrapping runs on logical order so the first words land on the first
     * line; each line is then reordered against the paragraph direction.
     */
    shapeLines(text: string, wrap: (value: string) => string[]): string[] {
        if (!isRightToLeft(text)) return wrap(text);

        const prepared = this.attempt(text, () => ({
            joined: this.joinLetters(text),
            base: paragraphDirection(text),
        }));
        if (!prepared) return wrap(text);

        const lines = wrap(prepared.joined);
        const reordered = this.attempt(text, () => lines.map((line) => this.reorder(line, prepared.base)));
        return reordered ?? wrap(text);
    }

    joinLetters(text: string): string {
        return joinArabicLetters(text);
    }

    reorder(text: string, base: TextDirection = paragraphDirection(text)): string {
        return reorderVisual(text, base);
    }

    private attempt<T>(text: string, step: () => T): T | null {
        try {
            return step();
        } catch (error) {
            const errMsg = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Bidi shaping failed for "${text.substring(0, 40)}", drawing unshaped text: ${errMsg}`);
            return null;
        }
    }
}
