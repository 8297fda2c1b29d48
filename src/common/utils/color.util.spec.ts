import { hexToRgb, normalizeHex, rgbToHex, toCssColor } from './color.util';
import { RenderError } from '../errors/render.errors';

describe('color.util', () => {
    it('parses hex with and without a leading #', () => {
        expect(hexToRgb('#FFD700')).toEqual({ r: 255, g: 215, b: 0 });
        expect(hexToRgb('1a2b3c')).toEqual({ r: 26, g: 43, b: 60 });
    });

    it('round-trips to the normalized form', () => {
        for (const value of ['#FFFFFF', '000000', '#FfD700', 'a0b1c2', '#123456']) {
            expect(rgbToHex(hexToRgb(value))).toBe(normalizeHex(value));
        }
        expect(normalizeHex('FfD700')).toBe('#ffd700');
    });

    it('rejects malformed strings with a RenderError', () => {
        expect(() => hexToRgb('#FFF')).toThrow(RenderError);
        expect(() => hexToRgb('#GGGGGG')).toThrow(RenderError);
        expect(() => hexToRgb('')).toThrow(RenderError);
    });

    it('formats css colors', () => {
        expect(toCssColor({ r: 1, g: 2, b: 3 })).toBe('rgb(1, 2, 3)');
        expect(toCssColor({ r: 0, g: 0, b: 0, alpha: 0.5 })).toBe('rgba(0, 0, 0, 0.5)');
    });
});
