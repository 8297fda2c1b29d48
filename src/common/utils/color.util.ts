import { RenderError } from '../errors/render.errors';
import { CreativeMessage } from '../../libs/messages';
import { Rgb, RgbaFill } from '../../libs/types/Creative';

const HEX_PATTERN = /^[0-9a-fA-F]{6}$/;

/** `#FFD700` or `FFD700` → `#ffd700` */
export function normalizeHex(value: string): string {
    const stripped = value.trim().replace(/^#/, '');
    if (!HEX_PATTERN.test(stripped)) {
        throw new RenderError(`${CreativeMessage.INVALID_COLOR}: "${value}"`);
    }
    return `#${stripped.toLowerCase()}`;
}

export function hexToRgb(value: string): Rgb {
    const hex = normalizeHex(value).slice(1);
    return {
        r: parseInt(hex.slice(0, 2), 16),
        g: parseInt(hex.slice(2, 4), 16),
        b: parseInt(hex.slice(4, 6), 16),
    };
}

export function rgbToHex({ r, g, b }: Rgb): string {
    return `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;
}

export function toCssColor(color: Rgb | RgbaFill): string {
    if ('alpha' in color) {
        return `rgba(${color.r}, ${color.g}, ${color.b}, ${color.alpha})`;
    }
    return `rgb(${color.r}, ${color.g}, ${color.b})`;
}
