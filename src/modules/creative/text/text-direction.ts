import { TextDirection } from '../../../libs/enums/CreativeEnums';
import { rtlScriptOf } from './script-ranges';

export function isRightToLeftCodePoint(codePoint: number): boolean {
    return rtlScriptOf(codePoint) !== null;
}

/** True when any code point belongs to a right-to-left script */
export function isRightToLeft(text: string): boolean {
    for (const char of text) {
        const codePoint = char.codePointAt(0);
        if (codePoint !== undefined && isRightToLeftCodePoint(codePoint)) return true;
    }
    return false;
}

export function detectDirection(text: string): TextDirection {
    return isRightToLeft(text) ? TextDirection.RTL : TextDirection.LTR;
}
