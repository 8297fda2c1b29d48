import { TextDirection } from '../../../libs/enums/CreativeEnums';
import { isRightToLeftCodePoint } from './text-direction';

/**
 * Single-paragraph bidi resolution (no explicit embeddings or isolates),
 * producing left-to-right visual storage order for a glyph-by-glyph
 * renderer. Arabic letters are treated as R, so W2/W3 collapse away.
 */

type BidiClass = 'L' | 'R' | 'EN' | 'AN' | 'ES' | 'ET' | 'CS' | 'WS' | 'ON' | 'NSM';

const EUROPEAN_SEPARATORS = new Set(['+', '-']);
const COMMON_SEPARATORS = new Set([',', '.', ':', '/', '،']);
const EUROPEAN_TERMINATORS = new Set(['#', '$', '%', '°', '¢', '£', '¤', '¥', '€', '‰', '٪']);

const MIRRORED = new Map<string, string>([
    ['(', ')'],
    [')', '('],
    ['[', ']'],
    [']', '['],
    ['{', '}'],
    ['}', '{'],
    ['<', '>'],
    ['>', '<'],
    ['«', '»'],
    ['»', '«'],
    ['‹', '›'],
    ['›', '‹'],
]);

function classify(char: string): BidiClass {
    const cp = char.codePointAt(0) ?? 0;

    if ((cp >= 0x30 && cp <= 0x39) || (cp >= 0x06f0 && cp <= 0x06f9)) return 'EN';
    if ((cp >= 0x0660 && cp <= 0x0669) || cp === 0x066b || cp === 0x066c) return 'AN';
    if (/\s/u.test(char)) return 'WS';
    if (EUROPEAN_SEPARATORS.has(char)) return 'ES';
    if (COMMON_SEPARATORS.has(char)) return 'CS';
    if (EUROPEAN_TERMINATORS.has(char)) return 'ET';
    if (/\p{Mn}/u.test(char)) return 'NSM';
    if (isRightToLeftCodePoint(cp)) return 'R';
    if (/[\p{L}\p{Mc}\p{Nd}]/u.test(char)) return 'L';
    return 'ON';
}

const isStrong = (type: BidiClass): boolean => type === 'L' || type === 'R';
const isNeutral = (type: BidiClass): boolean => type === 'WS' || type === 'ON';
/** N1: numbers count as R when resolving neutrals */
const directionForNeutrals = (type: BidiClass): 'L' | 'R' => (type === 'L' ? 'L' : 'R');

/** P2/P3: direction of the first strong character, LTR when there is none */
export function paragraphDirection(text: string): TextDirection {
    for (const char of text) {
        const type = classify(char);
        if (type === 'L') return TextDirection.LTR;
        if (type === 'R') return TextDirection.RTL;
    }
    return TextDirection.LTR;
}

export function resolveLevels(chars: string[], base: TextDirection): number[] {
    const baseLevel = base === TextDirection.RTL ? 1 : 0;
    const sos: BidiClass = baseLevel === 1 ? 'R' : 'L';
    const types = chars.map(classify);
    const n = types.length;

    // W1
    for (let i = 0; i < n; i++) {
        if (types[i] === 'NSM') types[i] = i === 0 ? sos : types[i - 1];
    }

    // W4
    for (let i = 1; i < n - 1; i++) {
        const before = types[i - 1];
        const after = types[i + 1];
        if (types[i] === 'ES' && before === 'EN' && after === 'EN') {
            types[i] = 'EN';
        } else if (types[i] === 'CS' && before === after && (before === 'EN' || before === 'AN')) {
            types[i] = before;
        }
    }

    // W5
    for (let i = 0; i < n; i++) {
        if (types[i] !== 'ET') continue;
        let end = i;
        while (end < n && types[end] === 'ET') end++;
        if ((i > 0 && types[i - 1] === 'EN') || (end < n && types[end] === 'EN')) {
            types.fill('EN', i, end);
        }
        i = end - 1;
    }

    // W6
    for (let i = 0; i < n; i++) {
        if (types[i] === 'ES' || types[i] === 'ET' || types[i] === 'CS') types[i] = 'ON';
    }

    // W7
    let lastStrong: BidiClass = sos;
    for (let i = 0; i < n; i++) {
        if (isStrong(types[i])) lastStrong = types[i];
        else if (types[i] === 'EN' && lastStrong === 'L') types[i] = 'L';
    }

    // N1 / N2
    for (let i = 0; i < n; i++) {
        if (!isNeutral(types[i])) continue;
        let end = i;
        while (end < n && isNeutral(types[end])) end++;
        const before = i === 0 ? sos : directionForNeutrals(types[i - 1]);
        const after = end === n ? sos : directionForNeutrals(types[end]);
        types.fill(before === after ? before : sos, i, end);
        i = end - 1;
    }

    // I1 / I2
    const levels = types.map((type) => {
        if (baseLevel === 0) {
            if (type === 'R') return 1;
            if (type === 'EN' || type === 'AN') return 2;
            return 0;
        }
        return type === 'R' ? 1 : 2;
    });

    // L1: trailing whitespace returns to the paragraph level
    for (let i = n - 1; i >= 0 && /\s/u.test(chars[i]); i--) {
        levels[i] = baseLevel;
    }

    return levels;
}

/** L2 + L4: reverse runs from the highest level down, mirror brackets at odd levels */
export function reorderVisual(text: string, base: TextDirection): string {
    const chars = Array.from(text);
    if (chars.length === 0) return text;

    const levels = resolveLevels(chars, base);
    for (let i = 0; i < chars.length; i++) {
        const mirrored = MIRRORED.get(chars[i]);
        if (mirrored && levels[i] % 2 === 1) chars[i] = mirrored;
    }

    const highest = Math.max(...levels);

    for (let level = highest; level >= 1; level--) {
        let i = 0;
        while (i < chars.length) {
            if (levels[i] < level) {
                i++;
                continue;
            }
            let end = i;
            while (end < chars.length && levels[end] >= level) end++;
            reverseRange(chars, i, end);
            reverseRange(levels, i, end);
            i = end;
        }
    }

    return chars.join('');
}

function reverseRange<T>(items: T[], start: number, end: number): void {
    for (let a = start, b = end - 1; a < b; a++, b--) {
        const held = items[a];
        items[a] = items[b];
        items[b] = held;
    }
}
