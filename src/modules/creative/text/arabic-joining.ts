import arabicForms from './data/arabic-forms.json';

type JoiningType = 'none' | 'right' | 'dual' | 'causing';

interface LetterForms {
    joining: JoiningType;
    isolated: string;
    final: string | null;
    initial: string | null;
    medial: string | null;
}

const LAM = 0x0644;

const JOINING_TYPES: readonly string[] = ['none', 'right', 'dual', 'causing'];

function isJoiningType(value: string): value is JoiningType {
    return JOINING_TYPES.includes(value);
}

const fromHex = (hex: string): string => String.fromCodePoint(parseInt(hex, 16));

function buildLetterTable(): Map<number, LetterForms> {
    const table = new Map<number, LetterForms>();
    for (const [codePoint, entry] of Object.entries(arabicForms.letters)) {
        if (!isJoiningType(entry.joining) || entry.forms.length === 0) {
            throw new Error(`Malformed joining entry for U+${codePoint}`);
        }
        const [isolated, final, initial, medial] = entry.forms.map(fromHex);
        table.set(parseInt(codePoint, 16), {
            joining: entry.joining,
            isolated,
            final: final ?? null,
            initial: initial ?? null,
            medial: medial ?? null,
        });
    }
    return table;
}

function buildLamAlefTable(): Map<number, { isolated: string; final: string }> {
    const table = new Map<number, { isolated: string; final: string }>();
    for (const [alef, [isolated, final]] of Object.entries(arabicForms.lamAlef)) {
        table.set(parseInt(alef, 16), { isolated: fromHex(isolated), final: fromHex(final) });
    }
    return table;
}

const LETTERS = buildLetterTable();
const LAM_ALEF = buildLamAlefTable();
const TRANSPARENT_RANGES = arabicForms.transparent.map(([from, to]) => [parseInt(from, 16), parseInt(to, 16)]);

function isTransparent(codePoint: number): boolean {
    return TRANSPARENT_RANGES.some(([from, to]) => codePoint >= from && codePoint <= to);
}

/** Connects to the letter before it (its right side in visual order) */
const joinsBackward = (type: JoiningType): boolean => type === 'right' || type === 'dual' || type === 'causing';

/** Connects to the letter after it */
const joinsForward = (type: JoiningType): boolean => type === 'dual' || type === 'causing';

function neighbour(codePoints: number[], from: number, step: 1 | -1): { index: number; forms: LetterForms | null } {
    let index = from + step;
    while (index >= 0 && index < codePoints.length && isTransparent(codePoints[index])) {
        index += step;
    }
    if (index < 0 || index >= codePoints.length) return { index, forms: null };
    return { index, forms: LETTERS.get(codePoints[index]) ?? null };
}

/**
 * Replaces Arabic base letters with their contextual presentation forms
 * (isolated / initial / medial / final) and fuses lam + alef into the
 * lam-alef ligature. Text stays in logical order.
 */
export function joinArabicLetters(text: string): string {
    const codePoints = Array.from(text, (char) => char.codePointAt(0) ?? 0);
    const output: string[] = [];

    for (let i = 0; i < codePoints.length; i++) {
        const current = LETTERS.get(codePoints[i]);
        if (!current) {
            output.push(String.fromCodePoint(codePoints[i]));
            continue;
        }

        const prev = neighbour(codePoints, i, -1).forms;
        const next = neighbour(codePoints, i, 1);
        const connectsPrev = prev !== null && joinsForward(prev.joining) && joinsBackward(current.joining);

        if (codePoints[i] === LAM && next.forms !== null) {
            const ligature = LAM_ALEF.get(codePoints[next.index]);
            if (ligature) {
                output.push(connectsPrev ? ligature.final : ligature.isolated);
                // marks sitting between lam and alef follow the ligature
                for (let j = i + 1; j < next.index; j++) {
                    output.push(String.fromCodePoint(codePoints[j]));
                }
                i = next.index;
                continue;
            }
        }

        const connectsNext = next.forms !== null && joinsForward(current.joining) && joinsBackward(next.forms.joining);

        if (connectsPrev && connectsNext) {
            output.push(current.medial ?? current.final ?? current.isolated);
        } else if (connectsPrev) {
            output.push(current.final ?? current.isolated);
        } else if (connectsNext) {
            output.push(current.initial ?? current.isolated);
        } else {
            output.push(current.isolated);
        }
    }

    return output.join('');
}
