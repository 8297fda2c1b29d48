/**
 * Right-to-left script blocks, inclusive code point ranges.
 * Add a row here to teach the classifier a new script.
 */
export interface ScriptRange {
    script: string;
    from: number;
    to: number;
}

export const RTL_SCRIPT_RANGES: readonly ScriptRange[] = [
    { script: 'Hebrew', from: 0x0590, to: 0x05ff },
    { script: 'Arabic', from: 0x0600, to: 0x06ff },
    { script: 'Syriac', from: 0x0700, to: 0x074f },
    { script: 'Arabic Supplement', from: 0x0750, to: 0x077f },
    { script: 'Thaana', from: 0x0780, to: 0x07bf },
    { script: 'NKo', from: 0x07c0, to: 0x07ff },
    { script: 'Arabic Extended-A', from: 0x08a0, to: 0x08ff },
    { script: 'Hebrew Presentation Forms', from: 0xfb1d, to: 0xfb4f },
    { script: 'Arabic Presentation Forms-A', from: 0xfb50, to: 0xfdff },
    { script: 'Arabic Presentation Forms-B', from: 0xfe70, to: 0xfeff },
];

export function rtlScriptOf(codePoint: number): string | null {
    for (const range of RTL_SCRIPT_RANGES) {
        if (codePoint >= range.from && codePoint <= range.to) return range.script;
    }
    return null;
}
