import { ResolvedAlignment, TextDirection } from '../../enums/CreativeEnums';
import { FontHandle } from './font.types';

export interface Rgb {
    r: number;
    g: number;
    b: number;
}

export interface RgbaFill extends Rgb {
    alpha: number; // 0–1
}

export interface Size {
    width: number;
    height: number;
}

export interface Point {
    x: number;
    y: number;
}

/** Wrapped text in display order, before positioning */
export interface TextBlock {
    source: string;
    direction: TextDirection;
    alignment: ResolvedAlignment;
    lines: string[];
    font: FontHandle;
}

export interface PlacedLine extends Point, Size {
    text: string;
}

export interface PlacedText {
    block: TextBlock;
    y: number;
    lines: PlacedLine[];
}

export interface CtaGeometry extends Point, Size {
    radius: number;
    direction: TextDirection;
    label: PlacedLine;
    font: FontHandle;
}

export interface LogoPlaque {
    margin: number;
    radius: number;
    fill: RgbaFill;
}

export interface LogoGeometry extends Point, Size {
    plaque: LogoPlaque | null;
}

export interface LayoutPlan {
    canvas: Size;
    padding: number;
    safeTopPx: number;
    safeBottomPx: number;
    headline: PlacedText;
    subheadline: PlacedText | null;
    cta: CtaGeometry | null;
    logo: LogoGeometry | null;
}
