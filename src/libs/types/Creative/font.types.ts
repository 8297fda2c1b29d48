import { FontSource, FontWeight } from '../../enums/CreativeEnums';

/** A font family that is registered and ready to draw with */
export interface ResolvedFont {
    family: string;
    weight: FontWeight;
    source: FontSource;
}

/** A resolved family at a concrete pixel size */
export interface FontHandle extends ResolvedFont {
    size: number;
}

export interface FontRequest {
    weight: FontWeight;
    customUrl?: string;
}

export interface TextMetrics {
    width: number;
    height: number;
}

/** Text measurement capability the wrapper and planner depend on */
export interface TextMeasurer {
    measure(text: string, font: FontHandle): TextMetrics;
}
