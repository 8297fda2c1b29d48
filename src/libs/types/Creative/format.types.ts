import { FormatSurface } from '../../enums/CreativeEnums';

/**
 * Platform format with its UI-safe margins.
 * `safeTop` / `safeBottom` are fractions of canvas height.
 */
export interface FormatPreset {
    readonly name: string;
    readonly label: string;
    readonly width: number;
    readonly height: number;
    readonly safeTop: number;
    readonly safeBottom: number;
    readonly aspect: string;
    readonly surface: FormatSurface;
}

export interface FormatCatalogEntry extends FormatPreset {
    readonly aliases: readonly string[];
    readonly dimensions: string;
}
