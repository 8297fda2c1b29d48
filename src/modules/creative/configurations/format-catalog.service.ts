import { Injectable } from '@nestjs/common';
import { DEFAULT_FORMAT_NAME, FORMAT_PRESETS } from './constants/format-presets';
import { FormatCatalogEntry, FormatPreset } from '../../../libs/types/Creative';

const normalizeName = (name: string): string => name.trim().toLowerCase().replace(/[-\s]+/g, '_');

/**
 * Format Catalog
 *
 * Maps a format name (canonical or alias) to its preset.
 * Unknown or missing names resolve to the square feed preset.
 */
@Injectable()
export class FormatCatalogService {
    private readonly byName = new Map<string, FormatPreset>();
    private readonly defaultPreset: FormatPreset;

    constructor() {
        for (const { preset, aliases } of FORMAT_PRESETS) {
            this.byName.set(preset.name, preset);
            for (const alias of aliases) {
                this.byName.set(alias, preset);
            }
        }

        const fallback = this.byName.get(DEFAULT_FORMAT_NAME);
        if (!fallback) {
            throw new Error(`Default format "${DEFAULT_FORMAT_NAME}" is missing from the catalog`);
        }
        this.defaultPreset = fallback;
    }

    resolve(name?: string | null): FormatPreset {
        if (!name) return this.defaultPreset;
        return this.byName.get(normalizeName(name)) ?? this.defaultPreset;
    }

    list(): FormatCatalogEntry[] {
        return FORMAT_PRESETS.map(({ preset, aliases }) => ({
            ...preset,
            aliases,
            dimensions: `${preset.width}x${preset.height}`,
        }));
    }
}
