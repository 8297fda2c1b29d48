import { Injectable, Logger } from '@nestjs/common';
import { GlobalFonts } from '@napi-rs/canvas';

/**
 * Font Registry
 *
 * Thin seam over the canvas engine's process-wide font table.
 */
@Injectable()
export class FontRegistryService {
    private readonly logger = new Logger(FontRegistryService.name);

    /** false when the engine does not accept the file as a font */
    register(filePath: string, alias: string): boolean {
        try {
            return GlobalFonts.registerFromPath(filePath, alias) !== null;
        } catch (error) {
            const errMsg = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Font file ${filePath} rejected: ${errMsg}`);
            return false;
        }
    }
}
