/**
 * Creative Types - Barrel Export
 */

export { FormatPreset, FormatCatalogEntry } from './format.types';
export { ResolvedFont, FontHandle, FontRequest, TextMetrics, TextMeasurer } from './font.types';
export { DecodedImage, FetchOutcome } from './asset.types';
export { AdSpec, AdColors } from './ad-spec.types';
export {
    Rgb,
    RgbaFill,
    Size,
    Point,
    TextBlock,
    PlacedLine,
    PlacedText,
    CtaGeometry,
    LogoPlaque,
    LogoGeometry,
    LayoutPlan,
} from './layout.types';
export { GenerateAdResponse } from './response.types';
