/**
 * Creative Enums - Barrel Export
 */

export { HeadlinePosition, TextAlignment, ResolvedAlignment, LogoAnchor, LogoBackground } from './layout.enum';
export { TextDirection, FontWeight, FontSource } from './text.enum';
export { FormatSurface } from './format.enum';
