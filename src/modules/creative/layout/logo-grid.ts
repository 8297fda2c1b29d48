import { FormatSurface, LogoAnchor, LogoBackground } from '../../../libs/enums/CreativeEnums';
import { LogoPlaque, Point, Size } from '../../../libs/types/Creative';

type Row = 'top' | 'middle' | 'bottom';
type Column = 'left' | 'center' | 'right';

const ANCHORS: Record<Row, Record<Column, LogoAnchor>> = {
    top: { left: LogoAnchor.TOP_LEFT, center: LogoAnchor.TOP_CENTER, right: LogoAnchor.TOP_RIGHT },
    middle: { left: LogoAnchor.MIDDLE_LEFT, center: LogoAnchor.MIDDLE_CENTER, right: LogoAnchor.MIDDLE_RIGHT },
    bottom: { left: LogoAnchor.BOTTOM_LEFT, center: LogoAnchor.BOTTOM_CENTER, right: LogoAnchor.BOTTOM_RIGHT },
};

const ROW_ALIASES: Record<string, Row> = {
    top: 'top',
    middle: 'middle',
    center: 'middle',
    centre: 'middle',
    bottom: 'bottom',
};

const COLUMN_ALIASES: Record<string, Column> = {
    left: 'left',
    center: 'center',
    centre: 'center',
    middle: 'center',
    right: 'right',
};

const GRID: Record<LogoAnchor, { row: Row; column: Column }> = {
    [LogoAnchor.TOP_LEFT]: { row: 'top', column: 'left' },
    [LogoAnchor.TOP_CENTER]: { row: 'top', column: 'center' },
    [LogoAnchor.TOP_RIGHT]: { row: 'top', column: 'right' },
    [LogoAnchor.MIDDLE_LEFT]: { row: 'middle', column: 'left' },
    [LogoAnchor.MIDDLE_CENTER]: { row: 'middle', column: 'center' },
    [LogoAnchor.MIDDLE_RIGHT]: { row: 'middle', column: 'right' },
    [LogoAnchor.BOTTOM_LEFT]: { row: 'bottom', column: 'left' },
    [LogoAnchor.BOTTOM_CENTER]: { row: 'bottom', column: 'center' },
    [LogoAnchor.BOTTOM_RIGHT]: { row: 'bottom', column: 'right' },
};

/**
 * Resolves any accepted spelling to a grid anchor:
 * `top_left`, `top-left`, `Top Centre`, `middle_center`, `center`, ...
 * Unknown names fall back to top-left.
 */
export function resolveLogoAnchor(name?: string | null): LogoAnchor {
    if (!name) return LogoAnchor.TOP_LEFT;

    const parts = name.trim().toLowerCase().split(/[\s_-]+/).filter(Boolean);
    if (parts.length === 1) {
        return ['center', 'centre', 'middle'].includes(parts[0]) ? LogoAnchor.MIDDLE_CENTER : LogoAnchor.TOP_LEFT;
    }
    if (parts.length !== 2) return LogoAnchor.TOP_LEFT;

    const row = ROW_ALIASES[parts[0]];
    const column = COLUMN_ALIASES[parts[1]];
    if (!row || !column) return LogoAnchor.TOP_LEFT;

    return ANCHORS[row][column];
}

export function positionLogo(
    anchor: LogoAnchor,
    logoWidth: number,
    logoHeight: number,
    canvasWidth: number,
    canvasHeight: number,
    padding: number,
    safeTopPx: number,
    safeBottomPx: number,
): Point {
    const { row, column } = GRID[anchor];

    const x =
        column === 'left'
            ? padding
            : column === 'center'
              ? Math.floor((canvasWidth - logoWidth) / 2)
              : canvasWidth - logoWidth - padding;

    const y =
        row === 'top'
            ? safeTopPx + padding
            : row === 'middle'
              ? Math.floor((canvasHeight - logoHeight) / 2)
              : safeBottomPx - logoHeight - padding;

    return { x, y };
}

// Story canvases carry more platform chrome, so logos stay smaller there
const LOGO_BOX: Record<FormatSurface, { width: number; height: number }> = {
    [FormatSurface.FEED]: { width: 0.35, height: 0.15 },
    [FormatSurface.STORY]: { width: 0.3, height: 0.1 },
};

/**
 * Fits the logo inside the surface's max box keeping its aspect ratio
 * (width first, then height), then applies the user scale.
 */
export function fitLogo(natural: Size, canvas: Size, surface: FormatSurface, scale: number): Size {
    const maxWidth = Math.round(canvas.width * LOGO_BOX[surface].width);
    const maxHeight = Math.round(canvas.height * LOGO_BOX[surface].height);
    const ratio = natural.width / natural.height;

    let width = natural.width;
    let height = natural.height;

    if (width > maxWidth) {
        width = maxWidth;
        height = Math.floor(maxWidth / ratio);
    }
    if (height > maxHeight) {
        height = maxHeight;
        width = Math.floor(maxHeight * ratio);
    }

    return {
        width: Math.max(1, Math.round(width * scale)),
        height: Math.max(1, Math.round(height * scale)),
    };
}

const PLAQUE_RADIUS = 15;

export function plaqueFor(mode: LogoBackground): LogoPlaque | null {
    switch (mode) {
        case LogoBackground.WHITE:
            return { margin: 10, radius: PLAQUE_RADIUS, fill: { r: 255, g: 255, b: 255, alpha: 200 / 255 } };
        case LogoBackground.DARK:
            return { margin: 10, radius: PLAQUE_RADIUS, fill: { r: 0, g: 0, b: 0, alpha: 150 / 255 } };
        case LogoBackground.BLUR:
            // soft glow: fainter fill, wider margin
            return { margin: 20, radius: PLAQUE_RADIUS, fill: { r: 255, g: 255, b: 255, alpha: 100 / 255 } };
        case LogoBackground.NONE:
            return null;
    }
}
