/**
 * Centralized Messages for the Creative Module
 *
 * All error and success messages are defined here to ensure
 * consistency across the render pipeline.
 */

// ═══════════════════════════════════════════════════════════
// CREATIVE RENDER MESSAGES
// ═══════════════════════════════════════════════════════════

export enum CreativeMessage {
    // Success
    RENDER_COMPLETED = 'Ad creative rendered successfully',

    // Client errors
    BACKGROUND_FETCH_FAILED = 'Failed to download background image',

    // Server errors
    RENDER_FAILED = 'Image generation failed',
    INVALID_COLOR = 'Invalid hex color',
    EMPTY_CANVAS = 'Canvas must have a non-zero area',
}

// ═══════════════════════════════════════════════════════════
// ASSET MESSAGES
// ═══════════════════════════════════════════════════════════

export enum AssetMessage {
    DOWNLOAD_FAILED = 'Asset download failed',
    DOWNLOAD_TIMEOUT = 'Asset download timed out',
    TOO_LARGE = 'Asset exceeds the maximum allowed size',
    NOT_AN_IMAGE = 'Asset is not a decodable image',
}

// ═══════════════════════════════════════════════════════════
// VALIDATION MESSAGES
// ═══════════════════════════════════════════════════════════

export enum ValidationMessage {
    FIELD_REQUIRED = 'This field is required',
    FIELD_INVALID = 'Invalid field value',
    HEADLINE_POSITION_INVALID = 'headline_position must be one of: top, middle, bottom',
    TEXT_ALIGNMENT_INVALID = 'text_alignment must be one of: auto, left, center, right',
    LOGO_BACKGROUND_INVALID = 'logo_background must be one of: none, white, dark, blur',
    LOGO_SCALE_INVALID = 'logo_scale must be a number greater than 0',
    OVERLAY_OPACITY_INVALID = 'overlay_opacity must be between 0 and 1',
}
