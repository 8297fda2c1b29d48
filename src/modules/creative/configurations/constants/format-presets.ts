/**
 * Format Presets - platform canvases and their safe zones
 *
 * Safe zones are fractions of canvas height hidden by platform UI:
 * - safeTop: status bar, username, audio pill
 * - safeBottom: captions, CTA overlay, reactions, nav bar
 *
 * Story/reel canvases carry far more chrome than feed placements.
 */

import { FormatSurface } from '../../../../libs/enums/CreativeEnums';
import { FormatPreset } from '../../../../libs/types/Creative';

interface PresetDefinition {
    preset: FormatPreset;
    aliases: readonly string[];
}

const define = (preset: FormatPreset, aliases: readonly string[] = []): PresetDefinition =>
    Object.freeze({ preset: Object.freeze(preset), aliases: Object.freeze([...aliases]) });

export const FORMAT_PRESETS: readonly PresetDefinition[] = Object.freeze([
    define(
        {
            name: 'instagram_feed',
            label: 'Instagram Post',
            width: 1080,
            height: 1080,
            safeTop: 0.05,
            safeBottom: 0.05,
            aspect: '1:1',
            surface: FormatSurface.FEED,
        },
        ['square', 'feed', 'instagram_square'],
    ),
    define(
        {
            name: 'instagram_portrait',
            label: 'Instagram Portrait',
            width: 1080,
            height: 1350,
            safeTop: 0.05,
            safeBottom: 0.08,
            aspect: '4:5',
            surface: FormatSurface.FEED,
        },
        ['portrait', 'feed_portrait'],
    ),
    define(
        {
            name: 'instagram_story',
            label: 'Instagram Story',
            width: 1080,
            height: 1920,
            safeTop: 0.15,
            safeBottom: 0.2,
            aspect: '9:16',
            surface: FormatSurface.STORY,
        },
        ['story', 'instagram_reel', 'reel'],
    ),
    define({
        name: 'facebook_story',
        label: 'Facebook Story',
        width: 1080,
        height: 1920,
        safeTop: 0.15,
        safeBottom: 0.2,
        aspect: '9:16',
        surface: FormatSurface.STORY,
    }),
    define(
        {
            name: 'tiktok',
            label: 'TikTok',
            width: 1080,
            height: 1920,
            safeTop: 0.2,  // username + follow pill
            safeBottom: 0.25, // caption + engagement rail
            aspect: '9:16',
            surface: FormatSurface.STORY,
        },
        ['tiktok_story'],
    ),
    define(
        {
            name: 'facebook_feed',
            label: 'Facebook Link Ad',
            width: 1200,
            height: 628,
            safeTop: 0.08,
            safeBottom: 0.08,
            aspect: '1.91:1',
            surface: FormatSurface.FEED,
        },
        ['landscape', 'link_ad'],
    ),
]);

export const DEFAULT_FORMAT_NAME = 'instagram_feed';
