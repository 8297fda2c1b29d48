/**
 * Format Surface
 *
 * Feed placements carry little platform chrome; story/reel placements
 * carry captions, reactions and profile UI over the image.
 */
export enum FormatSurface {
    FEED = 'feed',
    STORY = 'story',
}
