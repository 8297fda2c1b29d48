import { FormatCatalogService } from './format-catalog.service';
import { FormatSurface } from '../../../libs/enums/CreativeEnums';

describe('FormatCatalogService', () => {
    const catalog = new FormatCatalogService();

    it('falls back to the square default for unknown or missing names', () => {
        const fallback = catalog.resolve('instagram_feed');

        for (const name of ['nope', '', undefined, null, 'SNAPCHAT']) {
            const preset = catalog.resolve(name);
            expect(preset).toBe(fallback);
            expect(catalog.resolve(name)).toBe(preset);
        }
        expect(fallback).toMatchObject({ width: 1080, height: 1080, safeTop: 0.05, safeBottom: 0.05 });
    });

    it('resolves aliases to the same preset object', () => {
        expect(catalog.resolve('story')).toBe(catalog.resolve('instagram_story'));
        expect(catalog.resolve('square')).toBe(catalog.resolve('instagram_feed'));
        expect(catalog.resolve('Instagram-Story').name).toBe('instagram_story');
    });

    it('keeps every content band non-empty', () => {
        for (const entry of catalog.list()) {
            expect(entry.width).toBeGreaterThan(0);
            expect(entry.height).toBeGreaterThan(0);
            expect(entry.safeTop).toBeGreaterThanOrEqual(0);
            expect(entry.safeBottom).toBeGreaterThanOrEqual(0);
            expect(entry.safeTop + entry.safeBottom).toBeLessThan(1);
        }
    });

    it('carries vertical story formats with deep safe zones', () => {
        const story = catalog.resolve('story');
        expect(story).toMatchObject({ width: 1080, height: 1920, aspect: '9:16', surface: FormatSurface.STORY });
        expect(story.safeTop).toBeGreaterThanOrEqual(0.15);
        expect(story.safeBottom).toBeGreaterThanOrEqual(0.15);

        const landscape = catalog.resolve('landscape');
        expect(landscape).toMatchObject({ width: 1200, height: 628, safeTop: 0.08, safeBottom: 0.08 });
    });

    it('lists dimensions and aliases for the formats endpoint', () => {
        const feed = catalog.list().find((entry) => entry.name === 'instagram_feed');
        expect(feed?.dimensions).toBe('1080x1080');
        expect(feed?.aliases).toContain('square');
    });
});
