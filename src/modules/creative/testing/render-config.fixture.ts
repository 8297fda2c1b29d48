import { ConfigService } from '@nestjs/config';
import { FontWeight } from '../../../libs/enums/CreativeEnums';
import { RenderConfig } from '../../../config/render.config';

export function buildRenderConfig(overrides: Partial<RenderConfig> = {}): RenderConfig {
    return {
        fontCacheDir: '/tmp/ad-creative-fonts-test',
        fonts: {
            [FontWeight.BOLD]: { primaryUrl: 'https://fonts.test/bold.ttf', alternateUrl: 'https://fonts-alt.test/bold.ttf' },
            [FontWeight.SEMIBOLD]: {
                primaryUrl: 'https://fonts.test/semibold.ttf',
                alternateUrl: 'https://fonts-alt.test/semibold.ttf',
            },
        },
        systemFontPaths: [],
        timeouts: { backgroundMs: 1000, logoMs: 1000, fontMs: 1000, customFontMs: 1000 },
        maxAssetBytes: 1024 * 1024,
        ...overrides,
    };
}

export function configServiceFor(render: RenderConfig): ConfigService {
    return new ConfigService({ render });
}
