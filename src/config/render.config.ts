import { registerAs } from '@nestjs/config';
import * as os from 'os';
import * as path from 'path';
import { FontWeight } from '../libs/enums/CreativeEnums';

export interface RemoteFontSources {
  primaryUrl: string;
  alternateUrl: string;
}

export interface RenderConfig {
  fontCacheDir: string;
  fonts: Record<FontWeight, RemoteFontSources>;
  systemFontPaths: string[];
  timeouts: {
    backgroundMs: number;
    logoMs: number;
    fontMs: number;
    customFontMs: number;
  };
  maxAssetBytes: number;
}

const DEFAULT_SYSTEM_FONTS = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf',
  '/usr/share/fonts/TTF/DejaVuSans-Bold.ttf',
];

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) return fallback;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export default registerAs('render', (): RenderConfig => ({
  fontCacheDir: process.env.FONT_CACHE_DIR || path.join(os.tmpdir(), 'ad-creative-fonts'),
  fonts: {
    [FontWeight.BOLD]: {
      primaryUrl:
        process.env.FONT_BOLD_URL ||
        'https://raw.githubusercontent.com/googlefonts/Montserrat/main/fonts/ttf/Montserrat-Bold.ttf',
      alternateUrl:
        process.env.FONT_BOLD_ALT_URL ||
        'https://cdn.jsdelivr.net/fontsource/fonts/montserrat@latest/latin-700-normal.ttf',
    },
    [FontWeight.SEMIBOLD]: {
      primaryUrl:
        process.env.FONT_SEMIBOLD_URL ||
        'https://raw.githubusercontent.com/googlefonts/Montserrat/main/fonts/ttf/Montserrat-SemiBold.ttf',
      alternateUrl:
        process.env.FONT_SEMIBOLD_ALT_URL ||
        'https://cdn.jsdelivr.net/fontsource/fonts/montserrat@latest/latin-600-normal.ttf',
    },
  },
  systemFontPaths: parseList(process.env.SYSTEM_FONT_PATHS, DEFAULT_SYSTEM_FONTS),
  timeouts: {
    backgroundMs: parseInt(process.env.BACKGROUND_TIMEOUT_MS || '30000', 10),
    logoMs: parseInt(process.env.LOGO_TIMEOUT_MS || '15000', 10),
    fontMs: parseInt(process.env.FONT_TIMEOUT_MS || '10000', 10),
    customFontMs: parseInt(process.env.CUSTOM_FONT_TIMEOUT_MS || '15000', 10),
  },
  maxAssetBytes: parseInt(process.env.MAX_ASSET_BYTES || String(25 * 1024 * 1024), 10),
}));
