import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { loadImage } from '@napi-rs/canvas';
import axios from 'axios';
import { AssetFetchError } from '../../../common/errors/render.errors';
import { AssetMessage } from '../../../libs/messages';
import { DecodedImage, FetchOutcome } from '../../../libs/types/Creative';
import { RenderConfig } from '../../../config/render.config';

const USER_AGENT = 'Mozilla/5.0 (compatible; AdCreativeRenderer/1.0)';

/**
 * Asset Fetcher
 *
 * Downloads remote backgrounds, logos and font files.
 * `download` throws `AssetFetchError`; `fetchImage` reports failures
 * as a value so the caller decides whether they are fatal.
 */
@Injectable()
export class AssetFetcherService {
    private readonly logger = new Logger(AssetFetcherService.name);
    private readonly maxBytes: number;

    constructor(private readonly configService: ConfigService) {
        this.maxBytes = this.configService.get<RenderConfig>('render')?.maxAssetBytes ?? 25 * 1024 * 1024;
    }

    async download(url: string, timeoutMs: number): Promise<Buffer> {
        try {
            const response = await axios.get<ArrayBuffer>(url, {
                responseType: 'arraybuffer',
                timeout: timeoutMs,
                maxContentLength: this.maxBytes,
                headers: { 'User-Agent': USER_AGENT },
            });

            const buffer = Buffer.from(response.data);
            this.logger.log(`Downloaded ${(buffer.length / 1024).toFixed(1)} KB from ${url.substring(0, 80)}`);
            return buffer;
        } catch (error) {
            throw toAssetError(error, url, this.maxBytes);
        }
    }

    async fetchImage(url: string, timeoutMs: number): Promise<FetchOutcome<DecodedImage>> {
        try {
            const buffer = await this.download(url, timeoutMs);
            return { ok: true, value: await decodeImage(buffer, url) };
        } catch (error) {
            if (error instanceof AssetFetchError) return { ok: false, error };

            const errMsg = error instanceof Error ? error.message : String(error);
            return { ok: false, error: new AssetFetchError(`${AssetMessage.DOWNLOAD_FAILED}: ${errMsg}`, url) };
        }
    }
}

export async function decodeImage(buffer: Buffer, url: string): Promise<DecodedImage> {
    try {
        const image = await loadImage(buffer);
        if (!image.width || !image.height) {
            throw new Error('image has no pixels');
        }
        return { image, width: image.width, height: image.height };
    } catch (error) {
        const errMsg = error instanceof Error ? error.message : String(error);
        throw new AssetFetchError(`${AssetMessage.NOT_AN_IMAGE}: ${errMsg}`, url);
    }
}

function toAssetError(error: unknown, url: string, maxBytes: number): AssetFetchError {
    if (!axios.isAxiosError(error)) {
        const errMsg = error instanceof Error ? error.message : String(error);
        return new AssetFetchError(`${AssetMessage.DOWNLOAD_FAILED}: ${errMsg}`, url);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new AssetFetchError(AssetMessage.DOWNLOAD_TIMEOUT, url);
    }
    if (error.code === 'ERR_BAD_RESPONSE' && error.message.includes('maxContentLength')) {
        return new AssetFetchError(`${AssetMessage.TOO_LARGE} (${maxBytes} bytes)`, url);
    }

    const status = error.response?.status;
    const detail = status ? `HTTP ${status}` : error.message;
    return new AssetFetchError(`${AssetMessage.DOWNLOAD_FAILED}: ${detail}`, url, status);
}
