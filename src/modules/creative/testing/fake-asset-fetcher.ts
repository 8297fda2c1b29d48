import { AssetFetcherService } from '../assets/asset-fetcher.service';
import { AssetFetchError } from '../../../common/errors/render.errors';
import { AssetMessage } from '../../../libs/messages';
import { buildRenderConfig, configServiceFor } from './render-config.fixture';

/**
 * In-process stand-in for remote assets: serves registered buffers and
 * answers 404 for everything else.
 */
export class FakeAssetFetcher extends AssetFetcherService {
    readonly requests: Array<{ url: string; timeoutMs: number }> = [];
    private readonly assets = new Map<string, Buffer>();

    constructor() {
        super(configServiceFor(buildRenderConfig()));
    }

    serve(url: string, body: Buffer): this {
        this.assets.set(url, body);
        return this;
    }

    async download(url: string, timeoutMs: number): Promise<Buffer> {
        this.requests.push({ url, timeoutMs });
        const body = this.assets.get(url);
        if (!body) {
            throw new AssetFetchError(`${AssetMessage.DOWNLOAD_FAILED}: HTTP 404`, url, 404);
        }
        return body;
    }

    requestedUrls(): string[] {
        return this.requests.map((request) => request.url);
    }
}
