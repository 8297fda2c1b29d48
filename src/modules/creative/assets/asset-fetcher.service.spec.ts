import axios, { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { AssetFetcherService } from './asset-fetcher.service';
import { AssetFetchError } from '../../../common/errors/render.errors';
import { AssetMessage } from '../../../libs/messages';
import { solidPng } from '../testing/images';
import { buildRenderConfig, configServiceFor } from '../testing/render-config.fixture';

const ASSET_URL = 'https://assets.test/photo.png';

function response(data: Buffer, status = 200): AxiosResponse {
    return { data, status, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('AssetFetcherService', () => {
    const fetcher = new AssetFetcherService(configServiceFor(buildRenderConfig({ maxAssetBytes: 4096 })));

    afterEach(() => jest.restoreAllMocks());

    it('downloads with the timeout, size cap and user agent', async () => {
        const get = jest.spyOn(axios, 'get').mockResolvedValue(response(Buffer.from('bytes')));

        const body = await fetcher.download(ASSET_URL, 1500);

        expect(body.toString()).toBe('bytes');
        expect(get).toHaveBeenCalledWith(
            ASSET_URL,
            expect.objectContaining({
                responseType: 'arraybuffer',
                timeout: 1500,
                maxContentLength: 4096,
                headers: { 'User-Agent': expect.stringContaining('AdCreativeRenderer') },
            }),
        );
    });

    it('decodes an image with its dimensions', async () => {
        jest.spyOn(axios, 'get').mockResolvedValue(response(solidPng(30, 20, '#ff0000')));

        const outcome = await fetcher.fetchImage(ASSET_URL, 1000);

        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.value.width).toBe(30);
            expect(outcome.value.height).toBe(20);
        }
    });

    it('reports HTTP errors with their status', async () => {
        const notFound = new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', undefined, undefined, {
            ...response(Buffer.alloc(0)),
            status: 404,
            statusText: 'Not Found',
        });
        jest.spyOn(axios, 'get').mockRejectedValue(notFound);

        const outcome = await fetcher.fetchImage(ASSET_URL, 1000);

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error).toBeInstanceOf(AssetFetchError);
            expect(outcome.error.status).toBe(404);
            expect(outcome.error.url).toBe(ASSET_URL);
            expect(outcome.error.message).toBe(`${AssetMessage.DOWNLOAD_FAILED}: HTTP 404`);
        }
    });

    it('reports timeouts', async () => {
        jest.spyOn(axios, 'get').mockRejectedValue(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'));

        await expect(fetcher.download(ASSET_URL, 1000)).rejects.toThrow(AssetMessage.DOWNLOAD_TIMEOUT);
    });

    it('rejects bytes that are not an image', async () => {
        jest.spyOn(axios, 'get').mockResolvedValue(response(Buffer.from('<html></html>')));

        const outcome = await fetcher.fetchImage(ASSET_URL, 1000);

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.message.startsWith(AssetMessage.NOT_AN_IMAGE)).toBe(true);
        }
    });
});
