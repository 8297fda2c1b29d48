import type { Image } from '@napi-rs/canvas';
import type { AssetFetchError } from '../../../common/errors/render.errors';

export interface DecodedImage {
    image: Image;
    width: number;
    height: number;
}

/**
 * Outcome of a soft-failing fetch. Callers decide whether a failure
 * is fatal (background) or skipped (logo, fonts).
 */
export type FetchOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: AssetFetchError };
