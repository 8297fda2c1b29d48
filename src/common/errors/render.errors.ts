/**
 * Thrown (or returned inside a FetchOutcome) when a remote asset cannot be
 * downloaded or decoded. Fatal for the background, skipped for logos.
 */
export class AssetFetchError extends Error {
    constructor(
        message: string,
        readonly url: string,
        readonly status?: number,
    ) {
        super(message);
        this.name = 'AssetFetchError';
    }
}

/** Unexpected failure while laying out or compositing a creative */
export class RenderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RenderError';
    }
}
