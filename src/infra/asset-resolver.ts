export const DEFAULT_CDN_BASE = "https://cdn.example.com/static";

/**
 * Maps asset names used in articles to URLs on the CDN. Whether the asset actually exists is the CDN's problem,
 * nothing here does any I/O.
 */
export class AssetResolver {
    readonly cdn_base: string;

    constructor(cdn_base: string = DEFAULT_CDN_BASE) {
        this.cdn_base = cdn_base.replace(/\/+$/, "");
    }

    url(path: string, extension: string) {
        return `${this.cdn_base}/${path.replace(/^\/+/, "")}.${extension}`;
    }

    // base path for the avif/webp/png set of an image, extensions are added by the caller
    hero(file: string) {
        return `hero/${file}`;
    }

    sticker(speaker: string, mood: string) {
        return `stickers/${speaker.toLowerCase()}/${mood}`;
    }

    slide(name: string) {
        return `talks/${name}`;
    }
}
