import { AssetResolver, DEFAULT_CDN_BASE } from "./infra/asset-resolver.js";
import { MarkupParser } from "./markup/parser.js";
import { render_document } from "./markup/renderer.js";
import { document_metadata, resolve_document } from "./markup/tag-resolver.js";

export type tagmark_config = {
    cdn_base?: string;
    characters_path?: string;
    output_directory?: string;
    sentry?: string;
};

export type render_options = {
    cdn_base?: string;
    characters_path?: string;
};

export type render_result = {
    html: string;
    metadata: document_metadata & {
        // small png of the hero image, for og:image
        og_image: string | null;
    };
};

export const DEFAULT_CHARACTERS_PATH = "/characters";

/**
 * Parses, resolves and renders one document. Synchronous and free of shared state, any number of documents can be
 * rendered independently of each other.
 */
export function render_markup(text: string, options: render_options = {}): render_result {
    const assets = new AssetResolver(options.cdn_base ?? DEFAULT_CDN_BASE);
    const resolved = resolve_document(MarkupParser.parse(text));
    const { hero } = resolved.metadata;
    return {
        html: render_document(resolved, {
            assets,
            characters_path: options.characters_path ?? DEFAULT_CHARACTERS_PATH,
        }),
        metadata: {
            hero,
            og_image: hero ? assets.url(`${assets.hero(hero.file)}-smol`, "png") : null,
        },
    };
}
