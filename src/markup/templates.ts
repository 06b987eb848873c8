import { AssetResolver } from "../infra/asset-resolver.js";
import { build_markup, escape_html } from "../utils/strings.js";
import { render_instruction } from "./tags.js";

export type template_options = {
    assets: AssetResolver;
    // page listing the characters, speaker names link to an anchor on it
    characters_path: string;
};

const TALK_WARNING_TEXT =
    "So you are aware: you are reading the written version of a conference talk. This is written in a different " +
    "style that is more lighthearted and conversational than the content normally on this blog. The words here " +
    "are the words that were spoken at the conference and the slides are the slides for each spoken utterance.";

const NO_SCRIPT_TEXT = "This dynamic component requires JavaScript to function, sorry!";

function attribute(name: string, value: string) {
    return ` ${name}="${escape_html(value)}"`;
}

function sources(assets: AssetResolver, base: string) {
    return (
        `<source${attribute("type", "image/avif")}${attribute("srcset", assets.url(base, "avif"))}>` +
        `<source${attribute("type", "image/webp")}${attribute("srcset", assets.url(base, "webp"))}>`
    );
}

function display_name(speaker: string) {
    return speaker.replaceAll("_", " ");
}

function chat_prefix(options: template_options, speaker: string) {
    const anchor = `${options.characters_path}#${speaker.toLowerCase()}`;
    return `&lt;<a${attribute("href", anchor)}><b>${escape_html(display_name(speaker))}</b></a>&gt; `;
}

export function conversation(options: template_options, speaker: string, mood: string, body: string) {
    const sticker = options.assets.sticker(speaker, mood);
    return build_markup([
        '<div class="conversation">',
        '<div class="conversation-standalone">',
        "<picture>",
        sources(options.assets, sticker),
        '<img style="max-height:4.5rem"',
        attribute("alt", `${display_name(speaker)} is ${mood}`),
        ' loading="lazy"',
        attribute("src", options.assets.url(sticker, "png")),
        ">",
        "</picture>",
        "</div>",
        '<div class="conversation-chat">',
        chat_prefix(options, speaker),
        body,
        "</div>",
        "</div>",
    ]);
}

export function inline_conversation(options: template_options, speaker: string, mood: string, body: string) {
    return build_markup([
        '<span class="conversation-inline"',
        attribute("data-speaker", speaker.toLowerCase()),
        attribute("data-mood", mood),
        ">",
        chat_prefix(options, speaker),
        body,
        "</span>",
    ]);
}

export function hero(options: template_options, file: string, ai: string, prompt: string | null) {
    const base = options.assets.hero(file);
    return build_markup([
        '<figure class="hero" style="margin:0">',
        '<picture style="margin:0">',
        sources(options.assets, base),
        `<img style="padding:0" loading="lazy"${attribute("alt", `hero image ${file}`)}`,
        `${attribute("src", options.assets.url(`${base}-smol`, "png"))}>`,
        "</picture>",
        "<figcaption>",
        escape_html(ai),
        prompt !== null ? ` -- ${escape_html(prompt)}` : null,
        "</figcaption>",
        "</figure>",
    ]);
}

export function sticker(options: template_options, speaker: string, mood: string) {
    const base = options.assets.sticker(speaker, mood);
    return build_markup([
        "<center>",
        "<picture>",
        sources(options.assets, base),
        `<img${attribute("alt", `${display_name(speaker)} is ${mood}`)}`,
        `${attribute("src", options.assets.url(base, "png"))}>`,
        "</picture>",
        "</center>",
    ]);
}

export function picture(options: template_options, path: string) {
    return build_markup([
        `<a${attribute("href", options.assets.url(path, "jpg"))} target="_blank">`,
        '<picture class="picture" style="margin:0">',
        sources(options.assets, path),
        `<img class="picture" style="padding:0" loading="lazy"${attribute("alt", `hero image ${path}`)}`,
        `${attribute("src", options.assets.url(`${path}-smol`, "png"))}>`,
        "</picture>",
        "</a>",
    ]);
}

export function slide(options: template_options, name: string, essential: boolean) {
    const base = options.assets.slide(name);
    return build_markup([
        `<div class="hero ${essential ? "slides-essential" : "slides-fluff"}">`,
        '<picture style="margin:0">',
        sources(options.assets, base),
        `<img style="padding:0" loading="lazy"${attribute("alt", `slide ${name}`)}`,
        `${attribute("src", options.assets.url(`${base}-smol`, "png"))}>`,
        "</picture>",
        "</div>",
    ]);
}

export function video(options: template_options, path: string) {
    return build_markup([
        `<div class="video"${attribute("data-path", path)}>`,
        "<noscript>",
        '<div class="warning">',
        conversation(options, "Aoi", "coffee", NO_SCRIPT_TEXT),
        "</div>",
        "</noscript>",
        "</div>",
    ]);
}

export function talk_warning(options: template_options) {
    return `<div class="warning">${conversation(options, "Cadey", "coffee", TALK_WARNING_TEXT)}</div>`;
}

/**
 * Renders a resolved tag. `body` is the tag's content, already rendered; tags without content ignore it.
 */
export function render_instruction_markup(
    options: template_options,
    instruction: render_instruction,
    standalone: boolean,
    body: string,
): string {
    switch (instruction.kind) {
        case "conversation":
            return standalone
                ? conversation(options, instruction.speaker, instruction.mood, body)
                : inline_conversation(options, instruction.speaker, instruction.mood, body);
        case "hero":
            return hero(options, instruction.file, instruction.ai, instruction.prompt);
        case "sticker":
            return sticker(options, instruction.speaker, instruction.mood);
        case "picture":
            return picture(options, instruction.path);
        case "slide":
            return slide(options, instruction.name, instruction.essential);
        case "video":
            return video(options, instruction.path);
        case "talk warning":
            return talk_warning(options);
    }
}
