import { describe, expect, it } from "vitest";
import MarkdownIt from "markdown-it";

import { render_markup } from "../src/tagmark.js";
import { MarkupParser } from "../src/markup/parser.js";
import { render_document } from "../src/markup/renderer.js";
import { AssetResolver } from "../src/infra/asset-resolver.js";
import { InternalConsistencyError, ParseError } from "../src/markup/errors.js";

const options = { cdn_base: "https://cdn.test" };

const render = (text: string) => render_markup(text, options).html;

describe("Prose rendering", () => {
    const prose_cases = [
        [
            "# Compile times",
            "",
            "Rust builds are *slow*, but **incremental** builds help. " +
                "See [the book](https://doc.rust-lang.org/book/) and `cargo check`.",
            "",
            "- first item",
            "- second item",
            "",
            "1. one",
            "2. two",
            "",
            "> quoted text",
            "",
            "```rust",
            "fn main() {}",
            "```",
            "",
            "---",
            "",
            "Escaped \\*stars\\* and a < b & c.",
            "",
        ].join("\n"),
        "Intro text\n- item one\n- item two",
        "Text\n2. two",
        "- item\ncontinued lazily",
        "- a\n\n- b",
        "1. first\n\n2. second\n\nafter the list",
        "- a\n+ b",
        "# Title #",
        "## Notes on C#",
        "[link](https://example.com/\u00fc) and ![pic](images/caf\u00e9.png)",
        "Some text\n```\ncode\n```",
        "Some text\n## Next",
        "Some text\n> quoted",
        "**strong with *em* inside**",
    ];
    it("should match markdown-it for plain prose", () => {
        const md = new MarkdownIt();
        for (const text of prose_cases) {
            expect(render(text)).toBe(md.render(text));
        }
    });
    it("should render exact markup for prose", () => {
        expect(render("# Title\n\nSome *em* text")).toBe("<h1>Title</h1>\n<p>Some <em>em</em> text</p>\n");
        expect(render("3. three\n4. four")).toBe('<ol start="3">\n<li>three</li>\n<li>four</li>\n</ol>\n');
        expect(render("foo  \nbar")).toBe("<p>foo<br>\nbar</p>\n");
        expect(render("![a \"crab\"](crab.png) ~~gone~~")).toBe(
            '<p><img src="crab.png" alt="a &quot;crab&quot;"> <s>gone</s></p>\n',
        );
    });
    it("should be deterministic", () => {
        const text = '<hero file="crab"/>\n\nHello <dialogue name="Aoi" mood="wut">*hi*</dialogue>\n';
        expect(render(text)).toBe(render(text));
        expect(MarkupParser.parse(text)).to.deep.equal(MarkupParser.parse(text));
    });
});

describe("Custom tag rendering", () => {
    it("should render standalone dialogue as a speech bubble", () => {
        expect(render('<dialogue name="Aoi" mood="wut">Hi</dialogue>')).toBe(
            '<div class="conversation"><div class="conversation-standalone"><picture>' +
                '<source type="image/avif" srcset="https://cdn.test/stickers/aoi/wut.avif">' +
                '<source type="image/webp" srcset="https://cdn.test/stickers/aoi/wut.webp">' +
                '<img style="max-height:4.5rem" alt="Aoi is wut" loading="lazy" ' +
                'src="https://cdn.test/stickers/aoi/wut.png"></picture></div>' +
                '<div class="conversation-chat">&lt;<a href="/characters#aoi"><b>Aoi</b></a>&gt; Hi</div></div>\n',
        );
    });
    it("should render inline dialogue inside its paragraph", () => {
        expect(render('Then <dialogue name="Mara_Sh" mood="hacker">*yes*</dialogue> said.')).toBe(
            '<p>Then <span class="conversation-inline" data-speaker="mara_sh" data-mood="hacker">' +
                '&lt;<a href="/characters#mara_sh"><b>Mara Sh</b></a>&gt; <em>yes</em></span> said.</p>\n',
        );
    });
    it("should link speakers to the configured characters page", () => {
        expect(
            render_markup('Hey <dialogue name="Aoi" mood="wut">hi</dialogue>', {
                ...options,
                characters_path: "/cast",
            }).html,
        ).toBe(
            '<p>Hey <span class="conversation-inline" data-speaker="aoi" data-mood="wut">' +
                '&lt;<a href="/cast#aoi"><b>Aoi</b></a>&gt; hi</span></p>\n',
        );
    });
    it("should render hero images", () => {
        const result = render_markup('<hero file="rust-crab" prompt="a crab & a gear"/>', options);
        expect(result.html).toBe(
            '<figure class="hero" style="margin:0"><picture style="margin:0">' +
                '<source type="image/avif" srcset="https://cdn.test/hero/rust-crab.avif">' +
                '<source type="image/webp" srcset="https://cdn.test/hero/rust-crab.webp">' +
                '<img style="padding:0" loading="lazy" alt="hero image rust-crab" ' +
                'src="https://cdn.test/hero/rust-crab-smol.png"></picture>' +
                "<figcaption>MidJourney -- a crab &amp; a gear</figcaption></figure>\n",
        );
        expect(result.metadata).to.deep.equal({
            hero: { file: "rust-crab", ai: "MidJourney", prompt: "a crab & a gear" },
            og_image: "https://cdn.test/hero/rust-crab-smol.png",
        });
    });
    it("should render stickers", () => {
        expect(render('<sticker name="Cadey" mood="enby"/>')).toBe(
            "<center><picture>" +
                '<source type="image/avif" srcset="https://cdn.test/stickers/cadey/enby.avif">' +
                '<source type="image/webp" srcset="https://cdn.test/stickers/cadey/enby.webp">' +
                '<img alt="Cadey is enby" src="https://cdn.test/stickers/cadey/enby.png"></picture></center>\n',
        );
    });
    it("should render pictures", () => {
        expect(render('<picture path="blog/2023/build-graph"/>')).toBe(
            '<a href="https://cdn.test/blog/2023/build-graph.jpg" target="_blank">' +
                '<picture class="picture" style="margin:0">' +
                '<source type="image/avif" srcset="https://cdn.test/blog/2023/build-graph.avif">' +
                '<source type="image/webp" srcset="https://cdn.test/blog/2023/build-graph.webp">' +
                '<img class="picture" style="padding:0" loading="lazy" alt="hero image blog/2023/build-graph" ' +
                'src="https://cdn.test/blog/2023/build-graph-smol.png"></picture></a>\n',
        );
    });
    it("should render slides", () => {
        expect(render('<slide name="intro" essential/>')).toBe(
            '<div class="hero slides-essential"><picture style="margin:0">' +
                '<source type="image/avif" srcset="https://cdn.test/talks/intro.avif">' +
                '<source type="image/webp" srcset="https://cdn.test/talks/intro.webp">' +
                '<img style="padding:0" loading="lazy" alt="slide intro" src="https://cdn.test/talks/intro-smol.png">' +
                "</picture></div>\n",
        );
        expect(render('<slide name="outro"/>').startsWith('<div class="hero slides-fluff">')).toBe(true);
    });
    it("should render videos with a no-script fallback", () => {
        const html = render('<video path="talks/demo"/>');
        expect(html.startsWith('<div class="video" data-path="talks/demo"><noscript><div class="warning">')).toBe(true);
        expect(html.endsWith("sorry!</div></div></div></noscript></div>\n")).toBe(true);
    });
    it("should render the talk warning as a dialogue", () => {
        const html = render("<talk-warning/>");
        expect(html.startsWith('<div class="warning"><div class="conversation">')).toBe(true);
        expect(html).toContain('alt="Cadey is coffee"');
    });
});

describe("Rendering failures", () => {
    it("should never render a document that fails to parse", () => {
        let result: string | undefined;
        expect(() => {
            result = render('# Title\n\n<dialogue name="Aoi">Hi');
        }).toThrow(ParseError);
        expect(result).toBeUndefined();
    });
    it("should refuse unresolved tags", () => {
        const doc = MarkupParser.parse('<sticker name="Aoi" mood="wut"/>');
        const template_options = { assets: new AssetResolver("https://cdn.test"), characters_path: "/characters" };
        expect(() => render_document({ ...doc, metadata: { hero: null } }, template_options)).toThrow(
            InternalConsistencyError,
        );
        expect(() => render_document({ ...doc, metadata: { hero: null } }, template_options)).toThrow(
            "Unresolved tag <sticker> reached the renderer (at line 1, column 1)",
        );
    });
});
