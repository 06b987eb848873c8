import { afterEach, describe, expect, it, vi } from "vitest";

import { MarkupParser } from "../src/markup/parser.js";
import { resolve_document, resolve_tag } from "../src/markup/tag-resolver.js";
import { known_tags } from "../src/markup/tags.js";
import { custom_tag } from "../src/markup/markup-nodes.js";
import { InvalidTagUsageError, MissingRequiredAttributeError, UnknownTagError } from "../src/markup/errors.js";
import { M } from "../src/utils/debugging-and-logging.js";

function first_tag(text: string): custom_tag {
    const block = MarkupParser.parse(text).content[0];
    if (block.type === "custom tag") {
        return block;
    }
    if (block.type === "paragraph") {
        for (const node of block.content) {
            if (node.type === "custom tag") {
                return node;
            }
        }
    }
    throw new Error(`no custom tag in ${text}`);
}

describe("Tag resolution", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("should resolve dialogue", () => {
        expect(resolve_tag(first_tag('<dialogue name="Aoi" mood="wut">Hi</dialogue>'))).to.deep.equal({
            kind: "conversation",
            speaker: "Aoi",
            mood: "wut",
        });
    });
    it("should default the hero's ai", () => {
        expect(resolve_tag(first_tag('<hero file="rust-crab"/>'))).to.deep.equal({
            kind: "hero",
            file: "rust-crab",
            ai: "MidJourney",
            prompt: null,
        });
        expect(resolve_tag(first_tag('<hero file="rust-crab" ai="Stable Diffusion" prompt="a crab"/>'))).to.deep.equal({
            kind: "hero",
            file: "rust-crab",
            ai: "Stable Diffusion",
            prompt: "a crab",
        });
    });
    it("should handle flag attributes", () => {
        expect(resolve_tag(first_tag('<slide name="intro" essential/>'))).to.deep.equal({
            kind: "slide",
            name: "intro",
            essential: true,
        });
        expect(resolve_tag(first_tag('<slide name="intro" essential="false"/>'))).to.deep.equal({
            kind: "slide",
            name: "intro",
            essential: false,
        });
        expect(resolve_tag(first_tag('<slide name="intro"/>'))).to.deep.equal({
            kind: "slide",
            name: "intro",
            essential: false,
        });
    });
    it("should reject unknown tags", () => {
        expect(() => resolve_tag(first_tag('<nonsense foo="bar"/>'))).toThrow(UnknownTagError);
        expect(() => resolve_tag(first_tag('<nonsense foo="bar"/>'))).toThrow(
            "Unknown tag <nonsense> (at line 1, column 1)",
        );
    });
    it("should reject missing required attributes", () => {
        expect(() => resolve_tag(first_tag('<dialogue name="Aoi">Hi</dialogue>'))).toThrow(
            MissingRequiredAttributeError,
        );
        expect(() => resolve_tag(first_tag('<dialogue name="Aoi">Hi</dialogue>'))).toThrow(
            '<dialogue> is missing required attribute "mood" (at line 1, column 1)',
        );
    });
    it("should reject every tag missing any one of its required attributes", () => {
        for (const [name, spec] of known_tags) {
            for (const missing of spec.required) {
                const attributes = spec.required
                    .filter(attribute => attribute !== missing)
                    .map(attribute => ` ${attribute}="x"`)
                    .join("");
                let error: unknown = null;
                try {
                    resolve_tag(first_tag(`<${name}${attributes}/>`));
                } catch (e) {
                    error = e;
                }
                expect(error).toBeInstanceOf(MissingRequiredAttributeError);
                if (error instanceof MissingRequiredAttributeError) {
                    expect(error.tag).toBe(name);
                    expect(error.attribute).toBe(missing);
                }
            }
        }
    });
    it("should reject standalone-only tags used inline", () => {
        expect(() => resolve_tag(first_tag('Look <hero file="x"/> here'))).toThrow(InvalidTagUsageError);
        expect(() => resolve_tag(first_tag('Look <hero file="x"/> here'))).toThrow(
            "<hero> must be on its own line, it cannot be used inline (at line 1, column 6)",
        );
    });
    it("should reject inline dialogue marked standalone", () => {
        expect(() => resolve_tag(first_tag('Hey <dialogue name="Aoi" mood="wut" standalone>hi</dialogue>'))).toThrow(
            "<dialogue> is marked standalone but is used inline (at line 1, column 5)",
        );
    });
    it("should reject content on tags that take none", () => {
        expect(() => resolve_tag(first_tag('<hero file="x">caption</hero>'))).toThrow(
            "<hero> does not take content (at line 1, column 1)",
        );
    });
    it("should warn about unknown attributes", () => {
        const warn = vi.spyOn(M, "warn").mockImplementation(() => {});
        expect(resolve_tag(first_tag('<sticker name="Aoi" mood="wut" colour="red"/>'))).to.deep.equal({
            kind: "sticker",
            speaker: "Aoi",
            mood: "wut",
        });
        expect(warn).toHaveBeenCalledWith('Ignoring unknown attribute "colour" on <sticker> at line 1');
    });
});

describe("Document resolution", () => {
    it("should resolve tags everywhere in the document", () => {
        const resolved = resolve_document(
            MarkupParser.parse('> <dialogue name="Aoi" mood="wut">Hi</dialogue>\n\n- item <dialogue name="Mara" mood="happy">yo</dialogue>'),
        );
        expect(resolved.content).to.deep.equal([
            {
                type: "blockquote",
                content: [
                    {
                        type: "resolved tag",
                        instruction: { kind: "conversation", speaker: "Aoi", mood: "wut" },
                        standalone: true,
                        content: [{ type: "text", content: "Hi" }],
                        position: { offset: 2, line: 1, column: 3 },
                    },
                ],
            },
            {
                type: "list",
                start_number: null,
                loose: false,
                items: [
                    [
                        { type: "text", content: "item " },
                        {
                            type: "resolved tag",
                            instruction: { kind: "conversation", speaker: "Mara", mood: "happy" },
                            standalone: false,
                            content: [{ type: "text", content: "yo" }],
                            position: { offset: 56, line: 3, column: 8 },
                        },
                    ],
                ],
            },
        ]);
        expect(resolved.metadata).to.deep.equal({ hero: null });
    });
    it("should collect the first hero as metadata", () => {
        const resolved = resolve_document(
            MarkupParser.parse('<hero file="first" prompt="crab"/>\n\n<hero file="second"/>'),
        );
        expect(resolved.metadata).to.deep.equal({ hero: { file: "first", ai: "MidJourney", prompt: "crab" } });
    });
    it("should fail the whole document on the first bad tag", () => {
        expect(() =>
            resolve_document(MarkupParser.parse('# Title\n\n<sticker name="Aoi" mood="wut"/>\n\n<sticker name="Aoi"/>')),
        ).toThrow('<sticker> is missing required attribute "mood" (at line 5, column 1)');
    });
});
