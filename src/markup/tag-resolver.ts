import { block_node, custom_tag, document, inline_node, resolved_tag } from "./markup-nodes.js";
import { InvalidTagUsageError, MissingRequiredAttributeError, UnknownTagError } from "./errors.js";
import { flag_is_set, known_tags, render_instruction, tag_spec } from "./tags.js";
import { M } from "../utils/debugging-and-logging.js";

export type hero_metadata = {
    file: string;
    ai: string;
    prompt: string | null;
};

export type document_metadata = {
    // the first hero image in the document, for og:image and friends
    hero: hero_metadata | null;
};

export type resolved_document = {
    readonly type: "doc";
    readonly content: readonly block_node[];
    readonly metadata: document_metadata;
};

function check_usage(node: custom_tag, spec: tag_spec) {
    for (const attribute of spec.required) {
        if (!Object.hasOwn(node.attributes, attribute)) {
            throw new MissingRequiredAttributeError(node.name, attribute, node.position);
        }
    }
    if (node.standalone && spec.placement === "inline") {
        throw new InvalidTagUsageError(node.name, "cannot stand alone", node.position);
    }
    if (!node.standalone && spec.placement === "standalone") {
        throw new InvalidTagUsageError(node.name, "must be on its own line, it cannot be used inline", node.position);
    }
    if (!node.standalone && flag_is_set(node.attributes, "standalone")) {
        throw new InvalidTagUsageError(node.name, "is marked standalone but is used inline", node.position);
    }
    if (!spec.takes_content && node.content !== null && node.content.length > 0) {
        throw new InvalidTagUsageError(node.name, "does not take content", node.position);
    }
    for (const attribute of Object.keys(node.attributes)) {
        if (!spec.required.includes(attribute) && !spec.optional.includes(attribute)) {
            M.warn(`Ignoring unknown attribute "${attribute}" on <${node.name}> at line ${node.position.line}`);
        }
    }
}

/**
 * Maps a custom tag to the instruction the renderer follows for it. Pure apart from warnings about ignored
 * attributes; no asset lookups happen here.
 */
export function resolve_tag(node: custom_tag): render_instruction {
    const spec = known_tags.get(node.name);
    if (!spec) {
        throw new UnknownTagError(node.name, node.position);
    }
    check_usage(node, spec);
    return spec.build(node.attributes);
}

class DocumentResolver {
    private hero: hero_metadata | null = null;

    resolve(doc: document): resolved_document {
        const content = doc.content.map(block => this.resolve_block(block));
        return {
            type: "doc",
            content,
            metadata: { hero: this.hero },
        };
    }

    private resolve_tag(node: custom_tag): resolved_tag {
        const instruction = resolve_tag(node);
        if (instruction.kind === "hero" && this.hero === null) {
            this.hero = { file: instruction.file, ai: instruction.ai, prompt: instruction.prompt };
        }
        return {
            type: "resolved tag",
            instruction,
            standalone: node.standalone,
            content: this.resolve_inline(node.content ?? []),
            position: node.position,
        };
    }

    private resolve_block(node: block_node): block_node {
        switch (node.type) {
            case "paragraph":
            case "heading":
                return { ...node, content: this.resolve_inline(node.content) };
            case "list":
                return { ...node, items: node.items.map(item => this.resolve_inline(item)) };
            case "blockquote":
                return { ...node, content: node.content.map(block => this.resolve_block(block)) };
            case "custom tag":
                return this.resolve_tag(node);
            case "code":
            case "rule":
            case "resolved tag":
                return node;
        }
    }

    private resolve_inline(nodes: readonly inline_node[]): inline_node[] {
        return nodes.map(node => {
            switch (node.type) {
                case "emphasis":
                case "strong":
                case "strikethrough":
                case "link":
                    return { ...node, content: this.resolve_inline(node.content) };
                case "custom tag":
                    return this.resolve_tag(node);
                case "text":
                case "inline code":
                case "image":
                case "line break":
                case "resolved tag":
                    return node;
            }
        });
    }
}

// Resolves every custom tag in document order, the first failure aborts the whole document
export function resolve_document(doc: document): resolved_document {
    return new DocumentResolver().resolve(doc);
}
