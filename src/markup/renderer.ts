import { block_node, inline_node } from "./markup-nodes.js";
import { InternalConsistencyError } from "./errors.js";
import { render_instruction_markup, template_options } from "./templates.js";
import { resolved_document } from "./tag-resolver.js";
import { escape_html } from "../utils/strings.js";

// Output follows markdown-it's default renderer for the prose constructs so articles without custom tags come out
// the same as they would from a stock converter: every block ends in a newline, soft breaks stay newlines.

export class HtmlRenderer {
    constructor(private readonly options: template_options) {}

    render(doc: resolved_document): string {
        return this.render_blocks(doc.content);
    }

    private render_blocks(blocks: readonly block_node[]) {
        return blocks.map(block => this.render_block(block)).join("");
    }

    private render_block(node: block_node): string {
        switch (node.type) {
            case "paragraph":
                return `<p>${this.render_inline(node.content)}</p>\n`;
            case "heading":
                return `<h${node.level}>${this.render_inline(node.content)}</h${node.level}>\n`;
            case "code": {
                const language = node.language !== null ? ` class="language-${escape_html(node.language)}"` : "";
                return `<pre><code${language}>${escape_html(node.content)}</code></pre>\n`;
            }
            case "list": {
                const tag = node.start_number === null ? "ul" : "ol";
                const start = node.start_number !== null && node.start_number !== 1 ? ` start="${node.start_number}"` : "";
                const items = node.items
                    .map(item =>
                        node.loose
                            ? `<li>\n<p>${this.render_inline(item)}</p>\n</li>\n`
                            : `<li>${this.render_inline(item)}</li>\n`,
                    )
                    .join("");
                return `<${tag}${start}>\n${items}</${tag}>\n`;
            }
            case "blockquote":
                return `<blockquote>\n${this.render_blocks(node.content)}</blockquote>\n`;
            case "rule":
                return "<hr>\n";
            case "resolved tag":
                return (
                    render_instruction_markup(
                        this.options,
                        node.instruction,
                        node.standalone,
                        this.render_inline(node.content),
                    ) + "\n"
                );
            case "custom tag":
                throw new InternalConsistencyError(`Unresolved tag <${node.name}> reached the renderer`, node.position);
        }
    }

    private render_inline(nodes: readonly inline_node[]): string {
        return nodes.map(node => this.render_inline_node(node)).join("");
    }

    private render_inline_node(node: inline_node): string {
        switch (node.type) {
            case "text":
                return escape_html(node.content);
            case "emphasis":
                return `<em>${this.render_inline(node.content)}</em>`;
            case "strong":
                return `<strong>${this.render_inline(node.content)}</strong>`;
            case "strikethrough":
                return `<s>${this.render_inline(node.content)}</s>`;
            case "inline code":
                return `<code>${escape_html(node.content)}</code>`;
            case "link":
                return `<a href="${escape_html(node.target)}">${this.render_inline(node.content)}</a>`;
            case "image":
                return `<img src="${escape_html(node.source)}" alt="${escape_html(node.alt)}">`;
            case "line break":
                return "<br>\n";
            case "resolved tag":
                return render_instruction_markup(
                    this.options,
                    node.instruction,
                    node.standalone,
                    this.render_inline(node.content),
                );
            case "custom tag":
                throw new InternalConsistencyError(`Unresolved tag <${node.name}> reached the renderer`, node.position);
        }
    }
}

export function render_document(doc: resolved_document, options: template_options): string {
    return new HtmlRenderer(options).render(doc);
}
