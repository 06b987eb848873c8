import type { render_instruction } from "./tags.js";

export type source_position = {
    readonly offset: number;
    readonly line: number;
    readonly column: number;
};

export type document = {
    readonly type: "doc";
    readonly content: readonly block_node[];
};

// inline nodes

export type plain_text = {
    readonly type: "text";
    readonly content: string;
};

export type formatted_text = {
    readonly type: "emphasis" | "strong" | "strikethrough";
    readonly content: readonly inline_node[];
};

export type inline_code = {
    readonly type: "inline code";
    readonly content: string;
};

export type link = {
    readonly type: "link";
    readonly target: string;
    readonly content: readonly inline_node[];
};

export type image = {
    readonly type: "image";
    readonly source: string;
    readonly alt: string;
};

export type line_break = {
    readonly type: "line break";
};

export type custom_tag = {
    readonly type: "custom tag";
    readonly name: string;
    readonly attributes: Readonly<Record<string, string>>;
    readonly standalone: boolean;
    // null for self-closing tags
    readonly content: readonly inline_node[] | null;
    readonly position: source_position;
};

export type resolved_tag = {
    readonly type: "resolved tag";
    readonly instruction: render_instruction;
    readonly standalone: boolean;
    readonly content: readonly inline_node[];
    readonly position: source_position;
};

export type inline_node =
    | plain_text
    | formatted_text
    | inline_code
    | link
    | image
    | line_break
    | custom_tag
    | resolved_tag;

// block nodes

export type paragraph = {
    readonly type: "paragraph";
    readonly content: readonly inline_node[];
};

export type heading = {
    readonly type: "heading";
    readonly level: number;
    readonly content: readonly inline_node[];
};

export type code_block = {
    readonly type: "code";
    readonly language: string | null;
    readonly content: string;
};

export type list = {
    readonly type: "list";
    readonly start_number: number | null;
    // items were separated by blank lines, each renders as a paragraph
    readonly loose: boolean;
    readonly items: readonly (readonly inline_node[])[];
};

export type blockquote = {
    readonly type: "blockquote";
    readonly content: readonly block_node[];
};

export type thematic_break = {
    readonly type: "rule";
};

export type block_node =
    | paragraph
    | heading
    | code_block
    | list
    | blockquote
    | thematic_break
    | custom_tag
    | resolved_tag;

export type markup_node = document | block_node | inline_node;
