import { strict as assert } from "assert";
import MarkdownIt from "markdown-it";
import {
    block_node,
    custom_tag,
    document,
    inline_node,
    list,
    source_position,
} from "./markup-nodes.js";
import { ParseError } from "./errors.js";
import { unwrap } from "../utils/misc.js";

// Block level:
//   Blank lines separate blocks
//   Fenced code: ``` or ~~~ (three or more), closed by a fence of the same character that is at least as long
//   Headings: # through ###### followed by a space, an optional closing run of #s is dropped
//   Thematic breaks: three or more -, * or _ on their own line
//   Blockquotes: > at the start of consecutive lines, contents are parsed as blocks
//   Lists: -, *, + or 1. followed by a space. Following lines continue the item unless they start another block,
//   items of the same kind separated by blank lines make the list loose. A list interrupts a paragraph when it is a
//   bullet list or starts at 1
//   A block that is exactly one custom tag is a standalone tag, anything else is a paragraph
//
// Inline level:
//   Escapes, <!-- comments -->, custom tags, `code`, **strong**, __strong__, *emphasis*, _emphasis_,
//   ~~strikethrough~~, ![images](src), [links](target), hard breaks (two trailing spaces or \) and text
//
// Custom tags:
//   <name attr="value" flag>content</name> or <name attr="value" />
//   Values are double quoted, \" and \\ are the only escapes
//   Content is inline only, opening another custom tag inside content is an error as is a blank line
//   Code spans inside content are skipped when looking for the closing tag

const FENCE_RE = /^ {0,3}(`{3,}|~{3,})[ \t]*([^\s`]*)[^`]*$/;
const HEADING_RE = /^ {0,3}(#{1,6})(?:[ \t]+|$)/;
const THEMATIC_BREAK_RE = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const BLOCKQUOTE_RE = /^ {0,3}> ?/;
const HEADING_CLOSING_RE = /(?:^|[ \t]+)#+[ \t]*$/;
const LIST_ITEM_RE = /^ {0,3}(?:([-*+])|(\d{1,9})([.)]))[ \t]+/;
const LIST_INTERRUPT_RE = /^ {0,3}(?:[-*+]|1[.)])[ \t]+\S/;
const LIST_CONTINUATION_RE = /^ {2,}(?=\S)/;
const CUSTOM_TAG_BLOCK_RE = /^ {0,3}(?=<[A-Za-z])/;

const ESCAPE_RE = /^\\([!-/:-@[-`{-~])/;
const HARD_BREAK_RE = /^(?: {2,}|\\)\n[ \t]*/;
const SOFT_BREAK_RE = /^ *\n[ \t]*/;
const COMMENT_RE = /^<!--[\s\S]*?-->/;
const TAG_START_RE = /^<(\/?)([A-Za-z][\w-]*)/;
const INLINE_CODE_RE = /^(`+)([\s\S]*?[^`])\1(?!`)/;
const STRONG_RE = /^\*\*(?=\S)([\s\S]*?\S)\*\*(?!\*)|^__(?=\S)([\s\S]*?\S)__(?!\w)/;
const EMPHASIS_RE = new RegExp(
    // _s only surround words
    "^_((?:__|\\\\[\\s\\S]|[^\\\\_])+?)_(?!\\w)" +
        "|" +
        // *s followed by a non-space, ** inside doesn't close the emphasis
        "^\\*(?=\\S)((?:\\*\\*|\\s+(?:[^*\\s]|\\*\\*)|[^\\s*])+?)\\*(?!\\*)",
);
const STRIKETHROUGH_RE = /^~~(?=\S)([\s\S]*?\S)~~/;
const IMAGE_RE = /^!\[((?:\\.|[^\]\\])*)\]\(\s*([^()\s]*)\s*\)/;
const LINK_RE = /^\[((?:\\.|[^\]\\])*)\]\(\s*([^()\s]*)\s*\)/;
const TEXT_RE = /^[\s\S]+?(?=[\\<`*_~![\n]| +\n|$)/;

const TAG_NAME_RE = /^<([A-Za-z][\w-]*)/;
const ATTRIBUTE_NAME_RE = /^[A-Za-z_:][\w:.-]*/;
const CLOSING_TAG_RE = /^<\/([A-Za-z][\w-]*)\s*>/;
const BLANK_LINE_AHEAD_RE = /^\n[ \t]*\n/;

// link targets go through the same normalization and validation markdown-it applies
const md = new MarkdownIt();

/**
 * A piece of the source text. Blockquotes and list items strip prefixes off their lines, so the text handed to a
 * nested parse isn't a contiguous slice of the source; the span remembers where each character came from.
 */
export class SourceSpan {
    constructor(
        readonly text: string,
        private readonly offsets: (index: number) => number,
    ) {}

    static of(text: string) {
        return new SourceSpan(text, index => index);
    }

    static concat(pieces: SourceSpan[]) {
        let text = "";
        const offsets: number[] = [];
        for (const piece of pieces) {
            text += piece.text;
            for (let i = 0; i < piece.text.length; i++) {
                offsets.push(piece.offset_of(i));
            }
        }
        const last = pieces.at(-1);
        const end = last ? last.offset_of(last.text.length) : 0;
        return new SourceSpan(text, index => offsets[index] ?? end);
    }

    offset_of(index: number) {
        return this.offsets(index);
    }

    slice(start: number, end = this.text.length) {
        return new SourceSpan(this.text.slice(start, end), index => this.offsets(index + start));
    }

    trim() {
        const start = this.text.length - this.text.trimStart().length;
        const end = this.text.trimEnd().length;
        return start >= end ? this.slice(0, 0) : this.slice(start, end);
    }
}

type block_context = {
    span: SourceSpan;
    lines: string[];
    line_starts: number[];
};

type block_result = { node: block_node | null; next_line: number };

abstract class BlockRule<T = RegExpMatchArray> {
    abstract match(context: block_context, line_index: number, parser: MarkupParser): T | null;
    abstract parse(match: T, context: block_context, line_index: number, parser: MarkupParser): block_result;
}

function line_span(context: block_context, line_index: number, from = 0) {
    const start = context.line_starts[line_index];
    return context.span.slice(start + from, start + context.lines[line_index].length);
}

// Span from the start of `from_line` through the end of `to_line`, newlines included
function lines_span(context: block_context, from_line: number, to_line: number) {
    const end = context.line_starts[to_line] + context.lines[to_line].length;
    return context.span.slice(context.line_starts[from_line], end);
}

function line_of_index(context: block_context, index: number) {
    let line = 0;
    while (line + 1 < context.line_starts.length && context.line_starts[line + 1] <= index) {
        line++;
    }
    return line;
}

function is_blank(line: string) {
    return line.trim() === "";
}

function interrupts_paragraph(line: string) {
    return [FENCE_RE, HEADING_RE, THEMATIC_BREAK_RE, BLOCKQUOTE_RE, LIST_INTERRUPT_RE].some(re => re.test(line));
}

// bullet character for bullet lists, delimiter for ordered ones; items of one list share it
function list_marker(item: RegExpMatchArray) {
    return item[1] ?? item[3];
}

class BlankLineRule extends BlockRule<true> {
    override match(context: block_context, line_index: number): true | null {
        return is_blank(context.lines[line_index]) ? true : null;
    }

    override parse(_: true, context: block_context, line_index: number): block_result {
        return { node: null, next_line: line_index + 1 };
    }
}

class FenceRule extends BlockRule {
    override match(context: block_context, line_index: number): RegExpMatchArray | null {
        return context.lines[line_index].match(FENCE_RE);
    }

    override parse(
        match: RegExpMatchArray,
        context: block_context,
        line_index: number,
        parser: MarkupParser,
    ): block_result {
        const fence = match[1];
        const closing_re = new RegExp(`^ {0,3}${fence[0] === "`" ? "`" : "~"}{${fence.length},}[ \\t]*$`);
        for (let i = line_index + 1; i < context.lines.length; i++) {
            if (closing_re.test(context.lines[i])) {
                const body = context.lines.slice(line_index + 1, i);
                return {
                    node: {
                        type: "code",
                        language: match[2] === "" ? null : match[2],
                        content: body.length > 0 ? body.join("\n") + "\n" : "",
                    },
                    next_line: i + 1,
                };
            }
        }
        throw new ParseError(
            "Unterminated code fence",
            parser.position_in(context.span, context.line_starts[line_index]),
        );
    }
}

class HeadingRule extends BlockRule {
    override match(context: block_context, line_index: number): RegExpMatchArray | null {
        return context.lines[line_index].match(HEADING_RE);
    }

    override parse(
        match: RegExpMatchArray,
        context: block_context,
        line_index: number,
        parser: MarkupParser,
    ): block_result {
        const rest = line_span(context, line_index, match[0].length);
        const closing = rest.text.search(HEADING_CLOSING_RE);
        return {
            node: {
                type: "heading",
                level: match[1].length,
                content: parser.parse_inline((closing >= 0 ? rest.slice(0, closing) : rest).trim()),
            },
            next_line: line_index + 1,
        };
    }
}

class ThematicBreakRule extends BlockRule {
    override match(context: block_context, line_index: number): RegExpMatchArray | null {
        return context.lines[line_index].match(THEMATIC_BREAK_RE);
    }

    override parse(_: RegExpMatchArray, context: block_context, line_index: number): block_result {
        return { node: { type: "rule" }, next_line: line_index + 1 };
    }
}

class BlockquoteRule extends BlockRule {
    override match(context: block_context, line_index: number): RegExpMatchArray | null {
        return context.lines[line_index].match(BLOCKQUOTE_RE);
    }

    override parse(
        _: RegExpMatchArray,
        context: block_context,
        line_index: number,
        parser: MarkupParser,
    ): block_result {
        const pieces: SourceSpan[] = [];
        let i = line_index;
        let prefix: RegExpMatchArray | null;
        while (i < context.lines.length && (prefix = context.lines[i].match(BLOCKQUOTE_RE))) {
            if (pieces.length > 0) {
                // keep the newline that ended the previous line
                const newline_index = context.line_starts[i] - 1;
                pieces.push(context.span.slice(newline_index, newline_index + 1));
            }
            pieces.push(line_span(context, i, prefix[0].length));
            i++;
        }
        return {
            node: {
                type: "blockquote",
                content: parser.parse_blocks(SourceSpan.concat(pieces)),
            },
            next_line: i,
        };
    }
}

class ListRule extends BlockRule {
    override match(context: block_context, line_index: number): RegExpMatchArray | null {
        return context.lines[line_index].match(LIST_ITEM_RE);
    }

    // an item line continuing the list, thematic breaks like "* * *" end it instead
    private next_item(line: string, marker: string) {
        if (THEMATIC_BREAK_RE.test(line)) {
            return null;
        }
        const item = line.match(LIST_ITEM_RE);
        return item && list_marker(item) === marker ? item : null;
    }

    override parse(
        match: RegExpMatchArray,
        context: block_context,
        line_index: number,
        parser: MarkupParser,
    ): block_result {
        const marker = list_marker(match);
        const items: SourceSpan[][] = [[line_span(context, line_index, match[0].length)]];
        let loose = false;
        let i = line_index + 1;
        while (i < context.lines.length) {
            const line = context.lines[i];
            if (is_blank(line)) {
                let next = i + 1;
                while (next < context.lines.length && is_blank(context.lines[next])) {
                    next++;
                }
                if (next < context.lines.length && this.next_item(context.lines[next], marker)) {
                    loose = true;
                    i = next;
                    continue;
                }
                break;
            }
            const item = this.next_item(line, marker);
            if (item) {
                items.push([line_span(context, i, item[0].length)]);
            } else {
                const continuation = line.match(LIST_CONTINUATION_RE);
                // unindented lines continue the item lazily, like they would a paragraph
                if (LIST_ITEM_RE.test(line) || (!continuation && interrupts_paragraph(line))) {
                    break;
                }
                const newline_index = context.line_starts[i] - 1;
                unwrap(items.at(-1)).push(
                    context.span.slice(newline_index, newline_index + 1),
                    line_span(context, i, continuation ? continuation[0].length : 0),
                );
            }
            i++;
        }
        const node: list = {
            type: "list",
            start_number: match[2] ? parseInt(match[2]) : null,
            loose,
            items: items.map(pieces => parser.parse_inline(SourceSpan.concat(pieces).trim())),
        };
        return { node, next_line: i };
    }
}

class CustomTagBlockRule extends BlockRule<scanned_tag> {
    override match(context: block_context, line_index: number, parser: MarkupParser): scanned_tag | null {
        const indent = context.lines[line_index].match(CUSTOM_TAG_BLOCK_RE);
        if (!indent) {
            return null;
        }
        const scanned = parser.scan_custom_tag(context.span, context.line_starts[line_index] + indent[0].length);
        const end_line = line_of_index(context, scanned.end);
        const rest = context.span.text.slice(
            scanned.end,
            context.line_starts[end_line] + context.lines[end_line].length,
        );
        // anything else on the tag's last line makes it part of a paragraph
        return is_blank(rest) ? scanned : null;
    }

    override parse(scanned: scanned_tag, context: block_context, _: number, parser: MarkupParser): block_result {
        return {
            node: parser.make_custom_tag(scanned, true),
            next_line: line_of_index(context, scanned.end) + 1,
        };
    }
}

class ParagraphRule extends BlockRule<number> {
    // returns the index of the paragraph's last line
    override match(context: block_context, line_index: number): number | null {
        let last = line_index;
        while (last + 1 < context.lines.length) {
            const next = context.lines[last + 1];
            if (is_blank(next) || interrupts_paragraph(next)) {
                break;
            }
            last++;
        }
        return last;
    }

    override parse(last: number, context: block_context, line_index: number, parser: MarkupParser): block_result {
        const content = parser.parse_inline(lines_span(context, line_index, last).trim());
        return {
            node: content.length > 0 ? { type: "paragraph", content } : null,
            next_line: last + 1,
        };
    }
}

type inline_context = {
    span: SourceSpan;
    cursor: number;
    previous: string;
};

type inline_result = { node: inline_node | null; fragment_end: number };

abstract class InlineRule {
    abstract match(remaining: string, context: inline_context): RegExpMatchArray | null;
    abstract parse(match: RegExpMatchArray, parser: MarkupParser, context: inline_context): inline_result;
    coalesce?(a: inline_node, b: inline_node): inline_node | null;
}

function sub_span(context: inline_context, start: number, length: number) {
    return context.span.slice(context.cursor + start, context.cursor + start + length);
}

function unescape_markup(str: string) {
    return str.replace(/\\([!-/:-@[-`{-~])/g, "$1");
}

class EscapeRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(ESCAPE_RE);
    }

    override parse(match: RegExpMatchArray): inline_result {
        return { node: { type: "text", content: match[1] }, fragment_end: match[0].length };
    }
}

class HardBreakRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(HARD_BREAK_RE);
    }

    override parse(match: RegExpMatchArray): inline_result {
        return { node: { type: "line break" }, fragment_end: match[0].length };
    }
}

class SoftBreakRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(SOFT_BREAK_RE);
    }

    override parse(match: RegExpMatchArray): inline_result {
        return { node: { type: "text", content: "\n" }, fragment_end: match[0].length };
    }
}

class CommentRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(COMMENT_RE);
    }

    override parse(match: RegExpMatchArray): inline_result {
        return { node: null, fragment_end: match[0].length };
    }
}

class CustomTagRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(TAG_START_RE);
    }

    override parse(match: RegExpMatchArray, parser: MarkupParser, context: inline_context): inline_result {
        if (match[1] === "/") {
            throw new ParseError(
                `Closing tag </${match[2]}> without an opening tag`,
                parser.position_in(context.span, context.cursor),
            );
        }
        const scanned = parser.scan_custom_tag(context.span, context.cursor);
        return { node: parser.make_custom_tag(scanned, false), fragment_end: scanned.end - context.cursor };
    }
}

class InlineCodeRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(INLINE_CODE_RE);
    }

    override parse(match: RegExpMatchArray): inline_result {
        let content = match[2].replace(/\n/g, " ");
        if (content.length > 2 && content.startsWith(" ") && content.endsWith(" ") && /\S/.test(content)) {
            content = content.slice(1, -1);
        }
        return { node: { type: "inline code", content }, fragment_end: match[0].length };
    }
}

class StrongRule extends InlineRule {
    override match(remaining: string, context: inline_context): RegExpMatchArray | null {
        if (remaining.startsWith("__") && /\w/.test(context.previous)) {
            return null;
        }
        return remaining.match(STRONG_RE);
    }

    override parse(match: RegExpMatchArray, parser: MarkupParser, context: inline_context): inline_result {
        const inner = match[1] ?? match[2];
        return {
            node: { type: "strong", content: parser.parse_inline(sub_span(context, 2, inner.length)) },
            fragment_end: match[0].length,
        };
    }
}

class EmphasisRule extends InlineRule {
    override match(remaining: string, context: inline_context): RegExpMatchArray | null {
        if (remaining.startsWith("_") && /\w/.test(context.previous)) {
            return null;
        }
        return remaining.match(EMPHASIS_RE);
    }

    override parse(match: RegExpMatchArray, parser: MarkupParser, context: inline_context): inline_result {
        const inner = match[1] ?? match[2];
        return {
            node: { type: "emphasis", content: parser.parse_inline(sub_span(context, 1, inner.length)) },
            fragment_end: match[0].length,
        };
    }
}

class StrikethroughRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(STRIKETHROUGH_RE);
    }

    override parse(match: RegExpMatchArray, parser: MarkupParser, context: inline_context): inline_result {
        return {
            node: { type: "strikethrough", content: parser.parse_inline(sub_span(context, 2, match[1].length)) },
            fragment_end: match[0].length,
        };
    }
}

// javascript: and friends are left as text, the same way markdown-it treats them
function valid_target(match: RegExpMatchArray | null) {
    return match && md.validateLink(normalize_target(match[2])) ? match : null;
}

function normalize_target(target: string) {
    return md.normalizeLink(unescape_markup(target));
}

class ImageRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return valid_target(remaining.match(IMAGE_RE));
    }

    override parse(match: RegExpMatchArray): inline_result {
        return {
            node: { type: "image", source: normalize_target(match[2]), alt: unescape_markup(match[1]) },
            fragment_end: match[0].length,
        };
    }
}

class LinkRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return valid_target(remaining.match(LINK_RE));
    }

    override parse(match: RegExpMatchArray, parser: MarkupParser, context: inline_context): inline_result {
        return {
            node: {
                type: "link",
                target: normalize_target(match[2]),
                content: parser.parse_inline(sub_span(context, 1, match[1].length)),
            },
            fragment_end: match[0].length,
        };
    }
}

class TextRule extends InlineRule {
    override match(remaining: string): RegExpMatchArray | null {
        return remaining.match(TEXT_RE);
    }

    override parse(match: RegExpMatchArray): inline_result {
        return { node: { type: "text", content: match[0] }, fragment_end: match[0].length };
    }

    override coalesce(a: inline_node, b: inline_node): inline_node | null {
        if (a.type !== "text" || b.type !== "text") {
            return null;
        }
        return { type: "text", content: a.content + b.content };
    }
}

export type scanned_tag = {
    name: string;
    attributes: Record<string, string>;
    // null for self-closing tags
    content: SourceSpan | null;
    start: number;
    end: number;
    position: source_position;
};

export class MarkupParser {
    private readonly line_starts: number[] = [0];
    readonly source: string;

    readonly block_rules: BlockRule<unknown>[] = [
        new BlankLineRule(),
        new FenceRule(),
        new HeadingRule(),
        new ThematicBreakRule(),
        new BlockquoteRule(),
        new ListRule(),
        new CustomTagBlockRule(),
        new ParagraphRule(),
    ];

    readonly inline_rules: InlineRule[] = [
        new EscapeRule(),
        new HardBreakRule(),
        new SoftBreakRule(),
        new CommentRule(),
        new CustomTagRule(),
        new InlineCodeRule(),
        new StrongRule(),
        new EmphasisRule(),
        new StrikethroughRule(),
        new ImageRule(),
        new LinkRule(),
        new TextRule(),
    ];

    constructor(input: string) {
        this.source = input.replace(/\r\n?/g, "\n");
        for (let i = 0; i < this.source.length; i++) {
            if (this.source[i] === "\n") {
                this.line_starts.push(i + 1);
            }
        }
    }

    static parse(input: string): document {
        const parser = new MarkupParser(input);
        return {
            type: "doc",
            content: parser.parse_blocks(SourceSpan.of(parser.source)),
        };
    }

    position_at(offset: number): source_position {
        let line = 0;
        while (line + 1 < this.line_starts.length && this.line_starts[line + 1] <= offset) {
            line++;
        }
        return { offset, line: line + 1, column: offset - this.line_starts[line] + 1 };
    }

    position_in(span: SourceSpan, index: number) {
        return this.position_at(span.offset_of(index));
    }

    parse_blocks(span: SourceSpan): block_node[] {
        const lines = span.text.split("\n");
        const line_starts: number[] = [];
        let start = 0;
        for (const line of lines) {
            line_starts.push(start);
            start += line.length + 1;
        }
        const context: block_context = { span, lines, line_starts };
        const blocks: block_node[] = [];
        let line_index = 0;
        while (line_index < lines.length) {
            const { node, next_line } = this.parse_block(context, line_index);
            assert(next_line > line_index, "Block rule made no progress");
            if (node) {
                blocks.push(node);
            }
            line_index = next_line;
        }
        return blocks;
    }

    private parse_block(context: block_context, line_index: number): block_result {
        for (const rule of this.block_rules) {
            const match = rule.match(context, line_index, this);
            if (match !== null) {
                return rule.parse(match, context, line_index, this);
            }
        }
        throw new Error("No block rule matched");
    }

    parse_inline(span: SourceSpan): inline_node[] {
        const parts: inline_node[] = [];
        let cursor = 0;
        while (cursor < span.text.length) {
            const context: inline_context = { span, cursor, previous: cursor > 0 ? span.text[cursor - 1] : "" };
            const { node, fragment_end } = this.parse_inline_node(context);
            assert(fragment_end > 0, "Inline rule made no progress");
            if (node) {
                parts.push(node);
                this.try_coalesce_new_parts(parts);
            }
            cursor += fragment_end;
        }
        return parts;
    }

    private parse_inline_node(context: inline_context): inline_result {
        const remaining = context.span.text.slice(context.cursor);
        for (const rule of this.inline_rules) {
            const match = rule.match(remaining, context);
            if (match) {
                return rule.parse(match, this, context);
            }
        }
        throw new ParseError(`No match when parsing ${remaining}`, this.position_in(context.span, context.cursor));
    }

    private try_coalesce_new_parts(parts: inline_node[]) {
        if (parts.length < 2) {
            return;
        }
        for (const rule of this.inline_rules) {
            if (rule.coalesce) {
                const coalesced = rule.coalesce(unwrap(parts.at(-2)), unwrap(parts.at(-1)));
                if (coalesced) {
                    parts.splice(parts.length - 2, 2, coalesced);
                }
            }
        }
    }

    /**
     * Scans a custom tag starting at the `<` at `start`, through its closing tag if it isn't self-closing.
     */
    scan_custom_tag(span: SourceSpan, start: number): scanned_tag {
        const text = span.text;
        const position = this.position_in(span, start);
        const name = unwrap(text.slice(start).match(TAG_NAME_RE))[1];
        const attributes: Record<string, string> = {};
        let i = start + 1 + name.length;
        let self_closing = false;
        for (;;) {
            while (i < text.length && /\s/.test(text[i])) {
                i++;
            }
            if (i >= text.length) {
                throw new ParseError(`Unterminated tag <${name}>`, position);
            }
            if (text[i] === ">") {
                i++;
                break;
            }
            if (text[i] === "/") {
                if (text[i + 1] !== ">") {
                    throw new ParseError(`Expected ">" after "/" in <${name}>`, this.position_in(span, i));
                }
                i += 2;
                self_closing = true;
                break;
            }
            const attribute_start = i;
            const attribute = text.slice(i).match(ATTRIBUTE_NAME_RE);
            if (!attribute) {
                throw new ParseError(`Malformed attribute list in <${name}>`, this.position_in(span, i));
            }
            i += attribute[0].length;
            let value = "";
            if (text[i] === "=") {
                i++;
                if (text[i] !== '"') {
                    throw new ParseError(
                        `Value of attribute "${attribute[0]}" in <${name}> must be double-quoted`,
                        this.position_in(span, i),
                    );
                }
                i++;
                for (;;) {
                    if (i >= text.length) {
                        throw new ParseError(`Unterminated tag <${name}>`, position);
                    }
                    const c = text[i];
                    if (c === "\\" && (text[i + 1] === '"' || text[i + 1] === "\\")) {
                        value += text[i + 1];
                        i += 2;
                    } else if (c === '"') {
                        i++;
                        break;
                    } else {
                        value += c;
                        i++;
                    }
                }
                if (i < text.length && !/[\s/>]/.test(text[i])) {
                    throw new ParseError(
                        `Unescaped quote in value of attribute "${attribute[0]}" in <${name}>`,
                        this.position_in(span, i),
                    );
                }
            }
            if (Object.hasOwn(attributes, attribute[0])) {
                throw new ParseError(
                    `Duplicate attribute "${attribute[0]}" in <${name}>`,
                    this.position_in(span, attribute_start),
                );
            }
            attributes[attribute[0]] = value;
        }
        if (self_closing) {
            return { name, attributes, content: null, start, end: i, position };
        }
        const content_start = i;
        for (;;) {
            if (i >= text.length) {
                throw new ParseError(`Unterminated tag <${name}>`, position);
            }
            const c = text[i];
            const remaining = text.slice(i);
            if (c === "\\") {
                i += 2;
            } else if (c === "`") {
                const run = unwrap(remaining.match(/^`+/))[0];
                const closer = new RegExp(`(?<!\`)${"`".repeat(run.length)}(?!\`)`, "g");
                closer.lastIndex = i + run.length;
                const found = closer.exec(text);
                i = found ? found.index + run.length : i + run.length;
            } else if (c === "\n" && BLANK_LINE_AHEAD_RE.test(remaining)) {
                throw new ParseError(`Blank line inside <${name}>, tag content cannot span blocks`, position);
            } else if (c === "<") {
                const closing = remaining.match(CLOSING_TAG_RE);
                const comment = remaining.match(COMMENT_RE);
                if (closing) {
                    if (closing[1] !== name) {
                        throw new ParseError(
                            `Expected </${name}> but found </${closing[1]}>`,
                            this.position_in(span, i),
                        );
                    }
                    return {
                        name,
                        attributes,
                        content: span.slice(content_start, i).trim(),
                        start,
                        end: i + closing[0].length,
                        position,
                    };
                } else if (TAG_NAME_RE.test(remaining)) {
                    const inner = unwrap(remaining.match(TAG_NAME_RE))[1];
                    throw new ParseError(
                        `Custom tag <${inner}> cannot be nested inside <${name}>`,
                        this.position_in(span, i),
                    );
                } else if (comment) {
                    i += comment[0].length;
                } else {
                    i++;
                }
            } else {
                i++;
            }
        }
    }

    make_custom_tag(scanned: scanned_tag, standalone: boolean): custom_tag {
        return {
            type: "custom tag",
            name: scanned.name,
            attributes: scanned.attributes,
            standalone,
            content: scanned.content ? this.parse_inline(scanned.content) : null,
            position: scanned.position,
        };
    }
}
