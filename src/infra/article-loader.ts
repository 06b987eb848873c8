import * as fs from "fs";
import * as path from "path";

import { globIterate } from "glob";
import matter from "gray-matter";
import MarkdownIt from "markdown-it";

import { M } from "../utils/debugging-and-logging.js";
import { is_string } from "../utils/strings.js";
import { render_markup, render_options, render_result } from "../tagmark.js";

const md = new MarkdownIt();

export type Article = {
    path: string;
    slug: string;
    title: string;
    date: string | null;
    tags: string[];
    rendered: render_result;
};

export type ArticleFailure = {
    path: string;
    error: unknown;
};

export type LoadedArticles = {
    articles: Article[];
    failures: ArticleFailure[];
    skipped_drafts: string[];
};

type ArticleFrontmatter = {
    title?: unknown;
    date?: unknown;
    tags?: unknown;
    draft?: unknown;
};

export type ArticleSource = {
    frontmatter: ArticleFrontmatter;
    body: string;
};

function extract_title_from_markdown(content: string): string | null {
    const tokens = md.parse(content, {});
    for (let i = 0; i < tokens.length; i++) {
        if (tokens[i].type === "heading_open" && tokens[i].tag === "h1") {
            // The next token contains the heading content
            if (i + 1 < tokens.length && tokens[i + 1].type === "inline") {
                return tokens[i + 1].content;
            }
        }
    }
    return null;
}

function file_path_to_slug(file_path: string): string {
    // e.g. "blog/2023/rust-compile-times.md" -> "blog/2023/rust-compile-times"
    let slug = file_path;
    if (slug.endsWith(".md")) {
        slug = slug.substring(0, slug.length - 3);
    }
    if (slug.endsWith("/index")) {
        slug = slug.substring(0, slug.length - 6);
    }
    return slug;
}

function format_date(date: unknown): string | null {
    // yaml turns unquoted dates into Date objects
    if (date instanceof Date) {
        return date.toISOString().slice(0, 10);
    } else if (is_string(date)) {
        return date;
    }
    return null;
}

function normalize_tags(tags: unknown): string[] {
    if (Array.isArray(tags)) {
        return tags.filter(is_string);
    } else if (is_string(tags)) {
        return tags
            .split(",")
            .map(tag => tag.trim())
            .filter(tag => tag !== "");
    }
    return [];
}

export function split_frontmatter(text: string): ArticleSource {
    const parsed = matter(text);
    return { frontmatter: parsed.data, body: parsed.content };
}

export function is_draft(source: ArticleSource) {
    return source.frontmatter.draft === true;
}

/**
 * Renders one article. `file_path` is relative to the article root and becomes the slug.
 */
export function render_article(file_path: string, source: ArticleSource, options: render_options = {}): Article {
    const { frontmatter, body } = source;
    const slug = file_path_to_slug(file_path);
    const title = is_string(frontmatter.title)
        ? frontmatter.title
        : (extract_title_from_markdown(body) ?? path.basename(slug));
    return {
        path: file_path,
        slug,
        title,
        date: format_date(frontmatter.date),
        tags: normalize_tags(frontmatter.tags),
        rendered: render_markup(body, options),
    };
}

export function parse_article(file_path: string, text: string, options: render_options = {}): Article {
    return render_article(file_path, split_frontmatter(text), options);
}

export async function load_articles(directory: string, options: render_options = {}): Promise<LoadedArticles> {
    const result: LoadedArticles = { articles: [], failures: [], skipped_drafts: [] };

    try {
        await fs.promises.access(directory);
    } catch {
        M.info(`Article directory not found at ${directory}, skipping`);
        return result;
    }

    const files: string[] = [];
    for await (const file_path of globIterate("**/*.md", { cwd: directory, posix: true })) {
        files.push(file_path);
    }
    // glob order depends on the filesystem
    files.sort();

    for (const file_path of files) {
        try {
            const content = await fs.promises.readFile(path.join(directory, file_path), { encoding: "utf-8" });
            const source = split_frontmatter(content);
            if (is_draft(source)) {
                M.info(`Skipping draft ${file_path}`);
                result.skipped_drafts.push(file_path);
                continue;
            }
            result.articles.push(render_article(file_path, source, options));
        } catch (e) {
            M.error(`Failed to render article ${file_path}: ${e}`);
            result.failures.push({ path: file_path, error: e });
        }
    }

    M.info(`Rendered ${result.articles.length} articles, ${result.failures.length} failed`);
    return result;
}
