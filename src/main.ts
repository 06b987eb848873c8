#!/usr/bin/env node
/*
 * Usage: tagmark <input> [output directory]
 *   <input> is either a single article or a directory that is searched for .md articles
 *   Output goes to the given directory, config.jsonc's output_directory, or "out"
 */

import * as fs from "fs";
import * as path from "path";
import * as Sentry from "@sentry/node";
import JSONC from "jsonc-parser";
import type { ParseError } from "jsonc-parser";

import { M, critical_error } from "./utils/debugging-and-logging.js";
import { pluralize } from "./utils/strings.js";
import { load_articles, is_draft, render_article, split_frontmatter, Article } from "./infra/article-loader.js";
import { tagmark_config } from "./tagmark.js";

const CONFIG_PATH = "config.jsonc";
const DEFAULT_OUTPUT_DIRECTORY = "out";

function is_record(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optional_string(value: unknown, key: string): string | undefined {
    if (value === undefined || typeof value === "string") {
        return value;
    }
    throw new Error(`${CONFIG_PATH}: ${key} must be a string`);
}

async function load_config(): Promise<tagmark_config> {
    try {
        await fs.promises.access(CONFIG_PATH);
    } catch {
        return {};
    }
    const errors: ParseError[] = [];
    const config: unknown = JSONC.parse(await fs.promises.readFile(CONFIG_PATH, { encoding: "utf-8" }), errors);
    if (errors.length > 0 || !is_record(config)) {
        throw new Error(`Malformed ${CONFIG_PATH}`);
    }
    return {
        cdn_base: optional_string(config.cdn_base, "cdn_base"),
        characters_path: optional_string(config.characters_path, "characters_path"),
        output_directory: optional_string(config.output_directory, "output_directory"),
        sentry: optional_string(config.sentry, "sentry"),
    };
}

async function write_article(output_directory: string, article: Article) {
    const output_path = path.join(output_directory, `${article.slug}.html`);
    await fs.promises.mkdir(path.dirname(output_path), { recursive: true });
    await fs.promises.writeFile(output_path, article.rendered.html, { encoding: "utf-8" });
    M.debug(`Wrote ${output_path}`);
}

async function main(): Promise<number> {
    const [input, output_argument] = process.argv.slice(2);
    if (!input) {
        M.error("Usage: tagmark <input> [output directory]");
        return 2;
    }

    // reading the config before anything else, there is nothing to do in parallel anyway
    const config = await load_config();
    if (config.sentry) {
        Sentry.init({
            dsn: config.sentry,
        });
    }

    const output_directory = output_argument ?? config.output_directory ?? DEFAULT_OUTPUT_DIRECTORY;
    const options = { cdn_base: config.cdn_base, characters_path: config.characters_path };

    if ((await fs.promises.stat(input)).isDirectory()) {
        const { articles, failures } = await load_articles(input, options);
        for (const article of articles) {
            await write_article(output_directory, article);
        }
        M.info(`Wrote ${pluralize(articles.length, "article")} to ${output_directory}`);
        return failures.length > 0 ? 1 : 0;
    }

    const source = split_frontmatter(await fs.promises.readFile(input, { encoding: "utf-8" }));
    if (is_draft(source)) {
        M.warn(`${input} is a draft, rendering it anyway`);
    }
    await write_article(output_directory, render_article(path.basename(input), source, options));
    return 0;
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch(e => {
        critical_error(e);
        process.exitCode = 1;
    });

process.on("uncaughtException", error => {
    M.error("uncaughtException", error);
    process.exit(1);
});
