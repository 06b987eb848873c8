import * as util from "util";

export function pluralize(n: number, word: string) {
    if (n == 1) {
        return `${n} ${word}`;
    } else {
        return `${n} ${word}s`;
    }
}

export function is_string(value: string | unknown): value is string {
    return typeof value === "string" || value instanceof String;
}

export function to_string(value: unknown): string {
    if (is_string(value)) {
        return value.toString();
    } else if (value instanceof Error) {
        return value.stack ?? `${value.name}: ${value.message}`;
    } else {
        return util.inspect(value);
    }
}

const html_escapes: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
};

// Same escaping as markdown-it's escapeHtml, so prose output lines up with it
export function escape_html(str: string) {
    return str.replace(/[&<>"]/g, c => html_escapes[c] ?? c);
}

// Takes an array of lines and joins them, skips null entries. This is a helper function to make building markup
// and conditionally excluding pieces more ergonomic
export function build_markup(pieces: (string | null)[]) {
    return pieces.filter(x => x !== null).join("");
}
