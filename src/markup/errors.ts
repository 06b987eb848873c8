import type { source_position } from "./markup-nodes.js";

export class MarkupError extends Error {
    constructor(
        message: string,
        public readonly position: source_position,
    ) {
        super(`${message} (at line ${position.line}, column ${position.column})`);
        this.name = "MarkupError";
    }
}

export class ParseError extends MarkupError {
    constructor(message: string, position: source_position) {
        super(message, position);
        this.name = "ParseError";
    }
}

export class UnknownTagError extends MarkupError {
    constructor(
        public readonly tag: string,
        position: source_position,
    ) {
        super(`Unknown tag <${tag}>`, position);
        this.name = "UnknownTagError";
    }
}

export class MissingRequiredAttributeError extends MarkupError {
    constructor(
        public readonly tag: string,
        public readonly attribute: string,
        position: source_position,
    ) {
        super(`<${tag}> is missing required attribute "${attribute}"`, position);
        this.name = "MissingRequiredAttributeError";
    }
}

export class InvalidTagUsageError extends MarkupError {
    constructor(
        public readonly tag: string,
        message: string,
        position: source_position,
    ) {
        super(`<${tag}> ${message}`, position);
        this.name = "InvalidTagUsageError";
    }
}

// An unresolved node made it to the renderer, this is a bug and not something an author can fix
export class InternalConsistencyError extends MarkupError {
    constructor(message: string, position: source_position) {
        super(message, position);
        this.name = "InternalConsistencyError";
    }
}
