export type render_instruction =
    | { kind: "conversation"; speaker: string; mood: string }
    | { kind: "hero"; file: string; ai: string; prompt: string | null }
    | { kind: "sticker"; speaker: string; mood: string }
    | { kind: "picture"; path: string }
    | { kind: "slide"; name: string; essential: boolean }
    | { kind: "video"; path: string }
    | { kind: "talk warning" };

export type tag_placement = "standalone" | "inline" | "either";

export type tag_spec = {
    required: readonly string[];
    optional: readonly string[];
    placement: tag_placement;
    takes_content: boolean;
    build: (attributes: Readonly<Record<string, string>>) => render_instruction;
};

export const DEFAULT_HERO_AI = "MidJourney";

// Flag attributes are on when present, `flag="false"` turns them off explicitly
export function flag_is_set(attributes: Readonly<Record<string, string>>, flag: string) {
    return Object.hasOwn(attributes, flag) && attributes[flag] !== "false";
}

function optional_attribute(attributes: Readonly<Record<string, string>>, name: string) {
    return Object.hasOwn(attributes, name) ? attributes[name] : null;
}

export const known_tags: ReadonlyMap<string, tag_spec> = new Map<string, tag_spec>([
    [
        "dialogue",
        {
            required: ["name", "mood"],
            optional: ["standalone"],
            placement: "either",
            takes_content: true,
            build: attributes => ({ kind: "conversation", speaker: attributes.name, mood: attributes.mood }),
        },
    ],
    [
        "hero",
        {
            required: ["file"],
            optional: ["ai", "prompt"],
            placement: "standalone",
            takes_content: false,
            build: attributes => ({
                kind: "hero",
                file: attributes.file,
                ai: optional_attribute(attributes, "ai") ?? DEFAULT_HERO_AI,
                prompt: optional_attribute(attributes, "prompt"),
            }),
        },
    ],
    [
        "sticker",
        {
            required: ["name", "mood"],
            optional: [],
            placement: "standalone",
            takes_content: false,
            build: attributes => ({ kind: "sticker", speaker: attributes.name, mood: attributes.mood }),
        },
    ],
    [
        "picture",
        {
            required: ["path"],
            optional: [],
            placement: "standalone",
            takes_content: false,
            build: attributes => ({ kind: "picture", path: attributes.path }),
        },
    ],
    [
        "slide",
        {
            required: ["name"],
            optional: ["essential"],
            placement: "standalone",
            takes_content: false,
            build: attributes => ({
                kind: "slide",
                name: attributes.name,
                essential: flag_is_set(attributes, "essential"),
            }),
        },
    ],
    [
        "video",
        {
            required: ["path"],
            optional: [],
            placement: "standalone",
            takes_content: false,
            build: attributes => ({ kind: "video", path: attributes.path }),
        },
    ],
    [
        "talk-warning",
        {
            required: [],
            optional: [],
            placement: "standalone",
            takes_content: false,
            build: () => ({ kind: "talk warning" }),
        },
    ],
]);
