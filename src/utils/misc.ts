import { strict as assert } from "assert";

export function unwrap<T>(x: T | null | undefined): T {
    assert(x !== null && x !== undefined);
    return x;
}
