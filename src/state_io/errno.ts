// src/state_io/errno.ts

/** `code` of a Node system error (ENOENT, EEXIST, ...), if any. */
export function errnoCode(e: unknown): string | undefined {
    if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
    return undefined;
}
