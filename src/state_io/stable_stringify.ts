// src/state_io/stable_stringify.ts

/** JSON with object keys sorted, so equal registries serialize identically. */
export function stableStringify(value: unknown): string {
    if (value === null) return "null";
    const t = typeof value;

    if (t === "number" || t === "boolean" || t === "string") return JSON.stringify(value);

    if (Array.isArray(value)) {
        return "[" + value.map(stableStringify).join(",") + "]";
    }

    if (typeof value === "object") {
        const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return (
            "{" +
            entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") +
            "}"
        );
    }

    // undefined, function, symbol, bigint
    throw new Error(`UNSUPPORTED_JSON_TYPE(${t})`);
}
