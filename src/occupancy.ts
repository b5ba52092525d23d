/**
 * Occupancy Differ — slot-level diff of two occupancy snapshots.
 *
 * A slot is "ended" when it was occupied and is now free or holds a different
 * code; "started" is the mirror image. A code change on an occupied slot is
 * therefore a reassignment and shows up in both lists.
 */

import { FREE_CODE, SlotCode } from './types';

export interface OccupancyDiff {
    ended: number[];
    started: number[];
}

const VALID_CODES: ReadonlySet<string> = new Set(['D', 'I', 'R', FREE_CODE]);

export function isSlotCode(token: string): token is SlotCode {
    return VALID_CODES.has(token);
}

export function isOccupied(code: SlotCode): boolean {
    return code !== FREE_CODE;
}

export type ParsedOccupancy =
    | { ok: true; codes: SlotCode[] }
    | { ok: false; invalid: string[] };

/** Split a whitespace-separated occupancy string ("D D x I") into codes. */
export function parseOccupancy(raw: string): ParsedOccupancy {
    const tokens = raw.split(/\s+/).filter(t => t.length > 0);
    const codes: SlotCode[] = [];
    const invalid: string[] = [];
    for (const token of tokens) {
        if (isSlotCode(token)) codes.push(token);
        else invalid.push(token);
    }
    return invalid.length > 0 ? { ok: false, invalid } : { ok: true, codes };
}

/** Lenient variant for cached registry strings: unknown tokens read as free. */
export function parseOccupancyLenient(raw: string): SlotCode[] {
    return raw.split(/\s+/).filter(t => t.length > 0).map(t => (isSlotCode(t) ? t : FREE_CODE));
}

export function padOccupancy(codes: readonly SlotCode[], length: number): SlotCode[] {
    const out = [...codes];
    while (out.length < length) out.push(FREE_CODE);
    return out;
}

export function formatOccupancy(codes: readonly SlotCode[]): string {
    return codes.join(' ');
}

export function diffOccupancy(prev: readonly SlotCode[], next: readonly SlotCode[]): OccupancyDiff {
    const len = Math.max(prev.length, next.length);
    const a = padOccupancy(prev, len);
    const b = padOccupancy(next, len);

    const ended: number[] = [];
    const started: number[] = [];
    for (let i = 0; i < len; i++) {
        const was = isOccupied(a[i]);
        const now = isOccupied(b[i]);
        if (was && (!now || a[i] !== b[i])) ended.push(i);
        if (now && (!was || a[i] !== b[i])) started.push(i);
    }
    return { ended, started };
}

export function occupiedCount(codes: readonly SlotCode[]): number {
    return codes.filter(isOccupied).length;
}
