import type { NormalizedItem, RawEntry } from '../src/types.js';

export const NOW = new Date('2026-10-19T12:00:00Z');
export const FALLBACK = 'https://cdn.example.com/fallback.jpg';

export function rawEntry(fields: Partial<RawEntry> = {}): RawEntry {
    return { enclosures: [], mediaContent: [], mediaThumbnails: [], ...fields };
}

export function item(guid: string, pubDate: string, fields: Partial<NormalizedItem> = {}): NormalizedItem {
    return {
        guid,
        title: guid,
        link: `https://example.com/${guid}`,
        description: '',
        pubDate: new Date(pubDate),
        label: 'test',
        image: FALLBACK,
        ...fields
    };
}
