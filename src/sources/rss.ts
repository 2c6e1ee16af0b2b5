import axios from 'axios';
import Parser from 'rss-parser';
import { createLogger } from '../logger.js';
import { parseDate } from '../dates.js';
import { salvageEntries } from './salvage.js';
import type { MediaRef, ParsedFeed, RawEntry } from '../types.js';

type ItemExtras = {
    description?: unknown;
    published?: unknown;
    updated?: unknown;
    id?: unknown;
    mediaContent?: unknown;
    mediaThumbnail?: unknown;
};

type FeedItem = ItemExtras & Parser.Item;

const parser = new Parser<Record<string, unknown>, ItemExtras>({
    customFields: {
        item: [
            'description',
            'published',
            'updated',
            'id',
            ['media:content', 'mediaContent', { keepArray: true }],
            ['media:thumbnail', 'mediaThumbnail', { keepArray: true }]
        ]
    }
});
const logger = createLogger('src:rss');

export type FetchOptions = { userAgent: string; timeoutMs: number };

/**
 * 下载并解析单个 feed
 * 原因：网络/HTTP 错误应让整次运行失败；文档损坏则尽量保留可用条目
 * 实现：axios 取文本（带 UA 与超时），交给 parseFeedDocument
 */
export async function fetchFeed(url: string, options: FetchOptions): Promise<ParsedFeed> {
    const start = Date.now();
    const res = await axios.get<string>(url, {
        responseType: 'text',
        timeout: options.timeoutMs,
        headers: { 'User-Agent': options.userAgent }
    });
    logger.debug('feed.fetch', { url, status: res.status, ms: Date.now() - start });
    return parseFeedDocument(res.data);
}

/** rss-parser 解析失败时标记 malformed，并用 cheerio 宽松模式抢救条目 */
export async function parseFeedDocument(xml: string): Promise<ParsedFeed> {
    try {
        const feed = await parser.parseString(xml);
        return { malformed: false, entries: (feed.items || []).map(toRawEntry) };
    } catch (e) {
        const error = e instanceof Error ? e.message : String(e);
        return { malformed: true, entries: salvageEntries(xml), error };
    }
}

/**
 * rss-parser 条目 → RawEntry
 * 原因：标识与链接两侧常带换行缩进，不去掉会让同一篇文章在不同 feed 中 guid 不一致
 * 实现：所有文本字段经 textOf 取值并 trim；published 优先，其次 pubDate
 */
export function toRawEntry(item: FeedItem): RawEntry {
    return {
        id: textOf(item.id),
        guid: textOf(item.guid),
        title: textOf(item.title),
        link: textOf(item.link),
        description: textOf(item.description),
        summary: textOf(item.summary),
        published: parseDate(textOf(item.published)) ?? parseDate(item.pubDate),
        updated: parseDate(textOf(item.updated)),
        enclosures: item.enclosure ? [{ url: item.enclosure.url }] : [],
        mediaContent: mediaRefs(item.mediaContent),
        mediaThumbnails: mediaRefs(item.mediaThumbnail)
    };
}

/** xml2js 给出纯字符串，带属性的元素则是 `{ _: text, $: attrs }` */
function textOf(value: unknown): string | undefined {
    if (typeof value === 'string') return value.trim();
    if (isRecord(value) && typeof value._ === 'string') return value._.trim();
    return undefined;
}

function mediaRefs(value: unknown): MediaRef[] {
    if (!Array.isArray(value)) return [];
    return value.map((node: unknown) => {
        const attrs: Record<string, unknown> = isRecord(node) && isRecord(node.$) ? node.$ : {};
        return { url: typeof attrs.url === 'string' ? attrs.url : undefined };
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}
