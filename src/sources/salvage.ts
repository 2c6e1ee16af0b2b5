import { load } from 'cheerio';
import { parseDate } from '../dates.js';
import type { MediaRef, RawEntry } from '../types.js';

/**
 * 宽松读取解析器拒绝的文档
 * 原因：单个未闭合标签不应让整个栏目的条目丢失
 * 实现：cheerio xml 模式容忍残缺标签，逐个取 item/entry 子元素文本（去首尾空白）
 */
export function salvageEntries(xml: string): RawEntry[] {
    const $ = load(xml, { xml: true });
    return $('item, entry').toArray().map((el) => {
        const node = $(el);
        const text = (tag: string) => {
            const child = node.children(tag).first();
            return child.length > 0 ? child.text().trim() : undefined;
        };
        const urls = (tag: string): MediaRef[] =>
            node.children(tag).toArray().map((m) => ({ url: $(m).attr('url') }));
        const linkNode = node.children('link').first();
        const link = linkNode.attr('href')?.trim() ?? (linkNode.length > 0 ? linkNode.text().trim() : undefined);
        return {
            id: el.tagName === 'entry' ? text('id') : undefined,
            guid: text('guid'),
            title: text('title'),
            link,
            description: text('description'),
            summary: text('summary'),
            published: parseDate(text('pubDate') ?? text('published')),
            updated: parseDate(text('updated')),
            enclosures: urls('enclosure'),
            mediaContent: urls('media\\:content'),
            mediaThumbnails: urls('media\\:thumbnail')
        };
    });
}
