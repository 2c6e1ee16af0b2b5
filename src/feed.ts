import fs from 'node:fs';
import path from 'node:path';
import { formatRfc822 } from './dates.js';
import type { ChannelMeta, NormalizedItem } from './types.js';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
export const UNTITLED = '(bez tytułu)';
const MEDIA_NS = 'http://search.yahoo.com/mrss/';

export type RenderOptions = { builtAt: Date; timeZone: string };

const XML_ENTITIES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&apos;' };

function escapeXml(s: string) {
    return s.replace(/[&<>"']/g, (c) => XML_ENTITIES[c] ?? c);
}

function element(name: string, text: string) {
    return text ? `<${name}>${escapeXml(text)}</${name}>` : `<${name} />`;
}

function renderItem(it: NormalizedItem, timeZone: string): string {
    const image = escapeXml(it.image);
    return [
        '    <item>',
        `      ${element('title', it.title || UNTITLED)}`,
        `      ${element('link', it.link)}`,
        `      ${element('description', it.description)}`,
        `      ${element('guid', it.guid)}`,
        `      ${element('pubDate', formatRfc822(it.pubDate, timeZone))}`,
        `      ${element('category', it.label)}`,
        `      <enclosure url="${image}" length="0" type="image/jpeg" />`,
        `      <media:content url="${image}" medium="image" />`,
        '    </item>'
    ].join('\n');
}

/**
 * 渲染 RSS 2.0 文档
 * 原因：下游按字面匹配声明行，且同样输入必须得到逐字节相同的输出
 * 实现：模板字符串逐行拼接，文本统一转义，日期按配置时区输出 RFC 822
 */
export function buildFeedXml(channel: ChannelMeta, items: NormalizedItem[], opts: RenderOptions): string {
    const lines = [
        XML_DECLARATION,
        `<rss version="2.0" xmlns:media="${MEDIA_NS}">`,
        '  <channel>',
        `    ${element('title', channel.title)}`,
        `    ${element('link', channel.link)}`,
        `    ${element('description', channel.description)}`,
        `    ${element('language', channel.language)}`,
        `    ${element('lastBuildDate', formatRfc822(opts.builtAt, opts.timeZone))}`,
        ...items.map((it) => renderItem(it, opts.timeZone)),
        '  </channel>',
        '</rss>'
    ];
    return lines.join('\n') + '\n';
}

/** 覆盖写输出文件，目录不存在时先创建 */
export function writeFeedFile(file: string, xml: string): void {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    fs.writeFileSync(file, xml, 'utf-8');
}
