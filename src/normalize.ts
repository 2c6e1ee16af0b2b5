import crypto from 'node:crypto';
import type { MediaRef, NormalizedItem, RawEntry } from './types.js';

export type NormalizeOptions = { now: Date; fallbackImage: string };

/**
 * 条目的稳定标识
 * 原因：跨栏目去重只看 guid，必须在多次运行间保持不变
 * 实现：id → guid → link 依次取第一个非空值；都没有时用 `title-link` 的 sha1
 */
export function resolveGuid(entry: RawEntry): string {
    const native = entry.id || entry.guid || entry.link;
    if (native) return native;
    return sha1(`${entry.title ?? ''}-${entry.link ?? ''}`);
}

/** 发布时间：published，其次 updated，都缺失时取本次运行时间 */
export function resolvePublishedAt(entry: RawEntry, now: Date): Date {
    return entry.published ?? entry.updated ?? now;
}

/**
 * 选取配图
 * 原因：下游展示要求每条都有可直接访问的图片
 * 实现：enclosure → media:content → media:thumbnail，只看第一个非空列表的首个 url；非 http 开头则用兜底图
 */
export function resolveImage(entry: RawEntry, fallbackImage: string): string {
    const candidates: MediaRef[] = [entry.enclosures, entry.mediaContent, entry.mediaThumbnails]
        .find((list) => list.length > 0) ?? [];
    const url = candidates[0]?.url;
    if (!url || !url.startsWith('http')) return fallbackImage;
    return url;
}

export function resolveDescription(entry: RawEntry): string {
    return entry.description ?? entry.summary ?? '';
}

/**
 * RawEntry → NormalizedItem
 * 原因：各栏目 feed 字段参差，渲染阶段只处理统一结构
 * 实现：组合上面的 resolve*，标题、链接、摘要去首尾空白并带上栏目标签
 */
export function normalizeEntry(entry: RawEntry, label: string, options: NormalizeOptions): NormalizedItem {
    return {
        guid: resolveGuid(entry),
        title: (entry.title ?? '').trim(),
        link: (entry.link ?? '').trim(),
        description: resolveDescription(entry).trim(),
        pubDate: resolvePublishedAt(entry, options.now),
        label,
        image: resolveImage(entry, options.fallbackImage)
    };
}

function sha1(s: string) { return crypto.createHash('sha1').update(s).digest('hex'); }
