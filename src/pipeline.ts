import { createLogger } from './logger.js';
import { daysBefore } from './dates.js';
import { normalizeEntry, resolveGuid } from './normalize.js';
import { buildFeedXml, writeFeedFile } from './feed.js';
import { fetchFeed } from './sources/rss.js';
import type {
    AggregationResult,
    AggregatorConfig,
    FeedReader,
    FeedSource,
    NormalizedItem,
    SourceReport
} from './types.js';

const logger = createLogger('pipeline');

export type AggregateOptions = { readFeed: FeedReader; now: Date; fallbackImage: string };

/**
 * 依序读取各源并标准化、去重
 * 原因：同一篇文章会出现在多个栏目 feed 中，只保留首次出现（沿用最先配置的栏目标签）
 * 实现：顺序抓取；guid 已见则计入 duplicates 跳过；每源记录 SourceReport
 */
export async function aggregate(
    sources: readonly FeedSource[],
    opts: AggregateOptions
): Promise<{ items: NormalizedItem[]; reports: SourceReport[] }> {
    const items: NormalizedItem[] = [];
    const reports: SourceReport[] = [];
    const seen = new Set<string>();

    for (const source of sources) {
        const parsed = await opts.readFeed(source.url);
        if (parsed.malformed) {
            logger.warn('feed.malformed', { url: source.url, err: parsed.error, salvaged: parsed.entries.length });
        }
        const report: SourceReport = {
            url: source.url,
            label: source.label,
            malformed: parsed.malformed,
            entries: parsed.entries.length,
            added: 0,
            duplicates: 0
        };
        for (const entry of parsed.entries) {
            const guid = resolveGuid(entry);
            if (seen.has(guid)) {
                report.duplicates++;
                continue;
            }
            seen.add(guid);
            items.push(normalizeEntry(entry, source.label, { now: opts.now, fallbackImage: opts.fallbackImage }));
            report.added++;
        }
        logger.info('feed.read', { ...report });
        reports.push(report);
    }

    logger.info('pipeline.aggregate', { sources: sources.length, items: items.length });
    return { items, reports };
}

/**
 * 保留窗口内（含边界）的条目，按发布时间倒序
 * 原因：输出只需最近两周；截止点按目标时区的日历天计算
 * 实现：先过滤再稳定排序
 */
export function selectRecent(
    items: readonly NormalizedItem[],
    now: Date,
    windowDays: number,
    timeZone: string
): NormalizedItem[] {
    const cutoff = daysBefore(now, windowDays, timeZone).getTime();
    // 稳定排序：时间相同保持原顺序
    const kept = items
        .filter((it) => it.pubDate.getTime() >= cutoff)
        .sort((a, b) => b.pubDate.getTime() - a.pubDate.getTime());
    logger.info('pipeline.select', { before: items.length, after: kept.length, windowDays });
    return kept;
}

export type RunDeps = {
    readFeed?: FeedReader;
    clock?: () => Date;
    writeOutput?: (file: string, xml: string) => void;
};

/**
 * 完整一次运行：聚合 → 保留窗口 → 渲染 → 写文件
 * 原因：输出要么完整、要么不写；任何抓取失败直接让本次运行失败
 * 实现：时钟、读取器、写入器可注入，默认走网络与文件系统
 */
export async function runAggregation(config: AggregatorConfig, deps: RunDeps = {}): Promise<AggregationResult> {
    const clock = deps.clock ?? (() => new Date());
    const readFeed = deps.readFeed
        ?? ((url: string) => fetchFeed(url, { userAgent: config.userAgent, timeoutMs: config.requestTimeoutMs }));
    const writeOutput = deps.writeOutput ?? writeFeedFile;

    const now = clock();
    const { items, reports } = await aggregate(config.sources, { readFeed, now, fallbackImage: config.fallbackImage });
    const selected = selectRecent(items, now, config.retentionDays, config.timeZone);

    const xml = buildFeedXml(config.channel, selected, { builtAt: clock(), timeZone: config.timeZone });
    writeOutput(config.outputFile, xml);
    logger.info('pipeline.write', { file: config.outputFile, items: selected.length, bytes: Buffer.byteLength(xml) });

    return { items: selected, reports, outputFile: config.outputFile };
}

/** 运行结束时写到 stdout 的结果行 */
export function formatSummary(result: AggregationResult): string {
    return `OK: wrote ${result.outputFile} (items: ${result.items.length})`;
}
