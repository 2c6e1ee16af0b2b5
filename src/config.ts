import fs from 'node:fs';
import path from 'node:path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { isValidTimeZone } from './dates.js';
import type { AggregatorConfig } from './types.js';

export const DEFAULT_CONFIG_PATH = './configs/sources.yaml';

export const DEFAULT_CONFIG: AggregatorConfig = {
    sources: [
        { url: 'https://www.medonet.pl/.feed', label: 'ogólny' },
        { url: 'https://dziecko.medonet.pl/.feed', label: 'dziecko' },
        { url: 'https://uroda.medonet.pl/.feed', label: 'uroda' },
        { url: 'https://zywienie.medonet.pl/.feed', label: 'żywienie' }
    ],
    retentionDays: 14,
    fallbackImage: 'https://sm-cdn.eu/y37kjgxdy0ufdyjt.jpg',
    timeZone: 'Europe/Warsaw',
    outputFile: 'docs/medonet.xml',
    userAgent: 'medonet-aggregator/1.0',
    requestTimeoutMs: 8000,
    channel: {
        title: 'medonetRSS – agregat (ogólny, dziecko, uroda, żywienie)',
        link: 'https://www.medonet.pl/',
        description: 'Zbiorczy RSS z wybranych sekcji Medonetu. Retencja: 14 dni.',
        language: 'pl-PL'
    }
};

const configSchema = z.object({
    sources: z.array(z.object({ url: z.string().url(), label: z.string().min(1) })).min(1),
    retentionDays: z.number().positive(),
    fallbackImage: z.string().startsWith('http'),
    timeZone: z.string().refine(isValidTimeZone, { message: 'unknown time zone' }),
    outputFile: z.string().min(1),
    userAgent: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
    channel: z.object({
        title: z.string(),
        link: z.string(),
        description: z.string(),
        language: z.string()
    })
}).strict();

/** 配置文件无法解析或校验失败 */
export class ConfigError extends Error {
    constructor(message: string, readonly file?: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * 校验部分配置并覆盖到默认值上
 * 原因：配置文件只需写要改的字段；拼错的键或非法时区应在抓取前报出
 * 实现：zod strict schema 的 partial 版本；错误信息带字段路径
 */
export function resolveConfig(input: unknown, file?: string): AggregatorConfig {
    const partial = configSchema.partial().safeParse(input ?? {});
    if (!partial.success) {
        const issues = partial.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError(`invalid configuration: ${issues.join('; ')}`, file);
    }
    return { ...DEFAULT_CONFIG, ...partial.data };
}

/** 读取 YAML 配置（默认 ./configs/sources.yaml），文件不存在时用默认值 */
export function loadConfig(cfgPath: string = DEFAULT_CONFIG_PATH): AggregatorConfig {
    const resolved = path.resolve(cfgPath);
    if (!fs.existsSync(resolved)) return { ...DEFAULT_CONFIG };
    let doc: unknown;
    try {
        doc = load(fs.readFileSync(resolved, 'utf-8'));
    } catch (e) {
        throw new ConfigError(`cannot parse ${resolved}: ${e instanceof Error ? e.message : String(e)}`, resolved);
    }
    return resolveConfig(doc, resolved);
}
