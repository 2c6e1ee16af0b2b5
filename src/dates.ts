const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const DAY_MS = 24 * 60 * 60 * 1000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let fmt = formatters.get(timeZone);
    if (!fmt) {
        fmt = new Intl.DateTimeFormat('en-US', {
            timeZone,
            hourCycle: 'h23',
            year: 'numeric',
            month: 'numeric',
            day: 'numeric',
            hour: 'numeric',
            minute: 'numeric',
            second: 'numeric'
        });
        formatters.set(timeZone, fmt);
    }
    return fmt;
}

/**
 * 校验 IANA 时区名
 * 原因：配置里的时区写错时应在抓取前失败，而不是渲染日期时才抛错
 * 实现：能构造出 Intl 格式器即视为有效
 */
export function isValidTimeZone(timeZone: string): boolean {
    try {
        formatterFor(timeZone);
        return true;
    } catch {
        return false;
    }
}

/** `date` 在 `timeZone` 下的墙上时间，按 UTC 时间戳表示 */
function wallClock(date: Date, timeZone: string): number {
    const fields: Record<string, number> = {};
    for (const part of formatterFor(timeZone).formatToParts(date)) {
        if (part.type !== 'literal') fields[part.type] = Number(part.value);
    }
    return Date.UTC(fields.year, fields.month - 1, fields.day, fields.hour, fields.minute, fields.second);
}

function offsetMs(date: Date, timeZone: string): number {
    return wallClock(date, timeZone) - Math.floor(date.getTime() / 1000) * 1000;
}

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * 按目标时区输出 RFC 822 日期，如 `Mon, 19 Oct 2026 14:00:00 +0200`
 * 原因：下游阅读器只认 RSS 约定的英文星期/月份与数字偏移
 * 实现：Intl 取墙上时间，与真实时间戳之差即为偏移
 */
export function formatRfc822(date: Date, timeZone: string): string {
    const local = wallClock(date, timeZone);
    const offsetMin = Math.round(offsetMs(date, timeZone) / 60000);
    const sign = offsetMin < 0 ? '-' : '+';
    const abs = Math.abs(offsetMin);
    const d = new Date(local);
    return `${DAYS[d.getUTCDay()]}, ${pad(d.getUTCDate())} ${MONTHS[d.getUTCMonth()]} ${d.getUTCFullYear()} `
        + `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())} `
        + `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

/**
 * 目标时区下往前推 `days` 个自然日
 * 原因：保留窗口按本地日历计算，跨夏令时切换时不能差一小时
 * 实现：在墙上时间上减天数，再按该时刻的偏移换回真实时间（偏移取两次以落在正确一侧）
 */
export function daysBefore(now: Date, days: number, timeZone: string): Date {
    const local = now.getTime() + offsetMs(now, timeZone) - days * DAY_MS;
    const guess = local - offsetMs(new Date(local), timeZone);
    return new Date(local - offsetMs(new Date(guess), timeZone));
}

/** 宽松解析条目日期；空串或无法解析时视为缺失 */
export function parseDate(value: unknown): Date | undefined {
    if (typeof value !== 'string' || !value.trim()) return undefined;
    const d = new Date(value.trim());
    return Number.isNaN(d.getTime()) ? undefined : d;
}
