export type FeedSource = { readonly url: string; readonly label: string };

export type MediaRef = { url?: string };

/** 上游 feed 中读出的单条记录，字段均可缺失，由 normalize 逐级兜底 */
export type RawEntry = {
    id?: string;
    guid?: string;
    title?: string;
    link?: string;
    description?: string;
    summary?: string;
    published?: Date;
    updated?: Date;
    enclosures: MediaRef[];
    mediaContent: MediaRef[];
    mediaThumbnails: MediaRef[];
};

export type ParsedFeed = { malformed: boolean; entries: RawEntry[]; error?: string };

export type FeedReader = (url: string) => Promise<ParsedFeed>;

export type NormalizedItem = {
    guid: string;
    title: string;
    link: string;
    description: string;
    pubDate: Date;
    label: string;
    image: string;
};

export type ChannelMeta = { title: string; link: string; description: string; language: string };

export type SourceReport = {
    url: string;
    label: string;
    malformed: boolean;
    entries: number;
    added: number;
    duplicates: number;
};

export type AggregatorConfig = {
    sources: FeedSource[];
    retentionDays: number;
    fallbackImage: string;
    timeZone: string;
    outputFile: string;
    userAgent: string;
    requestTimeoutMs: number;
    channel: ChannelMeta;
};

export type AggregationResult = { items: NormalizedItem[]; reports: SourceReport[]; outputFile: string };
