#!/usr/bin/env node
import 'dotenv/config';
import { createLogger } from './logger.js';
import { loadConfig } from './config.js';
import { formatSummary, runAggregation } from './pipeline.js';

const logger = createLogger('main');

async function main() {
    const cfg = loadConfig();
    const result = await runAggregation(cfg);
    // 诊断日志全部走 stderr，stdout 只留结果行
    process.stdout.write(`${formatSummary(result)}\n`);
}

main().catch((e: unknown) => {
    logger.error('fatal', { err: e instanceof Error ? e.message : String(e) });
    process.exitCode = 1;
});
