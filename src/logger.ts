import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * 创建带模块名的 winston logger
 * 原因：stdout 只留给运行结果行，诊断信息不能混进去
 * 实现：开发环境彩色单行、生产环境 JSON；Console 传输的所有级别都写 stderr
 */
export function createLogger(moduleName: string) {
	const { combine, timestamp, printf, colorize, json } = winston.format;
	const devFmt = combine(
		colorize(),
		timestamp(),
		printf(({ timestamp: ts, level, message, module: _module, ...meta }) => {
			const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
			return `[${String(ts)}] ${level} ${moduleName}: ${String(message)}${extra}`;
		})
	);
	return winston.createLogger({
		level: process.env.LOG_LEVEL || 'info',
		format: process.env.NODE_ENV === 'production' ? combine(timestamp(), json()) : devFmt,
		defaultMeta: { module: moduleName },
		transports: [new winston.transports.Console({ stderrLevels: LEVELS })]
	});
}
