import pino, { type Logger, type LevelWithSilent } from 'pino';


export interface LoggerConfig {
	/** Defaults to `LLM_FUNCTION_LOG_LEVEL`, then `warn`. */
	level?: LevelWithSilent;
	options?: pino.LoggerOptions;
}

export function createLogger(config: LoggerConfig = {}): Logger {
	return pino({
		name: 'llm-function',
		level: config.level ?? levelOf(process.env.LLM_FUNCTION_LOG_LEVEL),
		...config.options,
	});
}

function levelOf(text?: string): LevelWithSilent {
	const levels: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
	return levels.find(level => level === text) ?? 'warn';
}

declare global {
	export namespace NodeJS {
		export interface ProcessEnv {
			LLM_FUNCTION_LOG_LEVEL?: string;
		}
	}
}
