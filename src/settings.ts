import { type Logger } from 'pino';
import { Config } from './config.ts';
import { type Engine } from './engine.ts';
import { OpenAIChatCompletionsEngine } from './engines/openai-chatcompletions.ts';
import { createLogger } from './logger.ts';
import { Throttle } from './throttle.ts';


/**
 * Process-wide defaults for every LLM function. Anything left unset is built
 * from the environment on first use.
 */
export namespace Settings {
	let config: Config | undefined;
	let engine: Engine | undefined;
	let logger: Logger | undefined;

	export function getConfig(): Config {
		return config ??= Config.fromEnv(process.env);
	}
	export function setConfig(value: Config): void {
		config = value;
		engine = undefined;
	}

	export function getEngine(): Engine {
		if (engine) return engine;
		const { endpoint } = getConfig();
		if (!endpoint.apiKey) throw new Config.Invalid('OPENAI_API_KEY is not set');
		return engine = OpenAIChatCompletionsEngine.create({
			...endpoint,
			throttle: new Throttle(endpoint.rpm ?? Number.POSITIVE_INFINITY),
		});
	}
	export function setEngine(value: Engine): void {
		engine = value;
	}

	export function getLogger(): Logger {
		return logger ??= createLogger();
	}
	export function setLogger(value: Logger): void {
		logger = value;
	}

	export function reset(): void {
		config = undefined;
		engine = undefined;
		logger = undefined;
	}
}
