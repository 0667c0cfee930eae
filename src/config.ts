import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { EndpointSpec } from './endpoint-spec.ts';


export type Config = Static<typeof Config.schema>;
export namespace Config {
	export const schema = Type.Object({
		endpoint: EndpointSpec.schema,
		retries: Type.Integer({ minimum: 0, default: 0 }),
		reasoning: Type.Boolean({ default: false }),
	});

	export interface Env {
		OPENAI_API_KEY?: string;
		OPENAI_BASE_URL?: string;
		LLM_FUNCTION_MODEL?: string;
		LLM_FUNCTION_TIMEOUT?: string;
		LLM_FUNCTION_RPM?: string;
		LLM_FUNCTION_RETRIES?: string;
		https_proxy?: string;
		HTTPS_PROXY?: string;
	}

	/**
	 * @throws {@link Config.Invalid}
	 */
	export function parse(raw: unknown): Config {
		const value = Value.Default(schema, Value.Clone(raw));
		if (Value.Check(schema, value)) return value;
		const messages = [...Value.Errors(schema, value)].map(error => `${error.path || '/'}: ${error.message}`);
		throw new Invalid(messages.join('; '), { cause: raw });
	}

	export function fromEnv(env: Env): Config {
		return parse({
			endpoint: {
				baseUrl: env.OPENAI_BASE_URL || undefined,
				apiKey: env.OPENAI_API_KEY ?? '',
				model: env.LLM_FUNCTION_MODEL || undefined,
				proxy: env.https_proxy || env.HTTPS_PROXY || undefined,
				timeout: numberOf('LLM_FUNCTION_TIMEOUT', env.LLM_FUNCTION_TIMEOUT),
				rpm: numberOf('LLM_FUNCTION_RPM', env.LLM_FUNCTION_RPM),
			},
			retries: numberOf('LLM_FUNCTION_RETRIES', env.LLM_FUNCTION_RETRIES),
		});
	}

	function numberOf(name: string, text?: string): number | undefined {
		if (!text) return undefined;
		const n = Number(text);
		if (Number.isNaN(n)) throw new Invalid(`${name} is not a number: ${text}`);
		return n;
	}

	export class Invalid extends Error {}
}

declare global {
	export namespace NodeJS {
		export interface ProcessEnv extends Config.Env {}
	}
}
