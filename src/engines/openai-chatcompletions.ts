import OpenAI from 'openai';
import assert from 'node:assert';
import { ProxyAgent } from 'undici';
import { type Engine, type Session, ResponseInvalid, UserAbortion, InferenceTimeout } from '../engine.ts';
import { type InferenceContext } from '../inference-context.ts';
import { type Throttle } from '../throttle.ts';


export class OpenAIChatCompletionsEngine {
	public static create(options: OpenAIChatCompletionsEngine.Options): Engine {
		const engine = new OpenAIChatCompletionsEngine(options);
		return engine.monolith.bind(engine);
	}

	protected client: OpenAI;
	protected model: string;
	protected inputPrice: number;
	protected outputPrice: number;
	protected cachedPrice: number;
	protected customOptions?: Record<string, unknown>;
	protected throttle: Throttle;
	protected timeout?: number;

	protected constructor(options: OpenAIChatCompletionsEngine.Options) {
		this.model = options.model;
		this.inputPrice = options.inputPrice ?? 0;
		this.outputPrice = options.outputPrice ?? 0;
		this.cachedPrice = options.cachedPrice ?? this.inputPrice;
		this.customOptions = options.customOptions;
		this.throttle = options.throttle;
		this.timeout = options.timeout;
		this.client = new OpenAI({
			baseURL: options.baseUrl,
			apiKey: options.apiKey,
			fetch: options.fetch,
			maxRetries: options.maxRetries,
			fetchOptions: options.proxy ? {
				dispatcher: new ProxyAgent(options.proxy),
			} : undefined,
		});
	}

	protected makeParams(session: Session, model = this.model): OpenAI.ChatCompletionCreateParamsNonStreaming {
		const messages: OpenAI.ChatCompletionMessageParam[] = [];
		if (session.developerMessage) messages.push({ role: 'system', content: session.developerMessage });
		messages.push({ role: 'user', content: session.userMessage });
		return {
			model,
			stream: false,
			messages,
			...this.customOptions,
		};
	}

	protected calcCost(usage: OpenAI.CompletionUsage): number {
		const cacheHitTokenCount = usage.prompt_tokens_details?.cached_tokens ?? 0;
		const cacheMissTokenCount = usage.prompt_tokens - cacheHitTokenCount;
		return	this.inputPrice * cacheMissTokenCount / 1e6 +
				this.cachedPrice * cacheHitTokenCount / 1e6 +
				this.outputPrice * usage.completion_tokens / 1e6;
	}

	/**
	 * @throws {@link UserAbortion}
	 * @throws {@link InferenceTimeout}
	 * @throws {@link ResponseInvalid}
	 * @throws {@link OpenAI.APIError}
	 */
	protected async monolith(ctx: InferenceContext, session: Session, model?: string): Promise<string> {
		const signalTimeout = this.timeout ? AbortSignal.timeout(this.timeout) : undefined;
		const signal = ctx.signal && signalTimeout ? AbortSignal.any([
			ctx.signal,
			signalTimeout,
		]) : ctx.signal || signalTimeout;
		const params = this.makeParams(session, model);
		ctx.logger.trace({ params }, 'chat completion request');

		try {
			ctx.signal?.throwIfAborted();
			await this.throttle.requests(ctx);
			const completion: OpenAI.ChatCompletion = await this.client.chat.completions.create(params, { signal });
			ctx.logger.trace({ completion }, 'chat completion response');

			const choice = completion.choices[0];
			assert(choice, new ResponseInvalid('No choices', { cause: completion }));
			assert(choice.message.content, new ResponseInvalid('Content missing', { cause: completion }));

			if (completion.usage) {
				const cost = this.calcCost(completion.usage);
				ctx.cost?.(cost);
				ctx.logger.debug({ usage: completion.usage, cost }, 'chat completion usage');
			}
			if (choice.finish_reason !== 'stop')
				ctx.logger.warn({ finishReason: choice.finish_reason }, 'chat completion did not stop normally');

			return choice.message.content;
		} catch (e) {
			if (ctx.signal?.aborted) throw new UserAbortion(undefined, { cause: e });
			if (signalTimeout?.aborted) throw new InferenceTimeout(undefined, { cause: e });
			throw e;
		}
	}
}

export namespace OpenAIChatCompletionsEngine {
	export interface Options extends Engine.Options {
		/**
		 * Replaces the global fetch of the client.
		 */
		fetch?: typeof globalThis.fetch;
		maxRetries?: number;
	}
}
