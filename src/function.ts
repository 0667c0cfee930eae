import { type Static, type TObject, type TSchema } from '@sinclair/typebox';
import { type Logger } from 'pino';
import assert from 'node:assert';
import { isRecord, nameArguments } from './arguments.ts';
import { AnswerParser } from './answer.ts';
import { type Engine, type Session, ResponseInvalid } from './engine.ts';
import { type InferenceContext } from './inference-context.ts';
import { type Declaration as PromptDeclaration, generatePrompt, generateSystemPrompt, renderReport } from './prompt.ts';
import { Settings } from './settings.ts';
import { dedent } from './template.ts';


/**
 * A function that runs on an LLM: its template is the prompt, its return
 * schema both describes and validates the answer.
 */
export interface LLMFunction<in out ps extends TObject, in out rs extends TSchema> {
	/**
	 * @throws {@link LLMFunction.RetryLimitExceeded} no attempt produced a valid answer
	 * @throws {@link UserAbortion}
	 * @throws {@link InferenceTimeout}
	 */
	(params: Static<ps>, options?: LLMFunction.Options): Promise<Static<rs>>;
	readonly declaration: LLMFunction.Declaration<ps, rs>;
	/**
	 * The template followed by a note on how the function runs.
	 */
	readonly description: string;
}

export namespace LLMFunction {
	export interface Declaration<out ps extends TObject = TObject, out rs extends TSchema = TSchema> extends PromptDeclaration {
		paraschema: ps;
		returns: rs;
	}

	/**
	 * Per-call options take precedence over the defaults given at creation,
	 * which take precedence over {@link Settings}.
	 */
	export interface Options {
		/**
		 * Overrides the model of the engine's endpoint.
		 */
		model?: string;
		/**
		 * Prepended to the system prompt, e.g. to give the model a persona.
		 */
		systemPrompt?: string;
		/**
		 * Asks the model to reason before answering. Longer and costlier calls,
		 * usually better answers.
		 */
		reasoning?: boolean;
		/**
		 * Extra attempts after a reply that cannot be parsed.
		 */
		retries?: number;
		/**
		 * Logs every transaction report at info level instead of debug.
		 */
		debug?: boolean;
		engine?: Engine;
		logger?: Logger;
		signal?: AbortSignal;
		cost?: (deltaCost: number) => void;
	}

	export const OPTION_NAMES = [
		'model', 'systemPrompt', 'reasoning', 'retries', 'debug', 'engine', 'logger', 'signal', 'cost',
	] as const satisfies readonly (keyof Options)[];

	export function describe(declaration: PromptDeclaration): string {
		return [
			dedent(declaration.template).trim(),
			'',
			'Function generated by LLMFunction.create.',
			'- The execution happens on an LLM chat API, and may require an API key.',
			'- The quality and validity of the output are not guaranteed.',
			`- Per-call options: ${OPTION_NAMES.join(', ')}.`,
		].join('\n');
	}

	export function create<ps extends TObject, rs extends TSchema>(
		declaration: Declaration<ps, rs>,
		defaults: Options = {},
	): LLMFunction<ps, rs> {
		const parser = AnswerParser.create(declaration.returns);

		const f = async (params: Static<ps>, options: Options = {}): Promise<Static<rs>> => {
			const args: unknown = params;
			assert(isRecord(args), new TypeError(`${declaration.name} takes its arguments as an object`));

			const retries = options.retries ?? defaults.retries ?? Settings.getConfig().retries;
			assert(Number.isInteger(retries) && retries >= 0, new RangeError(`Invalid retries: ${retries}`));
			const reasoning = options.reasoning ?? defaults.reasoning ?? Settings.getConfig().reasoning;
			const debug = options.debug ?? defaults.debug ?? false;
			const engine = options.engine ?? defaults.engine ?? Settings.getEngine();
			const model = options.model ?? defaults.model;
			const logger = (options.logger ?? defaults.logger ?? Settings.getLogger()).child({ function: declaration.name });
			const ctx: InferenceContext = {
				logger,
				signal: options.signal ?? defaults.signal,
				cost: options.cost ?? defaults.cost,
			};

			const namedArgs = nameArguments(declaration.paraschema, args);
			const session: Session = {
				developerMessage: generateSystemPrompt(declaration, reasoning, options.systemPrompt ?? defaults.systemPrompt),
				userMessage: generatePrompt(declaration, namedArgs),
			};

			for (let attempt = 0;; attempt++) {
				let response = '';
				try {
					response = await engine(ctx, session, model);
					logger[debug ? 'info' : 'debug']({ attempt }, renderReport(session.developerMessage ?? '', session.userMessage, response));
					return parser.parse(response);
				} catch (e) {
					if (!(e instanceof ResponseInvalid)) throw e;
					if (attempt >= retries)
						throw new RetryLimitExceeded(
							renderReport(session.developerMessage ?? '', session.userMessage, response),
							attempt + 1,
							{ cause: e },
						);
					logger.warn({ err: e, attempt }, 'invalid answer, retrying');
				}
			}
		};

		Object.defineProperty(f, 'name', { value: declaration.name });
		return Object.assign(f, {
			declaration,
			description: describe(declaration),
		});
	}

	export class RetryLimitExceeded extends Error {
		public constructor(
			public report: string,
			public attempts: number,
			options?: ErrorOptions,
		) {
			super(`LLM transaction failed after ${attempts} attempt(s):\n${report}`, options);
		}
	}
}
