import { Type, type Static } from '@sinclair/typebox';


export type EndpointSpec = Static<typeof EndpointSpec.schema>;
export namespace EndpointSpec {
	export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
	export const DEFAULT_MODEL = 'gpt-4o-mini';

	export const schema = Type.Object({
		baseUrl: Type.String({ default: DEFAULT_BASE_URL }),
		apiKey: Type.String(),
		model: Type.String({ default: DEFAULT_MODEL }),
		proxy: Type.Optional(Type.String()),
		/**
		 * Milliseconds per request.
		 */
		timeout: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
		rpm: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
		/**
		 * Prices are per million tokens.
		 */
		inputPrice: Type.Optional(Type.Number({ minimum: 0 })),
		outputPrice: Type.Optional(Type.Number({ minimum: 0 })),
		cachedPrice: Type.Optional(Type.Number({ minimum: 0 })),
		customOptions: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
	});
}
