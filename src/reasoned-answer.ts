import { Type, type TObject, type TSchema, type TString } from '@sinclair/typebox';


export type ReasonedAnswer<rs extends TSchema> = TObject<{
	reasoning: TString;
	result: rs;
}>;

const wrappers = new WeakSet<TSchema>();

/**
 * Wraps a return schema so that the model writes out its reasoning before the
 * result, and the caller receives both.
 */
export function ReasonedAnswer<rs extends TSchema>(result: rs): ReasonedAnswer<rs> {
	const schema = Type.Object({
		reasoning: Type.String({ description: 'Step-by-step reasoning leading to the result.' }),
		result,
	});
	wrappers.add(schema);
	return schema;
}

export namespace ReasonedAnswer {
	export function is(schema: TSchema): boolean {
		return wrappers.has(schema);
	}
}
