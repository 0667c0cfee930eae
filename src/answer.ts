import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { Ajv, type ValidateFunction } from 'ajv';
import { isRecord } from './arguments.ts';
import { ResponseInvalid } from './engine.ts';


const ajv = new Ajv({ coerceTypes: true, useDefaults: true, strict: false, allErrors: true });
const exactAjv = new Ajv({ strict: false, allErrors: true });

// Greedy prefix: the block opened by the last `<ANSWER>` that is closed.
const ANSWER_PATTERN = /.*<ANSWER>(.*?)<\/ANSWER>/s;
const FENCE_PATTERN = /^```[\w-]*\n([\s\S]*?)\n?```$/;

/**
 * The payload of the last `<ANSWER>` block in the text.
 * @throws {@link ResponseInvalid}
 */
export function extractAnswer(text: string): string {
	const answer = ANSWER_PATTERN.exec(text)?.[1];
	if (answer === undefined) throw new ResponseInvalid('Answer markers not found', { cause: text });
	const payload = answer.trim();
	return FENCE_PATTERN.exec(payload)?.[1]?.trim() ?? payload;
}

export class AnswerParser<in out rs extends TSchema> {
	public static create<rs extends TSchema>(returns: rs): AnswerParser<rs> {
		return new AnswerParser(returns);
	}

	private validate: ValidateFunction<{ result: Static<rs> }>;
	private validateExact: ValidateFunction<{ result: Static<rs> }>;
	protected constructor(public returns: rs) {
		const schema = Type.Object({ result: returns });
		this.validate = ajv.compile<{ result: Static<rs> }>(schema);
		this.validateExact = exactAjv.compile<{ result: Static<rs> }>(schema);
	}

	/**
	 * @returns the result coerced into the return schema
	 * @throws {@link ResponseInvalid}
	 */
	public parse(text: string): Static<rs> {
		const answer = extractAnswer(text);
		const payload: unknown = (() => {
			try {
				return JSON.parse(answer);
			} catch (e) {
				throw new ResponseInvalid('Answer is not JSON', { cause: e });
			}
		})();
		if (typeof payload !== 'object' || payload === null || !('result' in payload))
			throw new ResponseInvalid('Answer has no result', { cause: payload });
		const original = Value.Clone(payload);
		if (!this.validate(payload))
			throw new ResponseInvalid(
				`Answer does not match the return schema: ${ajv.errorsText(this.validate.errors)}`,
				{ cause: original },
			);
		if (!restoreNulls(original, payload)) return payload.result;
		// Coercion turns null into "", 0 or false; such nulls must be allowed as they are.
		if (this.validateExact(payload)) return payload.result;
		throw new ResponseInvalid(
			`Answer has null where the return schema does not allow it: ${exactAjv.errorsText(this.validateExact.errors)}`,
			{ cause: original },
		);
	}
}

/**
 * Puts back the nulls of `before` that coercion replaced in `after`.
 * @returns whether any null was put back
 */
function restoreNulls(before: unknown, after: unknown): boolean {
	let restored = false;
	if (Array.isArray(before) && Array.isArray(after)) {
		const items: unknown[] = before;
		const coerced: unknown[] = after;
		items.forEach((item, i) => {
			if (item === null && coerced[i] !== null) {
				coerced[i] = null;
				restored = true;
			} else if (restoreNulls(item, coerced[i])) restored = true;
		});
	} else if (isRecord(before) && isRecord(after)) {
		for (const [key, item] of Object.entries(before))
			if (item === null && after[key] !== null) {
				after[key] = null;
				restored = true;
			} else if (restoreNulls(item, after[key])) restored = true;
	}
	return restored;
}
