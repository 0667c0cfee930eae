import { type TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';


export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Names every argument of a call: the supplied ones in the order they were
 * supplied, then the declared ones left out that have a default, in
 * declaration order.
 */
export function nameArguments(paraschema: TObject, params: Readonly<Record<string, unknown>>): Record<string, unknown> {
	const named: Record<string, unknown> = {};
	for (const [name, value] of Object.entries(params))
		if (value !== undefined) named[name] = value;
	for (const [name, propschema] of Object.entries(paraschema.properties))
		if (!Object.hasOwn(named, name) && propschema.default !== undefined)
			named[name] = Value.Clone(propschema.default);
	return named;
}
