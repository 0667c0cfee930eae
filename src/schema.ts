import { KindGuard, type TObject, type TSchema } from '@sinclair/typebox';
import { ReasonedAnswer } from './reasoned-answer.ts';
import { stringify } from './template.ts';


/**
 * A titled object schema, rendered by its title.
 */
export type Model = TObject & { title: string };

function isModel(schema: TSchema): schema is Model {
	return KindGuard.IsObject(schema) && typeof schema.title === 'string' && !ReasonedAnswer.is(schema);
}

function children(schema: TSchema): TSchema[] {
	if (KindGuard.IsObject(schema)) return Object.values(schema.properties);
	if (KindGuard.IsArray(schema)) return [schema.items];
	if (KindGuard.IsTuple(schema)) return schema.items ?? [];
	if (KindGuard.IsUnion(schema)) return schema.anyOf;
	if (KindGuard.IsRecord(schema)) return Object.values(schema.patternProperties);
	return [];
}

/**
 * Every model reachable from the schemas, outermost first.
 */
export function collectModels(...schemas: TSchema[]): Model[] {
	const models = new Map<string, Model>();
	const visited = new Set<TSchema>();
	const visit = (schema: TSchema): void => {
		if (visited.has(schema)) return;
		visited.add(schema);
		if (isModel(schema) && !models.has(schema.title)) models.set(schema.title, schema);
		children(schema).forEach(visit);
	};
	schemas.forEach(visit);
	return [...models.values()];
}


function renderObjectBody(schema: TObject, indent: string): string {
	const entries = Object.entries(schema.properties);
	if (!entries.length) return '{}';
	const fields = entries.map(([name, propschema]) => {
		const key = /^[A-Za-z_$][\w$]*$/.test(name) ? name : JSON.stringify(name);
		const doc = typeof propschema.description === 'string' ? `${indent}\t/** ${propschema.description} */\n` : '';
		const optional = KindGuard.IsOptional(propschema) ? '?' : '';
		return `${doc}${indent}\t${key}${optional}: ${renderType(propschema, `${indent}\t`)};`;
	});
	return `{\n${fields.join('\n')}\n${indent}}`;
}

/**
 * A TypeScript type expression for the schema.
 */
export function renderType(schema: TSchema, indent = ''): string {
	if (isModel(schema)) return schema.title;
	if (KindGuard.IsObject(schema)) return renderObjectBody(schema, indent);
	if (KindGuard.IsLiteral(schema)) return JSON.stringify(schema.const);
	if (KindGuard.IsString(schema)) return 'string';
	if (KindGuard.IsNumber(schema) || KindGuard.IsInteger(schema)) return 'number';
	if (KindGuard.IsBoolean(schema)) return 'boolean';
	if (KindGuard.IsNull(schema)) return 'null';
	if (KindGuard.IsArray(schema)) {
		const item = renderType(schema.items, indent);
		return KindGuard.IsUnion(schema.items) ? `(${item})[]` : `${item}[]`;
	}
	if (KindGuard.IsTuple(schema)) return `[${(schema.items ?? []).map(item => renderType(item, indent)).join(', ')}]`;
	if (KindGuard.IsUnion(schema)) return schema.anyOf.map(variant => renderType(variant, indent)).join(' | ');
	if (KindGuard.IsRecord(schema)) {
		const [value] = Object.values(schema.patternProperties);
		return `Record<string, ${value ? renderType(value, indent) : 'unknown'}>`;
	}
	return 'unknown';
}

/**
 * Interface declarations of every model reachable from the schemas.
 */
export function renderModels(...schemas: TSchema[]): string {
	return collectModels(...schemas).map(model => {
		const doc = typeof model.description === 'string' ? `/** ${model.description} */\n` : '';
		return `${doc}interface ${model.title} ${renderObjectBody(model, '')}`;
	}).join('\n\n');
}


export namespace describeOutputFields {
	export type Field = string | Record<string, string>;
	export type Result = Record<string, Field[]>;
}

function describeField(name: string, propschema: TSchema): describeOutputFields.Field {
	const parts: string[] = [];
	if (typeof propschema.description === 'string' && propschema.description) parts.push(propschema.description);
	const examples: unknown = propschema.examples;
	const example = Array.isArray(examples) ? examples[0] : examples;
	if (example !== undefined) parts.push(`Example: ${stringify(example)}`);
	return parts.length ? { [name]: parts.join(' ') } : name;
}

/**
 * For each model, its description followed by its fields, each field with its
 * description and example where it has any.
 */
export function describeOutputFields(schema: TSchema): describeOutputFields.Result {
	const result: describeOutputFields.Result = {};
	for (const model of collectModels(schema)) {
		const fields = Object.entries(model.properties).map(([name, propschema]) => describeField(name, propschema));
		result[model.title] = typeof model.description === 'string' && model.description
			? [model.description, ...fields]
			: fields;
	}
	return result;
}
