import assert from 'node:assert';
import { isRecord } from './arguments.ts';


/**
 * Dedents the first line on its own and the remaining lines as a block, since
 * a template usually starts right after the opening quote while the rest is
 * indented with the surrounding code.
 */
export function dedent(text: string): string {
	const [first = '', ...rest] = text.split('\n');
	const head = first.trimStart();
	return rest.length ? [head, dedentBlock(rest).join('\n')].join('\n') : head;
}

function dedentBlock(lines: string[]): string[] {
	const indents = lines
		.filter(line => line.trim())
		.map(line => line.slice(0, line.length - line.trimStart().length));
	const margin = indents.reduce<string | null>((common, indent) => {
		if (common === null) return indent;
		let i = 0;
		while (i < common.length && i < indent.length && common[i] === indent[i]) i++;
		return common.slice(0, i);
	}, null) ?? '';
	return lines.map(line => line.trim() ? line.slice(margin.length) : '');
}


export namespace Field {
	export type Accessor =
		| { type: 'attribute'; key: string }
		| { type: 'index'; key: string | number };
}
export interface Field {
	name: string;
	accessors: Field.Accessor[];
	conversion?: 's' | 'r' | 'a';
	spec: string;
}

type Piece = string | Field;

export class TemplateSyntaxError extends SyntaxError {}

/**
 * Splits a template into literal text and replacement fields.
 *
 * `{{` and `}}` stand for literal braces.
 * @throws {@link TemplateSyntaxError}
 */
export function parse(template: string): Piece[] {
	const pieces: Piece[] = [];
	let literal = '';
	for (let i = 0; i < template.length; i++) {
		const c = template.charAt(i);
		if (c === '{' && template[i+1] === '{') {
			literal += '{';
			i++;
		} else if (c === '}' && template[i+1] === '}') {
			literal += '}';
			i++;
		} else if (c === '{') {
			const end = template.indexOf('}', i);
			if (end < 0) throw new TemplateSyntaxError(`Unclosed field at ${i}`);
			const body = template.slice(i+1, end);
			if (body.includes('{')) throw new TemplateSyntaxError(`Nested field at ${i}`);
			if (literal) pieces.push(literal);
			literal = '';
			pieces.push(parseField(body));
			i = end;
		} else if (c === '}') {
			throw new TemplateSyntaxError(`Single '}' at ${i}`);
		} else literal += c;
	}
	if (literal) pieces.push(literal);
	return pieces;
}

function parseField(body: string): Field {
	const match = /^([^!:]*)(?:!([^:]*))?(?::(.*))?$/s.exec(body);
	assert(match, new TemplateSyntaxError(`Invalid field {${body}}`));
	const [, path = '', conversionText, spec = ''] = match;
	const conversion = conversionOf(conversionText);

	const head = /^[^.[]*/.exec(path)?.[0] ?? '';
	if (!head || /^\d+$/.test(head)) throw new TemplateSyntaxError(`Positional field {${body}} cannot be named`);
	const accessors: Field.Accessor[] = [];
	const accessorPattern = /\.([^.[]+)|\[([^\]]+)\]/y;
	accessorPattern.lastIndex = head.length;
	while (accessorPattern.lastIndex < path.length) {
		const accessor = accessorPattern.exec(path);
		if (!accessor) throw new TemplateSyntaxError(`Invalid field name ${path}`);
		const [, attribute, index] = accessor;
		if (attribute !== undefined) accessors.push({ type: 'attribute', key: attribute });
		else if (index !== undefined) accessors.push({ type: 'index', key: /^\d+$/.test(index) ? Number(index) : index });
	}
	return { name: head, accessors, conversion, spec };
}

function conversionOf(text?: string): Field['conversion'] {
	if (text === undefined) return undefined;
	if (text === 's' || text === 'r' || text === 'a') return text;
	throw new TemplateSyntaxError(`Unknown conversion !${text}`);
}

/**
 * Names of the arguments a template refers to.
 * @throws {@link TemplateSyntaxError}
 */
export function parseFields(template: string): Set<string> {
	return new Set(parse(template).flatMap(piece => typeof piece === 'string' ? [] : [piece.name]));
}


export class TemplateLookupError extends Error {}

function lookup(field: Field, namedArgs: Readonly<Record<string, unknown>>): unknown {
	if (!Object.hasOwn(namedArgs, field.name)) throw new TemplateLookupError(`Unknown argument ${field.name}`);
	let value = namedArgs[field.name];
	for (const accessor of field.accessors) {
		if (Array.isArray(value) && typeof accessor.key === 'number' && accessor.key < value.length)
			value = value[accessor.key];
		else if (isRecord(value) && Object.hasOwn(value, String(accessor.key)))
			value = value[String(accessor.key)];
		else throw new TemplateLookupError(`${field.name} has no ${accessor.type} ${accessor.key}`);
	}
	return value;
}

/**
 * JSON with bigints written as strings.
 * @throws {@link TypeError} on circular structures
 */
export function toJSONText(value: unknown, space?: number): string | undefined {
	return JSON.stringify(value, (_key, v: unknown) => typeof v === 'bigint' ? v.toString() : v, space);
}

export function stringify(value: unknown): string {
	if (typeof value === 'string') return value;
	if (value instanceof Date) return value.toISOString();
	if (value === undefined) return 'undefined';
	if (typeof value === 'object' || typeof value === 'function') return toJSONText(value) ?? String(value);
	return String(value);
}

const SPEC_PATTERN = /^(?:(.)?([<>^]))?(\d+)?(?:\.(\d+))?([sdf%])?$/s;

function applySpec(value: unknown, text: string, spec: string): string {
	if (!spec) return text;
	const match = SPEC_PATTERN.exec(spec);
	if (!match) throw new TemplateSyntaxError(`Unsupported format spec :${spec}`);
	const [, fill = ' ', align, width, precision, type] = match;
	if (type === 'f' || type === '%') {
		if (typeof value !== 'number') throw new TemplateLookupError(`Format spec :${spec} needs a number`);
		const digits = precision === undefined ? 6 : Number(precision);
		text = type === '%' ? `${(value * 100).toFixed(digits)}%` : value.toFixed(digits);
	} else if (type === 'd') {
		if (!Number.isInteger(value)) throw new TemplateLookupError(`Format spec :${spec} needs an integer`);
	} else if (precision !== undefined) text = text.slice(0, Number(precision));
	const padding = Math.max(0, Number(width ?? 0) - text.length);
	const defaultAlign = typeof value === 'number' ? '>' : '<';
	switch (align ?? defaultAlign) {
		case '>': return fill.repeat(padding) + text;
		case '^': return fill.repeat(Math.floor(padding/2)) + text + fill.repeat(Math.ceil(padding/2));
		default: return text + fill.repeat(padding);
	}
}

function render(field: Field, namedArgs: Readonly<Record<string, unknown>>): string {
	const value = lookup(field, namedArgs);
	let text: string;
	try {
		text = field.conversion === 'r' || field.conversion === 'a'
			? toJSONText(value) ?? String(value)
			: stringify(value);
	} catch (e) {
		if (e instanceof TypeError) throw new TemplateLookupError(`${field.name} cannot be serialized`, { cause: e });
		throw e;
	}
	return applySpec(value, text, field.spec);
}

export namespace format {
	export interface Result {
		text: string;
		used: Set<string>;
	}
}

/**
 * Substitutes the named arguments into the template. A template that cannot
 * be formatted is returned as is, with no argument used.
 */
export function format(template: string, namedArgs: Readonly<Record<string, unknown>>): format.Result {
	try {
		const pieces = parse(template);
		const text = pieces.map(piece => typeof piece === 'string' ? piece : render(piece, namedArgs)).join('');
		return { text, used: new Set(pieces.flatMap(piece => typeof piece === 'string' ? [] : [piece.name])) };
	} catch (e) {
		if (e instanceof TemplateSyntaxError || e instanceof TemplateLookupError) return { text: template, used: new Set() };
		throw e;
	}
}

export namespace formatTemplate {
	export interface Result {
		prompt: string;
		unused: string[];
	}
}

export function formatTemplate(template: string, namedArgs: Readonly<Record<string, unknown>>): formatTemplate.Result {
	const { text, used } = format(dedent(template), namedArgs);
	return {
		prompt: text,
		unused: Object.keys(namedArgs).filter(name => !used.has(name)),
	};
}
