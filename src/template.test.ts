import { describe, expect, it } from 'vitest';
import { dedent, format, formatTemplate, parseFields } from './template.ts';


describe('dedent', () => {
	it('dedents the first line apart from the rest', () => {
		const text = 'Format the date.\n\t\tUse ISO 8601.\n\t\t  Pad with zeros.';
		expect(dedent(text)).toBe('Format the date.\nUse ISO 8601.\n  Pad with zeros.');
	});

	it('ignores blank lines when measuring the indent', () => {
		expect(dedent('Title\n    a\n\n    b\n  ')).toBe('Title\na\n\nb\n');
	});

	it('leaves a single line without its leading whitespace', () => {
		expect(dedent('   hello')).toBe('hello');
	});
});

describe('parseFields', () => {
	it('lists the argument names referenced', () => {
		expect(parseFields('{a} and {b.c} and {d[0]!r:>5} but not {{e}}')).toEqual(new Set(['a', 'b', 'd']));
	});
});

describe('format', () => {
	it('substitutes named arguments', () => {
		const result = format('Format {date} as yyyy-mm-dd', { date: 'December 9, 1992.' });
		expect(result.text).toBe('Format December 9, 1992. as yyyy-mm-dd');
		expect(result.used).toEqual(new Set(['date']));
	});

	it('keeps doubled braces literal', () => {
		expect(format('{{"result": {x}}}', { x: 1 }).text).toBe('{"result": 1}');
	});

	it('walks attributes and indexes', () => {
		const args = { movie: { title: 'Up', cast: ['Carl', 'Russell'] } };
		expect(format('{movie.title} with {movie.cast[1]}', args).text).toBe('Up with Russell');
	});

	it('renders objects as JSON and applies conversions and specs', () => {
		const args = { tags: ['a', 'b'], name: 'x', ratio: 0.125, n: 7 };
		expect(format('{tags} {name!r} {ratio:.1%} {n:0>3d} [{name:^5}]', args).text)
			.toBe('["a","b"] "x" 12.5% 007 [  x  ]');
	});

	it('falls back to the raw template when a field is unknown', () => {
		const result = format('Return {"a": 1} for {x}', { x: 2 });
		expect(result.text).toBe('Return {"a": 1} for {x}');
		expect(result.used.size).toBe(0);
	});

	it('writes bigints as strings', () => {
		expect(format('Count {data}', { data: { n: 1n } }).text).toBe('Count {"n":"1"}');
		expect(format('Count {n!r}', { n: 1n }).text).toBe('Count "1"');
	});

	it('falls back when a value cannot be serialized', () => {
		const data: Record<string, unknown> = {};
		data.self = data;
		const result = format('Count {data}', { data });
		expect(result.text).toBe('Count {data}');
		expect(result.used.size).toBe(0);
	});

	it('does not reach inherited properties', () => {
		expect(format('{m.constructor}', { m: {} }).text).toBe('{m.constructor}');
		expect(format('{m.toString}', { m: { a: 1 } }).text).toBe('{m.toString}');
		expect(format('{constructor}', { a: 1 }).text).toBe('{constructor}');
	});

	it('falls back on positional and unbalanced fields', () => {
		expect(format('{0}', { a: 1 }).text).toBe('{0}');
		expect(format('{}', { a: 1 }).text).toBe('{}');
		expect(format('a } b', { a: 1 }).text).toBe('a } b');
		expect(format('{a', { a: 1 }).text).toBe('{a');
	});
});

describe('formatTemplate', () => {
	it('reports the arguments the template leaves out', () => {
		const result = formatTemplate('Improve the story about {subject}', {
			subject: 'dragons',
			story: 'Once upon a time',
			review: 'Too short',
		});
		expect(result.prompt).toBe('Improve the story about dragons');
		expect(result.unused).toEqual(['story', 'review']);
	});

	it('reports every argument as unused when formatting fails', () => {
		const result = formatTemplate('Format the {date as yyyy-mm-dd', { date: 'today' });
		expect(result.prompt).toBe('Format the {date as yyyy-mm-dd');
		expect(result.unused).toEqual(['date']);
	});
});
