import { describe, expect, it } from 'vitest';
import { Type } from '@sinclair/typebox';
import {
	ANSWER_DIRECTLY,
	THINK_THROUGH,
	generatePrompt,
	generateSystemPrompt,
	renderDeclaration,
	renderReport,
	wrapLine,
} from './prompt.ts';


const formatDate = {
	name: 'formatDate',
	template: 'Format {date} as yyyy-mm-dd',
	paraschema: Type.Object({ date: Type.String() }),
	returns: Type.String(),
};

const code = [
	'/**',
	' * Format {date} as yyyy-mm-dd',
	' */',
	'declare function formatDate(params: {',
	'\tdate: string;',
	'}): string;',
].join('\n');

describe('renderDeclaration', () => {
	it('renders the template as doc comment above the signature', () => {
		expect(renderDeclaration(formatDate)).toBe(code);
	});

	it('declares the models first', () => {
		const Dog = Type.Object({ name: Type.String() }, { title: 'Dog' });
		const rendered = renderDeclaration({ ...formatDate, returns: Type.Array(Dog) });
		expect(rendered.startsWith('interface Dog {\n\tname: string;\n}\n\n/**\n')).toBe(true);
		expect(rendered.endsWith('}): Dog[];')).toBe(true);
	});
});

describe('generateSystemPrompt', () => {
	const expected = (thinking: string) => [
		'',
		'For the following TypeScript function, evaluate the user-provided input.',
		'',
		'```ts',
		code,
		'```',
		'',
		thinking,
		'Provide the final output at the end as follows,',
		'where FUNCTION_OUTPUT is in JSON format:',
		'',
		'<ANSWER>',
		'{"result": FUNCTION_OUTPUT}',
		'</ANSWER>',
		'',
	].join('\n');

	it('asks for a direct answer by default', () => {
		expect(generateSystemPrompt(formatDate, false)).toBe(expected(ANSWER_DIRECTLY));
	});

	it('asks to think through with reasoning', () => {
		expect(generateSystemPrompt(formatDate, true)).toBe(expected(THINK_THROUGH));
	});

	it('puts the caller system prompt first', () => {
		expect(generateSystemPrompt(formatDate, false, '  You are terse.  ')).toBe(`You are terse.\n${expected(ANSWER_DIRECTLY)}`);
	});
});

describe('generatePrompt', () => {
	it('appends the arguments the template leaves out as JSON', () => {
		const improveStory = {
			name: 'improveStory',
			template: 'Use the review to improve the story about {subject}',
			paraschema: Type.Object({ subject: Type.String(), story: Type.String(), review: Type.String() }),
			returns: Type.String(),
		};
		expect(generatePrompt(improveStory, { subject: 'dragons', story: 'Once', review: 'Short' })).toBe([
			'Use the review to improve the story about dragons',
			'Use these values (provided in JSON):',
			'{',
			'  "story": "Once",',
			'  "review": "Short"',
			'}',
		].join('\n'));
	});

	it('appends the fields of the output models', () => {
		const Character = Type.Object({ name: Type.String({ description: 'Full name' }) }, { title: 'Character' });
		const inventCharacters = {
			name: 'inventCharacters',
			template: 'List {n} characters',
			paraschema: Type.Object({ n: Type.Integer() }),
			returns: Type.Array(Character),
		};
		expect(generatePrompt(inventCharacters, { n: 2 })).toBe([
			'List 2 characters',
			'',
			'Use these output schema fields:',
			'{',
			'  "Character": [',
			'    {',
			'      "name": "Full name"',
			'    }',
			'  ]',
			'}',
		].join('\n'));
	});
});

describe('renderReport', () => {
	it('lays out the exchange', () => {
		expect(renderReport('sys', 'in', 'out')).toBe('SYSTEM:\n-------\nsys\n\nINPUT:\n------\n\nin\n\nRESPONSE:\n---------\n\nout');
	});

	it('wraps long lines at 80 columns', () => {
		const line = `${'word '.repeat(20).trim()}`;
		const wrapped = renderReport('s', line, 'r').split('\n');
		expect(wrapped.every(l => l.length <= 80)).toBe(true);
		expect(wrapped[7]).toBe('word '.repeat(16).trim());
		expect(wrapped[8]).toBe('word '.repeat(4).trim());
	});
});

describe('wrapLine', () => {
	it('wraps on spaces and keeps the indent', () => {
		expect(wrapLine('one two three four', 9)).toEqual(['one two', 'three', 'four']);
		expect(wrapLine('  alpha beta gamma', 12)).toEqual(['  alpha beta', '  gamma']);
	});

	it('splits words longer than the width', () => {
		expect(wrapLine('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
	});
});
